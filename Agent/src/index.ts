import { loadEnvSafely } from '@mender/shared/Utils/env.js';

// Loggers read LOG_LEVEL when their modules load, so .env goes first
loadEnvSafely(import.meta.url);

const { main } = await import('./cli/index.js');
process.exitCode = await main(process.argv);
