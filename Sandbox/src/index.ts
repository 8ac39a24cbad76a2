export { SubprocessSandbox, buildUlimitPrefix, type SubprocessSandboxOptions } from './executor/subprocess.js';
export { extractTrace } from './executor/trace.js';
export { getConfig, parseSandboxConfig, resetConfig, type SandboxConfig } from './config.js';
export { executionLogPath } from './logging/writer.js';
export type { ExecutionLogEntry } from './logging/types.js';
