/**
 * Subprocess sandbox.
 *
 * Runs each attempt in a fresh working directory with:
 * - Stripped environment (no API keys/tokens)
 * - ulimit resource ceilings (file size, optional memory/CPU/processes)
 * - Its own process group, so timeouts and cancellation reach grandchildren
 * - Timeout enforcement (SIGTERM → grace → SIGKILL)
 * - Output capture and head+tail truncation
 */

import { spawn } from 'node:child_process';
import { writeFile, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { Logger } from '@mender/shared/Utils/logger.js';
import { errorMessage } from '@mender/shared/Types/errors.js';
import { truncateOutput, truncateTail } from '@mender/shared/Utils/truncate.js';
import type {
  ExecuteOptions,
  ExecutionResult,
  ExecutionSandbox,
  Language,
  ResourceLimits,
} from '@mender/shared/Types/execution.js';
import { getConfig, getStrippedEnv, type SandboxConfig } from '../config.js';
import { generateExecutionId } from '../utils/id-generator.js';
import { logExecution } from '../logging/writer.js';
import { extractTrace } from './trace.js';

const logger = new Logger('sandbox:subprocess');

/** Map language to script filename */
const SCRIPT_FILES: Record<Language, string> = {
  python: '_mender_script.py',
  node: '_mender_script.mjs',
  bash: '_mender_script.sh',
};

const INTERPRETERS: Record<Language, string> = {
  python: 'python3',
  node: 'node',
  bash: 'bash',
};

// bash prints e.g. "bash: line 1: exec: python3: not found" when the interpreter is missing
const MISSING_INTERPRETER = /exec: .+: not found/;

export interface SubprocessSandboxOptions {
  language: Language;
  /** Defaults to the env-derived config */
  config?: SandboxConfig;
}

/**
 * Build the ulimit prefix for the run's resource ceilings.
 *
 * V8 reserves far more address space than it uses, so `-v` would kill node
 * before the script starts; node gets its heap cap from interpreterCommand.
 */
export function buildUlimitPrefix(
  config: SandboxConfig,
  limits: ResourceLimits = {},
  language: Language = 'python',
): string {
  const flags = [`-f ${Math.floor(config.maxFileSizeBytes / 512)}`];
  if (config.maxProcesses !== undefined) {
    flags.push(`-u ${config.maxProcesses}`);
  }
  if (limits.memoryMb !== undefined && language !== 'node') {
    flags.push(`-v ${Math.floor(limits.memoryMb * 1024)}`);
  }
  if (limits.cpuSeconds !== undefined) {
    flags.push(`-t ${Math.ceil(limits.cpuSeconds)}`);
  }
  return `ulimit ${flags.join(' ')}`;
}

/** Interpreter invocation, with node's heap capped to the memory limit */
export function interpreterCommand(language: Language, limits: ResourceLimits = {}): string {
  if (language === 'node' && limits.memoryMb !== undefined) {
    return `${INTERPRETERS.node} --max-old-space-size=${Math.floor(limits.memoryMb)}`;
  }
  return INTERPRETERS[language];
}

export class SubprocessSandbox implements ExecutionSandbox {
  private readonly language: Language;
  private readonly explicitConfig?: SandboxConfig;

  constructor(options: SubprocessSandboxOptions) {
    this.language = options.language;
    this.explicitConfig = options.config;
  }

  private get config(): SandboxConfig {
    return this.explicitConfig ?? getConfig();
  }

  async execute(code: string, options: ExecuteOptions): Promise<ExecutionResult> {
    const config = this.config;
    const executionId = generateExecutionId();
    const workingDir = join(config.sandboxDir, executionId);
    const scriptFile = SCRIPT_FILES[this.language];

    if (options.signal?.aborted) {
      return infraResult('execution cancelled before start');
    }

    try {
      await mkdir(workingDir, { recursive: true });
      await writeFile(join(workingDir, scriptFile), code, 'utf-8');
    } catch (err) {
      logger.error('Failed to prepare sandbox workspace', { workingDir, error: err });
      await this.cleanup(config, workingDir);
      return infraResult(`workspace setup failed: ${errorMessage(err)}`);
    }

    const result = await this.spawnScript(config, workingDir, scriptFile, options);
    await this.cleanup(config, workingDir);

    await logExecution(config, {
      type: 'execution',
      timestamp: new Date().toISOString(),
      execution_id: executionId,
      language: this.language,
      code,
      stdout: result.stdout,
      stderr: result.stderr,
      exit_status: result.exitStatus,
      timed_out: result.timedOut,
      infra_error: result.infraError ?? null,
      duration_ms: result.durationMs,
      timeout_ms: options.timeoutMs,
      sandbox_mode: 'subprocess',
      working_dir: workingDir,
    });

    logger.debug('Execution finished', {
      executionId,
      exitStatus: result.exitStatus,
      timedOut: result.timedOut,
      durationMs: result.durationMs,
    });

    return result;
  }

  private spawnScript(
    config: SandboxConfig,
    workingDir: string,
    scriptFile: string,
    options: ExecuteOptions,
  ): Promise<ExecutionResult> {
    const limits = buildUlimitPrefix(config, options.limits, this.language);
    const command = `${limits} && exec ${interpreterCommand(this.language, options.limits)} ${scriptFile}`;
    const startTime = Date.now();

    return new Promise<ExecutionResult>((resolve) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let timedOut = false;
      let cancelled = false;
      let settled = false;
      let killTimer: ReturnType<typeof setTimeout> | null = null;

      const child = spawn('bash', ['-c', command], {
        cwd: workingDir,
        env: getStrippedEnv(),
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true,
      });

      child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

      const killGroup = (signal: NodeJS.Signals): void => {
        if (child.pid === undefined) return;
        try {
          process.kill(-child.pid, signal);
        } catch (err) {
          // ESRCH: the group already exited
          logger.debug(`kill ${signal} skipped`, err);
        }
      };

      const terminate = (): void => {
        killGroup('SIGTERM');
        killTimer = setTimeout(() => killGroup('SIGKILL'), config.killGraceMs);
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, options.timeoutMs);

      const onAbort = (): void => {
        cancelled = true;
        terminate();
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (result: ExecutionResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      // Spawn errors (e.g. bash not found)
      child.on('error', (err) => {
        finish(infraResult(`failed to start interpreter: ${err.message}`, Date.now() - startTime));
      });

      child.on('close', (code) => {
        const durationMs = Date.now() - startTime;
        const truncConfig = {
          maxChars: config.maxOutputChars,
          head: config.truncationHead,
          tail: config.truncationTail,
        };
        const rawStderr = Buffer.concat(stderrChunks).toString('utf-8');
        const stdout = truncateOutput(Buffer.concat(stdoutChunks).toString('utf-8'), truncConfig);
        const stderr = truncateOutput(rawStderr, truncConfig);

        const result: ExecutionResult = {
          stdout: stdout.text,
          stderr: stderr.text,
          exitStatus: code,
          durationMs,
          timedOut,
          truncated: stdout.truncated || stderr.truncated,
        };

        // Uncaught errors always exit non-zero; a clean exit may still log
        // handled exceptions to stderr. Trace is taken from the untruncated
        // stderr so its tail survives.
        const trace = timedOut || code === 0 ? undefined : extractTrace(this.language, rawStderr);
        if (trace) result.trace = truncateTail(trace, config.maxOutputChars).text;

        if (cancelled && !timedOut) {
          result.infraError = 'execution cancelled';
        } else if (code === 127 && MISSING_INTERPRETER.test(rawStderr)) {
          result.infraError = `interpreter not available: ${INTERPRETERS[this.language]}`;
        }

        finish(result);
      });
    });
  }

  private async cleanup(config: SandboxConfig, workingDir: string): Promise<void> {
    if (config.keepWorkspaces) return;
    try {
      await rm(workingDir, { recursive: true, force: true });
    } catch (err) {
      logger.warn('Failed to remove sandbox workspace', { workingDir, error: err });
    }
  }
}

function infraResult(reason: string, durationMs = 0): ExecutionResult {
  return {
    stdout: '',
    stderr: '',
    exitStatus: null,
    durationMs,
    timedOut: false,
    infraError: reason,
    truncated: false,
  };
}
