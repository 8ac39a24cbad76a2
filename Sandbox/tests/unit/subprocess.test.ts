/**
 * Unit tests for the subprocess sandbox.
 *
 * Runs real node and bash processes in a temp sandbox dir.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm, mkdir, readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { SubprocessSandbox, buildUlimitPrefix, interpreterCommand } from '../../src/executor/subprocess.js';
import { getConfig, parseSandboxConfig, resetConfig } from '../../src/config.js';
import { executionLogPath } from '../../src/logging/writer.js';

let testSandboxDir: string;
let testLogDir: string;

beforeEach(async () => {
  const id = randomUUID().slice(0, 8);
  testSandboxDir = join(tmpdir(), `mender-test-sandbox-${id}`);
  testLogDir = join(tmpdir(), `mender-test-logs-${id}`);
  await mkdir(testSandboxDir, { recursive: true });

  // Set env before config is read
  process.env.MENDER_SANDBOX_DIR = testSandboxDir;
  process.env.MENDER_SANDBOX_LOG_DIR = testLogDir;
  process.env.MENDER_SANDBOX_KILL_GRACE_MS = '500';
  delete process.env.MENDER_SANDBOX_MAX_OUTPUT_CHARS;
  delete process.env.MENDER_SANDBOX_TRUNCATION_HEAD;
  delete process.env.MENDER_SANDBOX_TRUNCATION_TAIL;

  resetConfig();
});

afterEach(async () => {
  await rm(testSandboxDir, { recursive: true, force: true });
  await rm(testLogDir, { recursive: true, force: true });
});

describe('SubprocessSandbox', () => {
  it('should execute Node.js and capture stdout', async () => {
    const sandbox = new SubprocessSandbox({ language: 'node' });
    const result = await sandbox.execute('console.log("hello from node")', { timeoutMs: 10_000 });

    expect(result.stdout).toBe('hello from node\n');
    expect(result.stderr).toBe('');
    expect(result.exitStatus).toBe(0);
    expect(result.timedOut).toBe(false);
    expect(result.infraError).toBeUndefined();
    expect(result.trace).toBeUndefined();
  });

  it('should execute Bash and capture stdout', async () => {
    const sandbox = new SubprocessSandbox({ language: 'bash' });
    const result = await sandbox.execute('echo "hello from bash"', { timeoutMs: 10_000 });

    expect(result.stdout.trim()).toBe('hello from bash');
    expect(result.exitStatus).toBe(0);
  });

  it('should report a non-zero exit status with stderr', async () => {
    const sandbox = new SubprocessSandbox({ language: 'bash' });
    const result = await sandbox.execute('echo "bad input" >&2\nexit 3', { timeoutMs: 10_000 });

    expect(result.exitStatus).toBe(3);
    expect(result.stderr).toBe('bad input\n');
    expect(result.trace).toBeUndefined();
  });

  it('should capture the trace of an uncaught Node error', async () => {
    const sandbox = new SubprocessSandbox({ language: 'node' });
    const result = await sandbox.execute('throw new TypeError("boom")', { timeoutMs: 10_000 });

    expect(result.exitStatus).toBe(1);
    expect(result.trace).toMatch(/^TypeError: boom/);
    expect(result.trace).not.toContain('Node.js v');
  });

  it('should not report a trace when the program exits cleanly after logging an error', async () => {
    const sandbox = new SubprocessSandbox({ language: 'node' });
    const result = await sandbox.execute('console.error("Error: config missing, using defaults");\nconsole.log(42);', {
      timeoutMs: 10_000,
    });

    expect(result.exitStatus).toBe(0);
    expect(result.stdout).toBe('42\n');
    expect(result.stderr).toBe('Error: config missing, using defaults\n');
    expect(result.trace).toBeUndefined();
  });

  it('should run Node under a memory limit', async () => {
    const sandbox = new SubprocessSandbox({ language: 'node' });
    const result = await sandbox.execute('console.log(42)', { timeoutMs: 10_000, limits: { memoryMb: 256 } });

    expect(result.exitStatus).toBe(0);
    expect(result.stdout).toBe('42\n');
    expect(result.infraError).toBeUndefined();
  });

  it('should stop a Node program that outgrows its memory limit', async () => {
    const sandbox = new SubprocessSandbox({ language: 'node' });
    const result = await sandbox.execute(
      'const hoard = [];\nwhile (true) hoard.push(new Array(1_000_000).fill(hoard.length));',
      { timeoutMs: 15_000, limits: { memoryMb: 64 } },
    );

    expect(result.timedOut).toBe(false);
    expect(result.exitStatus).not.toBe(0);
    expect(result.stderr).toContain('heap out of memory');
  });

  it('should time out a long-running attempt instead of hanging', async () => {
    const sandbox = new SubprocessSandbox({ language: 'node' });
    const result = await sandbox.execute('setTimeout(() => console.log("late"), 5000)', { timeoutMs: 1_000 });

    expect(result.timedOut).toBe(true);
    expect(result.stdout).toBe('');
    expect(result.durationMs).toBeGreaterThanOrEqual(900);
    expect(result.durationMs).toBeLessThan(4_000);
  });

  it('should kill grandchildren on timeout', async () => {
    const sandbox = new SubprocessSandbox({ language: 'bash' });
    const result = await sandbox.execute('sleep 5 &\nwait', { timeoutMs: 800 });

    expect(result.timedOut).toBe(true);
    expect(result.durationMs).toBeLessThan(4_000);
  });

  it('should cancel an in-flight run when the signal aborts', async () => {
    const sandbox = new SubprocessSandbox({ language: 'node' });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 300);

    const result = await sandbox.execute('setTimeout(() => {}, 5000)', {
      timeoutMs: 10_000,
      signal: controller.signal,
    });

    expect(result.timedOut).toBe(false);
    expect(result.infraError).toBe('execution cancelled');
  });

  it('should not start when the signal is already aborted', async () => {
    const sandbox = new SubprocessSandbox({ language: 'node' });
    const controller = new AbortController();
    controller.abort();

    const result = await sandbox.execute('console.log(1)', { timeoutMs: 1_000, signal: controller.signal });

    expect(result.infraError).toBe('execution cancelled before start');
    expect(result.exitStatus).toBeNull();
  });

  it('should truncate large output', async () => {
    process.env.MENDER_SANDBOX_MAX_OUTPUT_CHARS = '200';
    process.env.MENDER_SANDBOX_TRUNCATION_HEAD = '80';
    process.env.MENDER_SANDBOX_TRUNCATION_TAIL = '80';
    resetConfig();

    const sandbox = new SubprocessSandbox({ language: 'node' });
    const result = await sandbox.execute('process.stdout.write("x".repeat(5000))', { timeoutMs: 10_000 });

    expect(result.truncated).toBe(true);
    expect(result.stdout).toBe(`${'x'.repeat(80)}\n\n[... truncated 4840 characters ...]\n\n${'x'.repeat(80)}`);
  });

  it('should strip API keys from the environment', async () => {
    process.env.OPENAI_API_KEY = 'test-secret';

    const sandbox = new SubprocessSandbox({ language: 'node' });
    const result = await sandbox.execute('console.log(process.env.OPENAI_API_KEY ?? "NOT_FOUND")', {
      timeoutMs: 10_000,
    });

    expect(result.stdout.trim()).toBe('NOT_FOUND');
    delete process.env.OPENAI_API_KEY;
  });

  it('should isolate attempts in fresh directories and remove them afterwards', async () => {
    const sandbox = new SubprocessSandbox({ language: 'bash' });

    const first = await sandbox.execute('echo leftover > state.txt', { timeoutMs: 10_000 });
    const second = await sandbox.execute('cat state.txt 2>/dev/null || echo missing', { timeoutMs: 10_000 });

    expect(first.exitStatus).toBe(0);
    expect(second.stdout.trim()).toBe('missing');
    expect(await readdir(testSandboxDir)).toEqual([]);
  });

  it('should append one execution log entry per run', async () => {
    const sandbox = new SubprocessSandbox({ language: 'bash' });
    await sandbox.execute('echo logged', { timeoutMs: 10_000 });

    const content = await readFile(executionLogPath(testLogDir), 'utf-8');
    const lines = content.trim().split('\n');
    expect(lines).toHaveLength(1);

    const entry = JSON.parse(lines[0]);
    expect(entry.type).toBe('execution');
    expect(entry.language).toBe('bash');
    expect(entry.stdout).toBe('logged\n');
    expect(entry.exit_status).toBe(0);
    expect(entry.execution_id).toMatch(/^exec_[0-9a-f]{12}$/);
  });

  it('should report a missing interpreter as an infra error', async () => {
    const config = { ...getConfig(), logExecutions: false };
    const sandbox = new SubprocessSandbox({ language: 'python', config });
    const savedPath = process.env.PATH;
    // Only the directory holding bash itself stays reachable
    process.env.PATH = '/bin';

    try {
      const result = await sandbox.execute('print(1)', { timeoutMs: 10_000 });
      if (result.exitStatus === 0) {
        // python3 lives in /bin on this host
        expect(result.stdout).toBe('1\n');
      } else {
        expect(result.infraError).toMatch(/^(interpreter not available: python3|failed to start interpreter)/);
      }
    } finally {
      process.env.PATH = savedPath;
    }
  });
});

describe('buildUlimitPrefix', () => {
  const config = parseSandboxConfig({ sandboxDir: '/tmp/sb', logDir: '/tmp/logs', maxFileSizeBytes: 1024 });

  it('always limits file size', () => {
    expect(buildUlimitPrefix(config)).toBe('ulimit -f 2');
  });

  it('adds memory, CPU and process limits when given', () => {
    const withProcs = { ...config, maxProcesses: 32 };
    expect(buildUlimitPrefix(withProcs, { memoryMb: 256, cpuSeconds: 1.5 })).toBe(
      'ulimit -f 2 -u 32 -v 262144 -t 2',
    );
  });
});

describe('memory limits per language', () => {
  const config = parseSandboxConfig({ sandboxDir: '/tmp/sb', logDir: '/tmp/logs', maxFileSizeBytes: 1024 });

  it('caps the node heap instead of its address space', () => {
    expect(buildUlimitPrefix(config, { memoryMb: 256 }, 'node')).toBe('ulimit -f 2');
    expect(interpreterCommand('node', { memoryMb: 256 })).toBe('node --max-old-space-size=256');
  });

  it('keeps the address-space limit for python and bash', () => {
    expect(buildUlimitPrefix(config, { memoryMb: 256 }, 'bash')).toBe('ulimit -f 2 -v 262144');
    expect(interpreterCommand('python', { memoryMb: 256 })).toBe('python3');
    expect(interpreterCommand('node')).toBe('node');
  });
});
