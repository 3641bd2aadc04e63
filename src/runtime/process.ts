import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { CancelledError, ProcessSpawnError, ProcessTimeoutError } from "./errors.js";
import { createLogger } from "./logger.js";
import { ABORTED, TIMED_OUT, raceTimeout } from "./timers.js";

const log = createLogger("process");

export interface ProcessSpec {
  command: string;
  args: readonly string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started at all. */
  error?: Error;
}

/** The slice of a child process the core relies on. */
export interface ManagedProcess {
  readonly pid: number | undefined;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Settles once, when the process is gone; never rejects. */
  readonly exited: Promise<ProcessExit>;
  readonly hasExited: boolean;
  kill(signal?: NodeJS.Signals): void;
}

export type ProcessLauncher = (spec: ProcessSpec) => ManagedProcess;

export const spawnProcess: ProcessLauncher = (spec) => {
  const child = spawn(spec.command, [...spec.args], {
    cwd: spec.cwd,
    env: spec.env ?? process.env,
    stdio: ["pipe", "pipe", "pipe"]
  });
  let hasExited = false;
  const exited = new Promise<ProcessExit>((resolve) => {
    child.once("error", (error) => {
      hasExited = true;
      resolve({ code: null, signal: null, error });
    });
    child.once("close", (code, signal) => {
      hasExited = true;
      resolve({ code, signal });
    });
  });
  // Writes racing an exit surface as EPIPE here; the exit itself is reported through `exited`.
  child.stdin.on("error", (err) => log.debug({ pid: child.pid, err }, "stdin closed"));
  return {
    pid: child.pid,
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    exited,
    get hasExited() {
      return hasExited;
    },
    kill: (signal: NodeJS.Signals = "SIGTERM") => {
      if (!hasExited) child.kill(signal);
    }
  };
};

/** SIGTERM, then SIGKILL once `graceMs` elapses without an exit. */
export async function terminate(proc: ManagedProcess, graceMs: number): Promise<ProcessExit> {
  if (!proc.hasExited) {
    proc.kill("SIGTERM");
    const outcome = await raceTimeout(proc.exited, graceMs);
    if (outcome === TIMED_OUT) {
      log.warn({ pid: proc.pid, graceMs }, "process ignored SIGTERM, sending SIGKILL");
      proc.kill("SIGKILL");
    }
  }
  return proc.exited;
}

/** Scoped acquisition: the process is terminated however `fn` settles. */
export async function withProcess<T>(
  launcher: ProcessLauncher,
  spec: ProcessSpec,
  graceMs: number,
  fn: (proc: ManagedProcess) => Promise<T>
): Promise<T> {
  const proc = launcher(spec);
  try {
    return await fn(proc);
  } finally {
    await terminate(proc, graceMs);
  }
}

export interface BoundedRunOptions {
  timeoutMs: number;
  graceMs: number;
  signal?: AbortSignal;
  /** Bytes kept per output stream; older output is dropped first. */
  maxOutputBytes?: number;
}

export interface BoundedRunResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * Runs a process to completion with closed stdin, capturing its output.
 * Throws ProcessTimeoutError or CancelledError after the process is gone, and
 * ProcessSpawnError when it never started. Exit codes are reported, not judged.
 */
export async function runBounded(
  launcher: ProcessLauncher,
  spec: ProcessSpec,
  options: BoundedRunOptions
): Promise<BoundedRunResult> {
  const started = Date.now();
  const limit = options.maxOutputBytes ?? 1 << 20;
  return withProcess(launcher, spec, options.graceMs, async (proc) => {
    const stdout = collect(proc.stdout, limit);
    const stderr = collect(proc.stderr, limit);
    proc.stdin.end();
    const outcome = await raceTimeout(proc.exited, options.timeoutMs, options.signal);
    if (outcome === TIMED_OUT) {
      throw new ProcessTimeoutError(`${spec.command} exceeded ${options.timeoutMs} ms`, {
        details: { command: spec.command, timeoutMs: options.timeoutMs, stderr: stderr.text() }
      });
    }
    if (outcome === ABORTED) {
      throw new CancelledError(`${spec.command} cancelled`, { cause: options.signal?.reason });
    }
    if (outcome.error) {
      throw new ProcessSpawnError(`failed to start ${spec.command}: ${outcome.error.message}`, {
        cause: outcome.error,
        details: { command: spec.command }
      });
    }
    return { code: outcome.code, signal: outcome.signal, stdout: stdout.text(), stderr: stderr.text(), durationMs: Date.now() - started };
  });
}

interface Collected {
  text(): string;
}

function collect(stream: Readable, limit: number): Collected {
  const chunks: Buffer[] = [];
  let size = 0;
  stream.on("data", (chunk: Buffer | string) => {
    const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    chunks.push(buf);
    size += buf.length;
    while (size > limit && chunks.length > 1) {
      const dropped = chunks.shift();
      size -= dropped ? dropped.length : 0;
    }
  });
  return { text: () => Buffer.concat(chunks).toString("utf8") };
}
