import { readFile, rm, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { createInterface } from "node:readline";
import { v4 as uuidv4 } from "uuid";
import { RenderError, SessionStartError, ValidationError, errorMessage } from "../runtime/errors.js";
import { createLogger, type Logger } from "../runtime/logger.js";
import { terminate, type ManagedProcess, type ProcessExit, type ProcessLauncher } from "../runtime/process.js";
import { SerialQueue } from "../runtime/queue.js";
import { createScratchDir, removeScratchDir } from "../runtime/scratch.js";
import { ABORTED, TIMED_OUT, raceTimeout } from "../runtime/timers.js";
import { chimeraxDialect, type Axis, type RenderDialect, type Representation } from "./commands.js";

export type SessionState = "uninitialized" | "starting" | "ready" | "busy" | "closing" | "closed";

/** What the viewer currently shows. Reset whenever the process is replaced. */
export interface ViewState {
  readonly structureId: string | null;
  readonly representation: Representation;
  readonly transparency: number;
  readonly rotation: Readonly<Record<Axis, number>>;
  readonly highlighted: readonly string[];
  readonly mutations: readonly string[];
  readonly pose: { readonly jobId: string; readonly rank: number } | null;
}

export const INITIAL_VIEW: ViewState = Object.freeze({
  structureId: null,
  representation: "cartoon",
  transparency: 0,
  rotation: Object.freeze({ x: 0, y: 0, z: 0 }),
  highlighted: [],
  mutations: [],
  pose: null
});

export interface SnapshotOptions {
  width?: number;
  height?: number;
  transparent?: boolean;
}

/** Handed to tasks running inside the session queue; valid only for the task's duration. */
export interface SessionContext {
  readonly key: string;
  readonly workDir: string;
  readonly view: ViewState;
  /** Runs a script and resolves with its output lines. */
  command(script: string): Promise<string[]>;
  /** Writes a file into the session directory and returns its path. */
  stageFile(name: string, contents: string): Promise<string>;
  snapshot(options?: SnapshotOptions): Promise<Buffer>;
  updateView(patch: Partial<ViewState>): ViewState;
}

export interface RenderSessionOptions {
  key: string;
  launcher: ProcessLauncher;
  command: string;
  args: readonly string[];
  scratchRoot: string;
  readyTimeoutMs: number;
  commandTimeoutMs: number;
  shutdownGraceMs: number;
  dialect?: RenderDialect;
  /** Called before each spawn; throws to refuse the open (capacity). */
  admit?: (session: RenderSession) => void;
  now?: () => number;
}

interface Waiter {
  token: string;
  lines: string[];
  resolve: () => void;
}

/**
 * One render subprocess behind a FIFO queue. The state machine is
 * uninitialized → starting → ready ⇄ busy → closing → closed, and a closed
 * session reopens on the next queued task unless it was disposed.
 */
export class RenderSession {
  readonly key: string;
  private readonly options: RenderSessionOptions;
  private readonly dialect: RenderDialect;
  private readonly queue = new SerialQueue();
  private readonly log: Logger;
  private readonly now: () => number;
  private _state: SessionState = "uninitialized";
  private proc: ManagedProcess | null = null;
  private workDir: string | null = null;
  private waiter: Waiter | null = null;
  private stderrTail: string[] = [];
  private shuttingDown: Promise<void> | null = null;
  private disposed = false;
  private tokenCounter = 0;
  private snapshotCounter = 0;
  private _view: ViewState = INITIAL_VIEW;
  private _lastActivity: number;

  constructor(options: RenderSessionOptions) {
    this.key = options.key;
    this.options = options;
    this.dialect = options.dialect ?? chimeraxDialect;
    this.now = options.now ?? Date.now;
    this._lastActivity = this.now();
    this.log = createLogger("render", { session: options.key });
  }

  get state(): SessionState {
    return this._state;
  }

  get view(): ViewState {
    return this._view;
  }

  get lastActivity(): number {
    return this._lastActivity;
  }

  /** Tasks queued or running. */
  get pending(): number {
    return this.queue.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** True while a process is being started, is running, or is being shut down. */
  get holdsProcess(): boolean {
    return this._state === "starting" || this._state === "ready" || this._state === "busy" || this._state === "closing";
  }

  /** Queues `task`; the session is (re)opened first when needed. */
  run<T>(task: (ctx: SessionContext) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      await this.ensureOpen();
      this._lastActivity = this.now();
      try {
        return await task(this.context());
      } finally {
        this._lastActivity = this.now();
      }
    });
  }

  execute(script: string): Promise<string[]> {
    return this.run((ctx) => ctx.command(script));
  }

  snapshot(options: SnapshotOptions = {}): Promise<Buffer> {
    return this.run((ctx) => ctx.snapshot(options));
  }

  /** Starts the process unless it is already up. Not queued; `run` calls it from inside the queue. */
  async open(): Promise<void> {
    if (this.disposed) throw new RenderError(`session '${this.key}' is closed`, false);
    if (this._state === "ready" || this._state === "busy") return;
    if (this.shuttingDown) await this.shuttingDown;
    this.options.admit?.(this);

    this._state = "starting";
    const started = this.now();
    let dir: string | null = null;
    let proc: ManagedProcess | null = null;
    try {
      dir = await createScratchDir(this.options.scratchRoot, "render-");
      this.workDir = dir;
      proc = this.options.launcher({ command: this.options.command, args: this.options.args, cwd: dir });
      this.proc = proc;
      this.attach(proc);
      const token = this.nextToken("ready");
      const outcome = await this.send(proc, this.dialect.echo(token), token, this.options.readyTimeoutMs);
      if (outcome.kind === "exited") {
        const reason = outcome.exit.error ? errorMessage(outcome.exit.error) : `exit code ${outcome.exit.code ?? outcome.exit.signal}`;
        throw new SessionStartError(`render process failed to start: ${reason}`, {
          cause: outcome.exit.error,
          details: { session: this.key, stderr: this.stderrTail.join("\n") }
        });
      }
      if (outcome.kind === "timeout") {
        throw new SessionStartError(`render process not ready after ${this.options.readyTimeoutMs} ms`, { details: { session: this.key } });
      }
    } catch (err) {
      if (proc) await terminate(proc, this.options.shutdownGraceMs);
      if (dir) await this.removeDir(dir);
      this.reset();
      if (err instanceof SessionStartError) throw err;
      throw new SessionStartError(`render session failed to start: ${errorMessage(err)}`, { cause: err, details: { session: this.key } });
    }
    if (this._state !== "starting") {
      throw new SessionStartError(`session '${this.key}' was closed while starting`, { details: { session: this.key } });
    }
    this._state = "ready";
    this._view = INITIAL_VIEW;
    this.log.info({ pid: proc.pid, ms: this.now() - started }, "render session ready");
  }

  /** Shuts the process down from any state. Always ends `closed`; a command in flight fails. */
  close(): Promise<void> {
    if (!this.shuttingDown) {
      this.shuttingDown = this.shutdown().finally(() => {
        this.shuttingDown = null;
      });
    }
    return this.shuttingDown;
  }

  /** Closes for good: queued and later tasks fail instead of reopening. */
  async dispose(): Promise<void> {
    this.disposed = true;
    await this.close();
  }

  /**
   * Closes the session through its queue when it has been idle for
   * `idleMs`. Resolves true when this call closed it.
   */
  closeIfIdle(idleMs: number, now: number = this.now()): Promise<boolean> {
    if (!this.isIdle(idleMs, now)) return Promise.resolve(false);
    return this.queue.run(async () => {
      if (this._state !== "ready" || now - this._lastActivity < idleMs) return false;
      this.log.info({ idleMs: now - this._lastActivity }, "closing idle render session");
      await this.close();
      return true;
    });
  }

  isIdle(idleMs: number, now: number = this.now()): boolean {
    return this._state === "ready" && this.queue.size === 0 && now - this._lastActivity >= idleMs;
  }

  private async ensureOpen(): Promise<void> {
    if (this.disposed) throw new RenderError(`session '${this.key}' is closed`, false);
    if (this._state === "ready" && this.proc?.hasExited) {
      this.log.warn({ pid: this.proc.pid }, "render process exited while idle, reopening");
      await this.close();
    }
    if (this._state !== "ready") await this.open();
  }

  private context(): SessionContext {
    const workDir = this.workDir;
    if (!workDir) throw new RenderError(`session '${this.key}' has no working directory`, false);
    const currentView = (): ViewState => this._view;
    return {
      key: this.key,
      workDir,
      get view() {
        return currentView();
      },
      command: (script) => this.command(script),
      stageFile: async (name, contents) => {
        if (basename(name) !== name) throw new ValidationError(`invalid staged file name '${name}'`);
        const path = join(workDir, name);
        await writeFile(path, contents, "utf8");
        return path;
      },
      snapshot: (options) => this.capture(workDir, options),
      updateView: (patch) => {
        this._view = Object.freeze({ ...this._view, ...patch });
        return this._view;
      }
    };
  }

  private async command(script: string): Promise<string[]> {
    const proc = this.proc;
    if (!proc || this._state !== "ready") {
      throw new RenderError(`session '${this.key}' is not ready (${this._state})`, false);
    }
    const lines = script
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    const token = this.nextToken("done");
    this._state = "busy";
    const started = this.now();
    const outcome = await this.send(proc, [...lines, this.dialect.echo(token)].join("\n"), token, this.options.commandTimeoutMs);

    if (outcome.kind !== "token") {
      const exit = outcome.kind === "exited" ? outcome.exit : null;
      const message = exit
        ? `render process exited during command (${exit.code ?? exit.signal ?? "unknown"})`
        : `render command timed out after ${this.options.commandTimeoutMs} ms`;
      this.log.warn({ commands: lines.length, stderr: this.stderrTail.slice(-5) }, message);
      await this.close();
      throw new RenderError(message, false, { details: { session: this.key, commands: lines } });
    }

    if (this._state !== "busy") {
      throw new RenderError(`session '${this.key}' was closed during the command`, false, { details: { session: this.key } });
    }
    this._state = "ready";
    const errors = outcome.lines.filter((line) => this.dialect.isError(line));
    this.log.debug({ commands: lines.length, ms: this.now() - started, errors: errors.length }, "render command finished");
    if (errors.length > 0) {
      throw new RenderError(errors.join("\n"), true, { details: { session: this.key, commands: lines } });
    }
    return outcome.lines;
  }

  private async capture(workDir: string, options: SnapshotOptions = {}): Promise<Buffer> {
    const width = options.width ?? 1024;
    const height = options.height ?? 768;
    for (const [name, value] of [["width", width], ["height", height]] as const) {
      if (!Number.isInteger(value) || value < 16 || value > 4096) {
        throw new ValidationError(`${name} must be an integer between 16 and 4096`, { details: { [name]: value } });
      }
    }
    const path = join(workDir, `snapshot-${++this.snapshotCounter}.png`);
    try {
      await this.command(this.dialect.saveImage(path, width, height, options.transparent ?? false));
      let bytes: Buffer;
      try {
        bytes = await readFile(path);
      } catch (err) {
        throw new RenderError(`snapshot was not written: ${errorMessage(err)}`, true, { cause: err, details: { path } });
      }
      if (bytes.length === 0) throw new RenderError("snapshot file is empty", true, { details: { path } });
      return bytes;
    } finally {
      if (this.workDir === workDir) await rm(path, { force: true });
    }
  }

  private attach(proc: ManagedProcess): void {
    this.stderrTail = [];
    createInterface({ input: proc.stdout, crlfDelay: Infinity }).on("line", (line) => this.onLine(line));
    createInterface({ input: proc.stderr, crlfDelay: Infinity }).on("line", (line) => {
      this.stderrTail.push(line);
      if (this.stderrTail.length > 50) this.stderrTail.shift();
      this.onLine(line);
    });
  }

  private onLine(line: string): void {
    const waiter = this.waiter;
    if (!waiter) return;
    if (line.trim() === waiter.token) {
      this.waiter = null;
      waiter.resolve();
    } else {
      waiter.lines.push(line);
    }
  }

  private async send(
    proc: ManagedProcess,
    text: string,
    token: string,
    timeoutMs: number
  ): Promise<{ kind: "token"; lines: string[] } | { kind: "exited"; exit: ProcessExit } | { kind: "timeout" }> {
    const lines: string[] = [];
    const echoed = new Promise<void>((resolve) => {
      this.waiter = { token, lines, resolve };
    });
    try {
      if (!proc.hasExited && proc.stdin.writable) proc.stdin.write(`${text}\n`);
      const outcome = await raceTimeout(
        Promise.race([echoed.then(() => "token" as const), proc.exited.then((exit) => exit)]),
        timeoutMs
      );
      if (outcome === TIMED_OUT || outcome === ABORTED) return { kind: "timeout" };
      if (outcome === "token") return { kind: "token", lines };
      return { kind: "exited", exit: outcome };
    } finally {
      if (this.waiter?.token === token) this.waiter = null;
    }
  }

  private async shutdown(): Promise<void> {
    const proc = this.proc;
    const dir = this.workDir;
    if (!proc && !dir) {
      if (this._state !== "uninitialized") this._state = "closed";
      return;
    }
    this._state = "closing";
    if (proc && !proc.hasExited) {
      if (proc.stdin.writable) proc.stdin.write(`${this.dialect.quit}\n`);
      const outcome = await raceTimeout(proc.exited, this.options.shutdownGraceMs);
      if (outcome === TIMED_OUT) await terminate(proc, this.options.shutdownGraceMs);
    }
    if (dir) await this.removeDir(dir);
    this.reset();
    this.log.info({ pid: proc?.pid }, "render session closed");
  }

  private reset(): void {
    this.proc = null;
    this.workDir = null;
    this.waiter = null;
    this._view = INITIAL_VIEW;
    this._state = "closed";
  }

  private async removeDir(dir: string): Promise<void> {
    try {
      await removeScratchDir(dir);
    } catch (err) {
      this.log.warn({ dir, err }, "failed to remove render scratch directory");
    }
  }

  private nextToken(kind: string): string {
    return `__${kind}_${uuidv4().replace(/-/g, "")}_${++this.tokenCounter}__`;
  }
}
