import type { RenderConfig } from "../runtime/config.js";
import { CapacityError, ValidationError } from "../runtime/errors.js";
import { createLogger } from "../runtime/logger.js";
import { spawnProcess, type ProcessLauncher } from "../runtime/process.js";
import type { RenderDialect } from "./commands.js";
import { RenderSession, type SessionContext, type SessionState, type SnapshotOptions } from "./session.js";

const log = createLogger("render-manager");

export interface RenderManagerOptions {
  config: RenderConfig;
  scratchRoot: string;
  launcher?: ProcessLauncher;
  dialect?: RenderDialect;
  now?: () => number;
}

export interface SessionInfo {
  key: string;
  state: SessionState;
  pending: number;
  lastActivity: number;
}

/**
 * Owns the render sessions, keyed by conversation. Enforces the live-session
 * cap on every (re)open and closes idle sessions on a timer.
 */
export class RenderSessionManager {
  private readonly sessions = new Map<string, RenderSession>();
  private readonly config: RenderConfig;
  private readonly scratchRoot: string;
  private readonly launcher: ProcessLauncher;
  private readonly dialect: RenderDialect | undefined;
  private readonly now: () => number;
  private reaper: NodeJS.Timeout | null = null;
  private reaping: Promise<string[]> | null = null;

  constructor(options: RenderManagerOptions) {
    this.config = options.config;
    this.scratchRoot = options.scratchRoot;
    this.launcher = options.launcher ?? spawnProcess;
    this.dialect = options.dialect;
    this.now = options.now ?? Date.now;
  }

  /** The session for `key`, created (not opened) on first use. */
  session(key: string): RenderSession {
    if (!/^[\w.:-]{1,128}$/.test(key)) throw new ValidationError(`invalid session key '${key}'`);
    let session = this.sessions.get(key);
    if (!session) {
      session = new RenderSession({
        key,
        launcher: this.launcher,
        command: this.config.bin,
        args: this.config.args,
        scratchRoot: this.scratchRoot,
        readyTimeoutMs: this.config.readyTimeoutMs,
        commandTimeoutMs: this.config.commandTimeoutMs,
        shutdownGraceMs: this.config.shutdownGraceMs,
        dialect: this.dialect,
        admit: (s) => this.admit(s),
        now: this.now
      });
      this.sessions.set(key, session);
    }
    return session;
  }

  has(key: string): boolean {
    return this.sessions.has(key);
  }

  run<T>(key: string, task: (ctx: SessionContext) => Promise<T>): Promise<T> {
    return this.session(key).run(task);
  }

  execute(key: string, script: string): Promise<string[]> {
    return this.session(key).execute(script);
  }

  snapshot(key: string, options?: SnapshotOptions): Promise<Buffer> {
    return this.session(key).snapshot(options);
  }

  /** Sessions holding a process right now. */
  liveCount(exclude?: RenderSession): number {
    let n = 0;
    for (const s of this.sessions.values()) if (s !== exclude && s.holdsProcess) n++;
    return n;
  }

  list(): SessionInfo[] {
    return Array.from(this.sessions.values(), (s) => ({ key: s.key, state: s.state, pending: s.pending, lastActivity: s.lastActivity }));
  }

  /** Closes and forgets a session. Resolves false when there was none. */
  async closeSession(key: string): Promise<boolean> {
    const session = this.sessions.get(key);
    if (!session) return false;
    this.sessions.delete(key);
    await session.dispose();
    log.info({ session: key }, "render session closed on request");
    return true;
  }

  /**
   * One reaper pass: closes every session idle for the configured timeout
   * and forgets it. The next task for that key starts a fresh session.
   */
  reapIdle(now: number = this.now()): Promise<string[]> {
    if (!this.reaping) {
      this.reaping = this.reapPass(now).finally(() => {
        this.reaping = null;
      });
    }
    return this.reaping;
  }

  start(): void {
    if (this.reaper) return;
    this.reaper = setInterval(() => {
      this.reapIdle().catch((err: unknown) => log.error({ err }, "idle reaper failed"));
    }, this.config.reapIntervalMs);
    this.reaper.unref();
  }

  stop(): void {
    if (this.reaper) clearInterval(this.reaper);
    this.reaper = null;
  }

  async closeAll(): Promise<void> {
    this.stop();
    const sessions = Array.from(this.sessions.values());
    this.sessions.clear();
    await Promise.all(sessions.map((s) => s.dispose()));
  }

  private async reapPass(now: number): Promise<string[]> {
    const idle = Array.from(this.sessions.values()).filter((s) => s.isIdle(this.config.idleTimeoutMs, now));
    const results = await Promise.allSettled(idle.map((s) => s.closeIfIdle(this.config.idleTimeoutMs, now)));
    const closed: string[] = [];
    results.forEach((result, i) => {
      if (result.status === "fulfilled") {
        if (!result.value) return;
        const session = idle[i];
        closed.push(session.key);
        // a task queued while closing keeps the entry; it reopens from there
        if (session.state === "closed" && session.pending === 0 && this.sessions.get(session.key) === session) {
          this.sessions.delete(session.key);
        }
      } else {
        log.warn({ session: idle[i].key, err: result.reason }, "failed to close idle session");
      }
    });
    if (closed.length > 0) log.info({ sessions: closed }, "reaped idle render sessions");
    return closed;
  }

  private admit(session: RenderSession): void {
    const live = this.liveCount(session);
    if (live >= this.config.maxSessions) {
      throw new CapacityError(`render session limit reached (${this.config.maxSessions})`, {
        details: { session: session.key, live, maxSessions: this.config.maxSessions }
      });
    }
  }
}
