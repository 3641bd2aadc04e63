import { writeFileSync } from "node:fs";
import { createInterface } from "node:readline";
import { PassThrough } from "node:stream";
import type { ManagedProcess, ProcessExit, ProcessLauncher, ProcessSpec } from "../../src/runtime/process.js";

/** In-process stand-in for a child process, driven by a handler. */
export class FakeProcess implements ManagedProcess {
  private static nextPid = 1000;
  readonly pid = FakeProcess.nextPid++;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly exited: Promise<ProcessExit>;
  readonly received: string[] = [];
  readonly signals: NodeJS.Signals[] = [];
  /** When true, SIGTERM is recorded but ignored. */
  ignoreSigterm = false;
  private _hasExited = false;
  private resolveExit: (exit: ProcessExit) => void = () => undefined;

  constructor(readonly spec: ProcessSpec) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  get hasExited(): boolean {
    return this._hasExited;
  }

  /** Calls `handler` for every line written to stdin. */
  onLine(handler: (line: string) => void): void {
    createInterface({ input: this.stdin, crlfDelay: Infinity }).on("line", (line) => {
      this.received.push(line);
      handler(line);
    });
  }

  /** Calls `handler` once stdin is closed. */
  onStdinEnd(handler: () => void): void {
    this.stdin.on("end", handler);
    this.stdin.resume();
  }

  print(line: string): void {
    if (!this._hasExited) this.stdout.write(`${line}\n`);
  }

  printErr(line: string): void {
    if (!this._hasExited) this.stderr.write(`${line}\n`);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null, error?: Error): void {
    if (this._hasExited) return;
    this._hasExited = true;
    this.stdout.end();
    this.stderr.end();
    // Let readers drain before the exit is observed, as with a real pipe.
    setImmediate(() => this.resolveExit(error ? { code, signal, error } : { code, signal }));
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    this.signals.push(signal);
    if (this._hasExited) return;
    if (signal === "SIGTERM" && this.ignoreSigterm) return;
    this.exit(null, signal);
  }
}

export interface FakeLauncher {
  launcher: ProcessLauncher;
  processes: FakeProcess[];
}

export function fakeLauncher(setup: (proc: FakeProcess) => void): FakeLauncher {
  const processes: FakeProcess[] = [];
  const launcher: ProcessLauncher = (spec) => {
    const proc = new FakeProcess(spec);
    processes.push(proc);
    setup(proc);
    return proc;
  };
  return { launcher, processes };
}

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01]);

export interface FakeViewerOptions {
  /** Lines starting with this word get an error reply. */
  rejectCommand?: string;
  /** A line containing this text makes the process exit with code 1. */
  crashOn?: string;
  /** A line containing this text is swallowed and never answered. */
  hangOn?: string;
  /** Never answers the first echo. */
  neverReady?: boolean;
  /** Save commands report success but write nothing. */
  skipSave?: boolean;
}

/** A line-oriented viewer speaking the ChimeraX subset the sessions use. */
export function fakeViewer(options: FakeViewerOptions = {}): FakeLauncher {
  return fakeLauncher((proc) => {
    let echoes = 0;
    let hung = false;
    proc.onLine((line) => {
      if (hung) return;
      if (options.crashOn && line.includes(options.crashOn)) {
        proc.printErr("Segmentation fault");
        proc.exit(1);
        return;
      }
      if (options.hangOn && line.includes(options.hangOn)) {
        hung = true;
        return;
      }
      if (line === "exit") {
        proc.exit(0);
        return;
      }
      if (line.startsWith("echo ")) {
        echoes++;
        if (options.neverReady && echoes === 1) return;
        proc.print(line.slice(5));
        return;
      }
      if (options.rejectCommand && line.split(" ")[0] === options.rejectCommand) {
        proc.print(`Unknown command: ${line}`);
        return;
      }
      const save = /^save (\S+) width/.exec(line);
      if (save && !options.skipSave) writeFileSync(save[1], PNG_BYTES);
    });
  });
}
