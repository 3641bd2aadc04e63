import { tmpdir } from "node:os";
import { z } from "zod";
import { ValidationError } from "./errors.js";

const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

// Whitespace-separated argument list, e.g. "--nogui --exit --silent"
const argList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((s) => s.split(/\s+/).filter((part) => part.length > 0));

const EnvSchema = z.object({
  LOG_LEVEL: LogLevel.default("info"),

  RCSB_DOWNLOAD_URL: z.string().url().default("https://files.rcsb.org/download"),
  ALPHAFOLD_API_URL: z.string().url().default("https://alphafold.ebi.ac.uk/api"),
  HTTP_TIMEOUT_MS: positiveInt(30_000),
  STRUCTURE_CACHE_ENTRIES: positiveInt(32),
  STRUCTURE_CACHE_ATOMS: positiveInt(2_000_000),

  POCKET_PARALLELISM: z.coerce.number().int().min(1).max(64).optional(),

  RENDER_BIN: z.string().min(1).default("chimerax"),
  RENDER_ARGS: argList("--nogui --offscreen --silent"),
  RENDER_READY_TIMEOUT_MS: positiveInt(60_000),
  RENDER_COMMAND_TIMEOUT_MS: positiveInt(120_000),
  RENDER_IDLE_TIMEOUT_MS: positiveInt(15 * 60_000),
  RENDER_REAP_INTERVAL_MS: positiveInt(60_000),
  RENDER_SHUTDOWN_GRACE_MS: positiveInt(5_000),
  RENDER_MAX_SESSIONS: positiveInt(4),

  VINA_BIN: z.string().min(1).default("vina"),
  OBABEL_BIN: z.string().min(1).default("obabel"),
  DOCKING_TIMEOUT_MS: positiveInt(300_000),
  DOCKING_PREP_TIMEOUT_MS: positiveInt(60_000),
  DOCKING_MAX_CONCURRENT: positiveInt(2),
  DOCKING_EXHAUSTIVENESS: positiveInt(8),
  DOCKING_SEED: z.coerce.number().int().default(42),
  DOCKING_SHUTDOWN_GRACE_MS: positiveInt(2_000),

  SCRATCH_DIR: z.string().min(1).default(tmpdir())
});

export type LogLevel = z.infer<typeof LogLevel>;

export interface HttpConfig {
  readonly rcsbDownloadUrl: string;
  readonly alphafoldApiUrl: string;
  readonly timeoutMs: number;
}

export interface CacheConfig {
  readonly maxEntries: number;
  readonly maxAtoms: number;
}

export interface RenderConfig {
  readonly bin: string;
  readonly args: readonly string[];
  readonly readyTimeoutMs: number;
  readonly commandTimeoutMs: number;
  readonly idleTimeoutMs: number;
  readonly reapIntervalMs: number;
  readonly shutdownGraceMs: number;
  readonly maxSessions: number;
}

export interface DockingConfig {
  readonly vinaBin: string;
  readonly obabelBin: string;
  readonly timeoutMs: number;
  readonly prepTimeoutMs: number;
  readonly maxConcurrent: number;
  readonly exhaustiveness: number;
  readonly seed: number;
  readonly shutdownGraceMs: number;
}

export interface AppConfig {
  readonly logLevel: LogLevel;
  readonly http: HttpConfig;
  readonly cache: CacheConfig;
  readonly pocketParallelism: number | undefined;
  readonly render: RenderConfig;
  readonly docking: DockingConfig;
  readonly scratchDir: string;
}

/**
 * Reads configuration from environment variables. Unset variables take their
 * defaults; malformed ones fail with a ValidationError naming every offender.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`invalid configuration: ${issues.join("; ")}`, { details: { issues } });
  }
  const e = parsed.data;
  return Object.freeze({
    logLevel: e.LOG_LEVEL,
    http: Object.freeze({ rcsbDownloadUrl: stripSlash(e.RCSB_DOWNLOAD_URL), alphafoldApiUrl: stripSlash(e.ALPHAFOLD_API_URL), timeoutMs: e.HTTP_TIMEOUT_MS }),
    cache: Object.freeze({ maxEntries: e.STRUCTURE_CACHE_ENTRIES, maxAtoms: e.STRUCTURE_CACHE_ATOMS }),
    pocketParallelism: e.POCKET_PARALLELISM,
    render: Object.freeze({
      bin: e.RENDER_BIN,
      args: Object.freeze(e.RENDER_ARGS),
      readyTimeoutMs: e.RENDER_READY_TIMEOUT_MS,
      commandTimeoutMs: e.RENDER_COMMAND_TIMEOUT_MS,
      idleTimeoutMs: e.RENDER_IDLE_TIMEOUT_MS,
      reapIntervalMs: e.RENDER_REAP_INTERVAL_MS,
      shutdownGraceMs: e.RENDER_SHUTDOWN_GRACE_MS,
      maxSessions: e.RENDER_MAX_SESSIONS
    }),
    docking: Object.freeze({
      vinaBin: e.VINA_BIN,
      obabelBin: e.OBABEL_BIN,
      timeoutMs: e.DOCKING_TIMEOUT_MS,
      prepTimeoutMs: e.DOCKING_PREP_TIMEOUT_MS,
      maxConcurrent: e.DOCKING_MAX_CONCURRENT,
      exhaustiveness: e.DOCKING_EXHAUSTIVENESS,
      seed: e.DOCKING_SEED,
      shutdownGraceMs: e.DOCKING_SHUTDOWN_GRACE_MS
    }),
    scratchDir: e.SCRATCH_DIR
  });
}

function stripSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}
