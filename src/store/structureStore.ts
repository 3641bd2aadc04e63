import type { Structure, StructureSource } from "../types/structure.js";
import { ValidationError } from "../runtime/errors.js";
import { createLogger, type Logger } from "../runtime/logger.js";
import { parsePdb } from "../pdb/parse.js";
import { LruCache } from "./lru.js";
import type { StructureProvider } from "./providers.js";

export interface StructureStoreOptions {
  providers: readonly StructureProvider[];
  maxEntries?: number;
  /** Total atoms kept across cached structures. */
  maxAtoms?: number;
  logger?: Logger;
}

export interface StoreStats {
  entries: number;
  atoms: number;
  inflight: number;
  hits: number;
  misses: number;
}

/**
 * Process-wide structure cache keyed by (source, accession). Concurrent
 * requests for the same uncached key share one upstream fetch; failures are
 * never cached.
 */
export class StructureStore {
  private readonly providers = new Map<StructureSource, StructureProvider>();
  private readonly cache: LruCache<Structure>;
  private readonly inflight = new Map<string, Promise<Structure>>();
  private readonly log: Logger;
  private hits = 0;
  private misses = 0;

  constructor(options: StructureStoreOptions) {
    for (const p of options.providers) this.providers.set(p.source, p);
    this.log = options.logger ?? createLogger("structure-store");
    this.cache = new LruCache<Structure>({
      maxEntries: options.maxEntries ?? 32,
      maxWeight: options.maxAtoms,
      weigh: (s) => s.atomCount,
      onEvict: (key) => this.log.debug({ key }, "evicted structure")
    });
  }

  static key(source: StructureSource, accession: string): string {
    return `${source}:${accession}`;
  }

  async get(accession: string, source: StructureSource = "experimental"): Promise<Structure> {
    const provider = this.provider(source);
    const id = provider.normalize(accession);
    const key = StructureStore.key(source, id);

    const cached = this.cache.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }
    const pending = this.inflight.get(key);
    if (pending) return pending;

    this.misses++;
    const load = this.load(provider, id, key).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, load);
    return load;
  }

  peek(accession: string, source: StructureSource = "experimental"): Structure | undefined {
    const id = this.provider(source).normalize(accession);
    return this.cache.get(StructureStore.key(source, id));
  }

  evict(accession: string, source: StructureSource = "experimental"): boolean {
    const id = this.provider(source).normalize(accession);
    return this.cache.delete(StructureStore.key(source, id));
  }

  stats(): StoreStats {
    return { entries: this.cache.size, atoms: this.cache.weight, inflight: this.inflight.size, hits: this.hits, misses: this.misses };
  }

  private async load(provider: StructureProvider, id: string, key: string): Promise<Structure> {
    const started = Date.now();
    const download = await provider.fetch(id);
    const structure = parsePdb(download.text, { id, source: provider.source, metadata: download.metadata });
    this.cache.set(key, structure);
    this.log.info(
      { key, atoms: structure.atomCount, chains: structure.chains.length, ms: Date.now() - started },
      "structure loaded"
    );
    return structure;
  }

  private provider(source: StructureSource): StructureProvider {
    const provider = this.providers.get(source);
    if (!provider) throw new ValidationError(`no provider configured for ${source} structures`);
    return provider;
  }
}
