import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { NotFoundError, ParseError, UpstreamError, ValidationError } from "../src/runtime/errors.js";
import { LruCache } from "../src/store/lru.js";
import { AlphaFoldProvider, RcsbProvider } from "../src/store/providers.js";
import { StructureStore } from "../src/store/structureStore.js";
import { fakeHttp, type FakeRoute } from "./helpers/fakeHttp.js";

const pdbText = readFileSync(fileURLToPath(new URL("./fixtures/mini.pdb", import.meta.url)), "utf8");

const RCSB = "https://files.test/download";
const AF = "https://alphafold.test/api";

function createStore(routes: Record<string, FakeRoute>, maxEntries = 8) {
  const { http, calls } = fakeHttp(routes);
  const store = new StructureStore({
    providers: [new RcsbProvider(http, RCSB), new AlphaFoldProvider(http, AF)],
    maxEntries
  });
  return { store, calls };
}

describe("LruCache", () => {
  it("evicts the least recently used entry", () => {
    const evicted: string[] = [];
    const cache = new LruCache<number>({ maxEntries: 2, onEvict: (key) => evicted.push(key) });
    cache.set("a", 1);
    cache.set("b", 2);
    cache.get("a");
    cache.set("c", 3);
    expect(cache.keys()).toEqual(["a", "c"]);
    expect(evicted).toEqual(["b"]);
  });

  it("enforces the weight budget and skips entries heavier than it", () => {
    const cache = new LruCache<number>({ maxEntries: 10, maxWeight: 10, weigh: (v) => v });
    cache.set("a", 4);
    cache.set("b", 5);
    cache.set("c", 3);
    expect(cache.keys()).toEqual(["b", "c"]);
    expect(cache.weight).toBe(8);
    cache.set("huge", 11);
    expect(cache.has("huge")).toBe(false);
  });
});

describe("StructureStore", () => {
  it("fetches, parses and caches experimental structures", async () => {
    const { store, calls } = createStore({ [`${RCSB}/1ABC.pdb`]: { data: pdbText } });
    const first = await store.get(" 1abc ");
    const second = await store.get("1ABC", "experimental");
    expect(first.id).toBe("1ABC");
    expect(first.atomCount).toBe(25);
    expect(second).toBe(first);
    expect(calls).toEqual([`${RCSB}/1ABC.pdb`]);
    expect(store.stats()).toMatchObject({ entries: 1, atoms: 25, hits: 1, misses: 1 });
  });

  it("shares one upstream fetch between concurrent requests", async () => {
    const { store, calls } = createStore({ [`${RCSB}/1ABC.pdb`]: { data: pdbText, delayMs: 20 } });
    const results = await Promise.all([store.get("1ABC"), store.get("1abc"), store.get("1ABC")]);
    expect(calls).toHaveLength(1);
    expect(results[1]).toBe(results[0]);
    expect(results[2]).toBe(results[0]);
  });

  it("reports a missing accession as NotFoundError and caches nothing", async () => {
    const { store, calls } = createStore({});
    await expect(store.get("9ZZZ")).rejects.toThrow(NotFoundError);
    expect(store.peek("9ZZZ")).toBeUndefined();
    expect(store.stats().entries).toBe(0);
    await expect(store.get("9ZZZ")).rejects.toThrow(NotFoundError);
    expect(calls).toHaveLength(2);
  });

  it("maps server errors and transport failures to UpstreamError", async () => {
    const { store } = createStore({
      [`${RCSB}/5XXX.pdb`]: { status: 503, data: "busy" },
      [`${RCSB}/6XXX.pdb`]: { data: "", networkError: true }
    });
    await expect(store.get("5XXX")).rejects.toThrow(UpstreamError);
    await expect(store.get("6XXX")).rejects.toMatchObject({ code: "UPSTREAM", retryable: true });
  });

  it("does not cache unparseable downloads", async () => {
    const { store } = createStore({ [`${RCSB}/7XXX.pdb`]: { data: "<html>maintenance</html>" } });
    await expect(store.get("7XXX")).rejects.toThrow(ParseError);
    expect(store.stats().entries).toBe(0);
  });

  it("validates accessions before any request", async () => {
    const { store, calls } = createStore({});
    await expect(store.get("not-an-id")).rejects.toThrow(ValidationError);
    await expect(store.get("AB", "predicted")).rejects.toThrow(ValidationError);
    expect(calls).toEqual([]);
  });

  it("resolves predicted models through the AlphaFold API", async () => {
    const modelUrl = "https://alphafold.test/files/AF-P12345-F1-model_v4.pdb";
    const { store, calls } = createStore({
      [`${AF}/prediction/P12345`]: {
        data: [{ entryId: "AF-P12345-F1", gene: "ABC1", organismScientificName: "Homo sapiens", pdbUrl: modelUrl, globalMetricValue: 91.2 }]
      },
      [modelUrl]: { data: pdbText }
    });
    const s = await store.get("p12345", "predicted");
    expect(s.id).toBe("P12345");
    expect(s.source).toBe("predicted");
    expect(s.metadata).toMatchObject({ method: "PREDICTED (AlphaFold)", modelId: "AF-P12345-F1", gene: "ABC1", confidence: 91.2 });
    expect(calls).toEqual([`${AF}/prediction/P12345`, modelUrl]);
  });

  it("treats an empty AlphaFold answer as not found", async () => {
    const { store } = createStore({ [`${AF}/prediction/Q99999`]: { data: [] } });
    await expect(store.get("Q99999", "predicted")).rejects.toThrow(NotFoundError);
  });

  it("evicts least recently used structures", async () => {
    const { store } = createStore(
      {
        [`${RCSB}/1AAA.pdb`]: { data: pdbText },
        [`${RCSB}/2BBB.pdb`]: { data: pdbText },
        [`${RCSB}/3CCC.pdb`]: { data: pdbText }
      },
      2
    );
    await store.get("1AAA");
    await store.get("2BBB");
    await store.get("1AAA");
    await store.get("3CCC");
    expect(store.peek("1AAA")).toBeDefined();
    expect(store.peek("2BBB")).toBeUndefined();
    expect(store.evict("3CCC")).toBe(true);
  });
});
