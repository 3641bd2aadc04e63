import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";
import type { StructureMetadata, StructureSource } from "../types/structure.js";
import type { HttpConfig } from "../runtime/config.js";
import { NotFoundError, UpstreamError, ValidationError, errorMessage } from "../runtime/errors.js";
import { createLogger } from "../runtime/logger.js";

const log = createLogger("providers");

/** Raw coordinate text plus whatever metadata the upstream API returned. */
export interface StructureDownload {
  accession: string;
  source: StructureSource;
  text: string;
  metadata: Omit<StructureMetadata, "warnings">;
}

export interface StructureProvider {
  readonly source: StructureSource;
  readonly name: string;
  /** Trims and upper-cases; throws ValidationError for malformed accessions. */
  normalize(accession: string): string;
  fetch(accession: string): Promise<StructureDownload>;
}

export function createHttpClient(config: Pick<HttpConfig, "timeoutMs">): AxiosInstance {
  return axios.create({
    timeout: config.timeoutMs,
    maxRedirects: 5,
    // Status codes are mapped to domain errors by the providers
    validateStatus: () => true,
    headers: { "User-Agent": "pocketdock/0.1" }
  });
}

async function getOrThrow<T>(http: AxiosInstance, url: string, what: string, responseType: "text" | "json"): Promise<AxiosResponse<T>> {
  let response: AxiosResponse<T>;
  try {
    response = await http.get<T>(url, { responseType });
  } catch (err) {
    throw new UpstreamError(`request for ${what} failed: ${errorMessage(err)}`, {
      cause: err,
      details: { url, timeout: axios.isAxiosError(err) && err.code === "ECONNABORTED" }
    });
  }
  if (response.status === 404) throw new NotFoundError(`${what} not found`, { details: { url } });
  if (response.status < 200 || response.status >= 300) {
    throw new UpstreamError(`${what}: upstream answered ${response.status}`, { details: { url, status: response.status } });
  }
  return response;
}

export class RcsbProvider implements StructureProvider {
  readonly source = "experimental" as const;
  readonly name = "RCSB PDB";

  constructor(
    private readonly http: AxiosInstance,
    private readonly baseUrl = "https://files.rcsb.org/download"
  ) {}

  normalize(accession: string): string {
    const id = accession.trim().toUpperCase();
    if (!/^[0-9A-Z]{4}$/.test(id)) throw new ValidationError(`PDB ID must be 4 alphanumeric characters, got '${accession}'`);
    return id;
  }

  async fetch(accession: string): Promise<StructureDownload> {
    const id = this.normalize(accession);
    const url = `${this.baseUrl}/${id}.pdb`;
    log.debug({ accession: id, url }, "downloading experimental structure");
    const response = await getOrThrow<string>(this.http, url, `PDB entry ${id}`, "text");
    return { accession: id, source: this.source, text: String(response.data), metadata: {} };
  }
}

const AlphaFoldEntry = z
  .object({
    entryId: z.string().optional(),
    gene: z.string().optional(),
    organismScientificName: z.string().optional(),
    pdbUrl: z.string().url().optional(),
    cifUrl: z.string().url().optional(),
    globalMetricValue: z.number().optional()
  })
  .passthrough();

const AlphaFoldResponse = z.union([z.array(AlphaFoldEntry), AlphaFoldEntry]);

export class AlphaFoldProvider implements StructureProvider {
  readonly source = "predicted" as const;
  readonly name = "AlphaFold DB";

  constructor(
    private readonly http: AxiosInstance,
    private readonly apiUrl = "https://alphafold.ebi.ac.uk/api"
  ) {}

  normalize(accession: string): string {
    const id = accession.trim().toUpperCase();
    if (!/^[0-9A-Z]{6,10}$/.test(id)) throw new ValidationError(`UniProt accession expected, got '${accession}'`);
    return id;
  }

  async fetch(accession: string): Promise<StructureDownload> {
    const id = this.normalize(accession);
    const what = `AlphaFold prediction for ${id}`;
    const response = await getOrThrow<unknown>(this.http, `${this.apiUrl}/prediction/${id}`, what, "json");
    const parsed = AlphaFoldResponse.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamError(`${what}: unexpected API response`, { details: { issues: parsed.error.issues.slice(0, 5) } });
    }
    const entry = Array.isArray(parsed.data) ? parsed.data[0] : parsed.data;
    if (!entry) throw new NotFoundError(`${what} not found`);
    if (!entry.pdbUrl) throw new NotFoundError(`${what} has no PDB-format model`, { details: { modelId: entry.entryId } });

    log.debug({ accession: id, url: entry.pdbUrl }, "downloading predicted structure");
    const model = await getOrThrow<string>(this.http, entry.pdbUrl, what, "text");
    return {
      accession: id,
      source: this.source,
      text: String(model.data),
      metadata: {
        method: "PREDICTED (AlphaFold)",
        modelId: entry.entryId,
        organism: entry.organismScientificName,
        gene: entry.gene,
        confidence: entry.globalMetricValue
      }
    };
  }
}
