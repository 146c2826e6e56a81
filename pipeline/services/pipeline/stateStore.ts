import { readFile } from "node:fs/promises";
import { z } from "zod";

import { StateStoreError, type ErrorDescription, type PipelineErrorCode } from "../errors";
import { isMissingFileError, writeFileAtomic } from "../../utils/files";

export type PipelineRecordStatus = "persisted" | "failed";

export interface PipelineRecord {
  url: string;
  status: PipelineRecordStatus;
  outputPath: string | null;
  error: ErrorDescription | null;
  updatedAt: string;
}

export interface PipelineState {
  processedUrls: Set<string>;
  failedUrls: Map<string, ErrorDescription>;
}

/**
 * Durable per-URL outcome. A URL recorded as persisted is skipped by later
 * runs; failed and unrecorded URLs are attempted again.
 */
export interface PipelineStateStore {
  get(url: string): Promise<PipelineRecord | null>;
  markPersisted(url: string, outputPath: string): Promise<void>;
  markFailed(url: string, error: ErrorDescription): Promise<void>;
  snapshot(): Promise<PipelineState>;
  close(): Promise<void>;
}

export const toPipelineState = (records: Iterable<PipelineRecord>): PipelineState => {
  const state: PipelineState = { processedUrls: new Set(), failedUrls: new Map() };
  for (const record of records) {
    if (record.status === "persisted") {
      state.processedUrls.add(record.url);
    } else if (record.error) {
      state.failedUrls.set(record.url, record.error);
    }
  }
  return state;
};

const ERROR_CODES = [
  "fetch_failed",
  "malformed_document",
  "oracle_unavailable",
  "oracle_rejected",
  "malformed_oracle_output",
  "dangling_placeholder",
  "unresolved_zone",
  "incomplete_translation",
  "invalid_transition",
  "cancelled",
  "retry_exhausted",
  "state_store_failed",
  "unexpected",
] as const satisfies readonly PipelineErrorCode[];

export const errorDescriptionSchema = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
});

const recordSchema = z.object({
  url: z.string().url(),
  status: z.enum(["persisted", "failed"]),
  outputPath: z.string().nullable(),
  error: errorDescriptionSchema.nullable(),
  updatedAt: z.string(),
});

const stateFileSchema = z.object({
  version: z.literal(1),
  records: z.array(recordSchema),
});

/** JSON file store; every change rewrites the file atomically. */
export class FilePipelineStateStore implements PipelineStateStore {
  private loading: Promise<Map<string, PipelineRecord>> | null = null;
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async get(url: string): Promise<PipelineRecord | null> {
    const records = await this.load();
    return records.get(url) ?? null;
  }

  markPersisted(url: string, outputPath: string): Promise<void> {
    return this.update({
      url,
      status: "persisted",
      outputPath,
      error: null,
      updatedAt: this.now().toISOString(),
    });
  }

  markFailed(url: string, error: ErrorDescription): Promise<void> {
    return this.update({
      url,
      status: "failed",
      outputPath: null,
      error,
      updatedAt: this.now().toISOString(),
    });
  }

  async snapshot(): Promise<PipelineState> {
    const records = await this.load();
    return toPipelineState(records.values());
  }

  async close(): Promise<void> {
    await this.writes;
  }

  private load(): Promise<Map<string, PipelineRecord>> {
    if (!this.loading) {
      this.loading = this.readRecords();
    }
    return this.loading;
  }

  private async readRecords(): Promise<Map<string, PipelineRecord>> {
    let contents: string;
    try {
      contents = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
      return new Map();
    }
    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      throw new StateStoreError(`Pipeline state file ${this.filePath} is invalid: not JSON`, error);
    }
    const parsed = stateFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StateStoreError(
        `Pipeline state file ${this.filePath} is invalid: ${parsed.error.issues[0]?.message ?? "unknown"}`,
      );
    }
    return new Map(parsed.data.records.map((record) => [record.url, record]));
  }

  private update(record: PipelineRecord): Promise<void> {
    const next = this.writes.then(async () => {
      const records = await this.load();
      records.set(record.url, record);
      await this.flush(records);
    });
    // Later writes still run after a failed one; the failure reaches the
    // caller through `next`.
    this.writes = next.catch(() => undefined);
    return next;
  }

  private async flush(records: Map<string, PipelineRecord>): Promise<void> {
    const payload = {
      version: 1,
      records: Array.from(records.values()).sort((a, b) => a.url.localeCompare(b.url)),
    };
    await writeFileAtomic(this.filePath, `${JSON.stringify(payload, null, 2)}\n`);
  }
}

/** Volatile store for tests and dry runs. */
export class MemoryPipelineStateStore implements PipelineStateStore {
  readonly records = new Map<string, PipelineRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async get(url: string): Promise<PipelineRecord | null> {
    return this.records.get(url) ?? null;
  }

  async markPersisted(url: string, outputPath: string): Promise<void> {
    this.records.set(url, {
      url,
      status: "persisted",
      outputPath,
      error: null,
      updatedAt: this.now().toISOString(),
    });
  }

  async markFailed(url: string, error: ErrorDescription): Promise<void> {
    this.records.set(url, {
      url,
      status: "failed",
      outputPath: null,
      error,
      updatedAt: this.now().toISOString(),
    });
  }

  async snapshot(): Promise<PipelineState> {
    return toPipelineState(this.records.values());
  }

  async close(): Promise<void> {}
}
