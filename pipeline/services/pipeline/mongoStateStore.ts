import { z } from "zod";

import { disconnectMongo } from "../../db/mongo";
import PipelineRecordModel from "../../models/PipelineRecord";
import type { ErrorDescription } from "../errors";
import {
  errorDescriptionSchema,
  toPipelineState,
  type PipelineRecord,
  type PipelineState,
  type PipelineStateStore,
} from "./stateStore";

const storedRecordSchema = z.object({
  url: z.string(),
  status: z.enum(["persisted", "failed"]),
  output_path: z.string().nullish(),
  error_code: errorDescriptionSchema.shape.code.nullish(),
  error_message: z.string().nullish(),
  updated_at: z.date().nullish(),
});

export const fromStoredRecord = (raw: unknown): PipelineRecord => {
  const doc = storedRecordSchema.parse(raw);
  return {
    url: doc.url,
    status: doc.status,
    outputPath: doc.output_path ?? null,
    error: doc.error_code
      ? { code: doc.error_code, message: doc.error_message ?? "" }
      : null,
    updatedAt: (doc.updated_at ?? new Date(0)).toISOString(),
  };
};

/** State kept in the `pipeline_records` collection, one document per URL. */
export class MongoPipelineStateStore implements PipelineStateStore {
  async get(url: string): Promise<PipelineRecord | null> {
    const doc = await PipelineRecordModel.findOne({ url }).lean().exec();
    return doc ? fromStoredRecord(doc) : null;
  }

  async markPersisted(url: string, outputPath: string): Promise<void> {
    await PipelineRecordModel.updateOne(
      { url },
      {
        $set: {
          status: "persisted",
          output_path: outputPath,
          error_code: null,
          error_message: null,
        },
      },
      { upsert: true },
    ).exec();
  }

  async markFailed(url: string, error: ErrorDescription): Promise<void> {
    await PipelineRecordModel.updateOne(
      { url },
      {
        $set: {
          status: "failed",
          output_path: null,
          error_code: error.code,
          error_message: error.message,
        },
      },
      { upsert: true },
    ).exec();
  }

  async snapshot(): Promise<PipelineState> {
    const docs = await PipelineRecordModel.find({}).lean().exec();
    return toPipelineState(docs.map(fromStoredRecord));
  }

  async close(): Promise<void> {
    await disconnectMongo();
  }
}
