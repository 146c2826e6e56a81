import { Schema, model } from "mongoose";

const PipelineRecordSchema = new Schema(
  {
    url: { type: String, required: true, unique: true },
    status: {
      type: String,
      enum: ["persisted", "failed"],
      required: true,
    },
    output_path: { type: String, default: null },
    error_code: { type: String, default: null },
    error_message: { type: String, default: null },
  },
  {
    collection: "pipeline_records",
    timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
  },
);

export default model("PipelineRecord", PipelineRecordSchema);
