import type OpenAI from "openai";
import { APIConnectionError, APIError, APIUserAbortError } from "openai";
import type { ResponseCreateParamsNonStreaming } from "openai/resources/responses/responses";
import { z } from "zod";

import {
  CancelledError,
  isPipelineError,
  MalformedOracleOutputError,
  OracleRejectedError,
  OracleUnavailableError,
  type PipelineError,
} from "../errors";
import type { Logger } from "../logger";
import { throwIfCancelled } from "../pipeline/retry";
import { buildSystemPrompt, buildUserPrompt } from "./promptBuilder";
import type {
  TranslationOracle,
  TranslationRequest,
  TranslationResult,
} from "./oracle";

/** The slice of a Responses API payload the adapter reads. */
export interface OracleResponse {
  status?: string | null;
  incomplete_details?: { reason?: string | null } | null;
  output_text?: string | null;
  output?: ReadonlyArray<{
    type: string;
    content?: ReadonlyArray<{ type: string; refusal?: string }>;
  }>;
}

export type CreateResponse = (body: ResponseCreateParamsNonStreaming) => Promise<OracleResponse>;

export type ReasoningEffort = "low" | "medium" | "high";

export interface OpenAIOracleOptions {
  createResponse: CreateResponse;
  model: string;
  maxOutputTokens: number;
  reasoningEffort?: ReasoningEffort;
  logger?: Logger;
}

const translationResponseSchema = z.object({
  translation: z.string(),
});

const TRANSLATION_JSON_SCHEMA = {
  type: "object",
  properties: {
    translation: { type: "string" },
  },
  required: ["translation"],
  additionalProperties: false,
};

const TRANSIENT_STATUS = new Set([408, 409, 429]);

export const toOracleError = (error: unknown): PipelineError => {
  if (isPipelineError(error)) {
    return error;
  }
  if (error instanceof APIUserAbortError) {
    return new CancelledError("Oracle request aborted");
  }
  if (error instanceof APIConnectionError) {
    return new OracleUnavailableError(`Oracle connection failed: ${error.message}`, error);
  }
  if (error instanceof APIError) {
    const status = error.status;
    if (status === undefined || TRANSIENT_STATUS.has(status) || status >= 500) {
      return new OracleUnavailableError(
        `Oracle unavailable (${status ?? "no status"}): ${error.message}`,
        error,
      );
    }
    return new OracleRejectedError(`Oracle rejected request (${status}): ${error.message}`, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new OracleUnavailableError(`Oracle call failed: ${message}`, error);
};

const findRefusal = (response: OracleResponse): string | null => {
  for (const item of response.output ?? []) {
    for (const part of item.content ?? []) {
      if (part.type === "refusal") {
        return part.refusal ?? "refused";
      }
    }
  }
  return null;
};

const stripCodeFence = (text: string): string =>
  text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");

export const parseOracleResponse = (response: OracleResponse): string => {
  if (response.status === "incomplete") {
    const reason = response.incomplete_details?.reason ?? "unknown";
    if (reason === "content_filter") {
      throw new OracleRejectedError("Oracle output stopped by content filter");
    }
    throw new MalformedOracleOutputError(`Oracle output truncated (${reason})`);
  }
  if (response.status === "failed") {
    throw new OracleUnavailableError("Oracle reported a failed response");
  }

  const refusal = findRefusal(response);
  if (refusal) {
    throw new OracleRejectedError(`Oracle refused to translate: ${refusal}`);
  }

  const text = response.output_text?.trim();
  if (!text) {
    throw new MalformedOracleOutputError("Oracle returned an empty response");
  }

  let payload: unknown;
  try {
    payload = JSON.parse(stripCodeFence(text));
  } catch (error) {
    throw new MalformedOracleOutputError("Oracle response is not valid JSON", error);
  }
  const parsed = translationResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedOracleOutputError(
      `Oracle response has unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
    );
  }
  if (!parsed.data.translation.trim()) {
    throw new MalformedOracleOutputError("Oracle returned an empty translation");
  }
  return parsed.data.translation;
};

export class OpenAIOracle implements TranslationOracle {
  constructor(private readonly options: OpenAIOracleOptions) {}

  static fromClient(
    client: OpenAI,
    options: Omit<OpenAIOracleOptions, "createResponse">,
  ): OpenAIOracle {
    return new OpenAIOracle({
      ...options,
      createResponse: (body) => client.responses.create(body),
    });
  }

  buildRequest(request: TranslationRequest): ResponseCreateParamsNonStreaming {
    const { model, maxOutputTokens, reasoningEffort } = this.options;
    return {
      model,
      max_output_tokens: maxOutputTokens,
      ...(reasoningEffort ? { reasoning: { effort: reasoningEffort } } : {}),
      text: {
        format: {
          type: "json_schema",
          name: "chunk_translation",
          schema: TRANSLATION_JSON_SCHEMA,
          strict: true,
        },
      },
      input: [
        {
          role: "system",
          content: [{ type: "input_text", text: buildSystemPrompt(request) }],
        },
        {
          role: "user",
          content: [{ type: "input_text", text: buildUserPrompt(request) }],
        },
      ],
    };
  }

  async translate(request: TranslationRequest): Promise<TranslationResult> {
    // A call already in flight is allowed to finish.
    throwIfCancelled(request.signal);
    const startedAt = Date.now();
    let response: OracleResponse;
    try {
      response = await this.options.createResponse(this.buildRequest(request));
    } catch (error) {
      throw toOracleError(error);
    }

    const translatedText = parseOracleResponse(response);
    this.options.logger?.debug(
      {
        model: this.options.model,
        chars: request.chunkText.length,
        durationMs: Date.now() - startedAt,
      },
      "oracle call completed",
    );
    return { translatedText };
  }
}
