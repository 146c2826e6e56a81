import { OpenAI } from "openai";

export interface OpenAIClientOptions {
  apiKey?: string;
  baseURL?: string;
  timeoutMs?: number;
}

let cachedClient: OpenAI | null = null;

export const getOpenAIClient = (options: OpenAIClientOptions = {}): OpenAI => {
  if (cachedClient) {
    return cachedClient;
  }

  const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY is not configured");
  }

  // Retries belong to the pipeline's backoff policy.
  cachedClient = new OpenAI({
    apiKey,
    baseURL: options.baseURL,
    maxRetries: 0,
    timeout: options.timeoutMs ?? 600_000,
  });

  return cachedClient;
};

export const resetOpenAIClientForTests = () => {
  if (process.env.NODE_ENV === "test") {
    cachedClient = null;
  }
};
