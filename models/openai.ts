import OpenAI from "openai";
import type { ModelAdapter, ModelConfig, ModelResponse } from "./index";
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from "../config";
import { isTransientError, sleep } from "./retry";

const MAX_RETRIES = 5;
const BASE_DELAY_MS = 1000;
const REQUEST_TIMEOUT_MS = 120_000;

// Display names for well-known models
const DISPLAY_NAMES: Record<string, string> = {
  "gpt-4o": "GPT-4o",
  "gpt-4o-mini": "GPT-4o Mini",
  "gpt-4.1": "GPT-4.1",
  "gpt-4.1-mini": "GPT-4.1 Mini",
  "o3-mini": "o3-mini",
};

export class OpenAIAdapter implements ModelAdapter {
  name: string;
  displayName: string;

  constructor(modelId: string) {
    this.name = modelId;
    this.displayName = DISPLAY_NAMES[modelId] ?? modelId;
  }

  async callModel(prompt: string, config: ModelConfig): Promise<ModelResponse> {
    const apiKey = process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error(
        "OPENAI_API_KEY not set. Provide it via env var or .env."
      );
    }

    const modelName = config.model || this.name;
    const client = new OpenAI({
      apiKey,
      baseURL: process.env.OPENAI_BASE_URL || undefined,
      timeout: REQUEST_TIMEOUT_MS,
      maxRetries: 0, // retries are handled below
    });

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = config.systemPrompt
      ? [
          { role: "system", content: config.systemPrompt },
          { role: "user", content: prompt },
        ]
      : [{ role: "user", content: prompt }];

    let lastError: Error | null = null;

    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      try {
        const start = performance.now();
        const completion = await client.chat.completions.create({
          model: modelName,
          temperature: config.temperature ?? DEFAULT_TEMPERATURE,
          max_tokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
          messages,
        });
        const latency_ms = Math.round(performance.now() - start);

        const choice = completion.choices[0];
        const raw_response = choice?.message?.content ?? null;
        if (raw_response === null) {
          console.warn(
            `[openai] WARNING: API returned null content (finish_reason=${choice?.finish_reason}, model=${modelName}).`
          );
        }

        const usage = completion.usage;
        return {
          raw_response,
          latency_ms,
          model: modelName,
          tokens_used: usage ? usage.prompt_tokens + usage.completion_tokens : undefined,
          finish_reason: choice?.finish_reason ?? undefined,
        };
      } catch (err: unknown) {
        lastError = err instanceof Error ? err : new Error(String(err));

        // Rate limits and request errors go straight back to the caller
        if (!isTransientError(lastError)) {
          throw lastError;
        }

        if (attempt < MAX_RETRIES - 1) {
          const delay = BASE_DELAY_MS * Math.pow(2, attempt);
          const jitter = Math.random() * delay * 0.1;
          console.warn(
            `[openai] Transient error: ${lastError.message} — retrying in ${Math.round(delay + jitter)}ms (attempt ${attempt + 1}/${MAX_RETRIES})`
          );
          await sleep(delay + jitter);
        }
      }
    }

    throw lastError ?? new Error("OpenAI API call failed after retries");
  }
}
