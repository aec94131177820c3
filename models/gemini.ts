import { GoogleGenAI } from "@google/genai";
import type { GenerateContentConfig, GenerateContentResponse } from "@google/genai";
import type { ModelAdapter, ModelConfig, ModelResponse } from "./index";
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from "../config";
import { isTransientError, sleep } from "./retry";

const DEFAULT_MODEL = "gemini-2.5-flash";
const MAX_RETRIES = 5;
const BASE_DELAY_MS = 1000;
const REQUEST_TIMEOUT_MS = 120_000;

export class GeminiAdapter implements ModelAdapter {
  name: string;
  displayName: string;
  private defaultModel: string;

  constructor(name = DEFAULT_MODEL, displayName = "Gemini 2.5 Flash", defaultModel = DEFAULT_MODEL) {
    this.name = name;
    this.displayName = displayName;
    this.defaultModel = defaultModel;
  }

  async callModel(prompt: string, config: ModelConfig): Promise<ModelResponse> {
    const apiKey = process.env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new Error(
        "GEMINI_API_KEY not set. Provide it via env var or .env."
      );
    }

    const modelName = config.model || this.defaultModel;
    const client = new GoogleGenAI({ apiKey });

    // Gemini has no separate system slot in this call, so prepend it
    const fullPrompt = config.systemPrompt
      ? `${config.systemPrompt}\n\n${prompt}`
      : prompt;

    let lastError: Error | null = null;

    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      try {
        const start = performance.now();
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

        const generationConfig: GenerateContentConfig = {
          temperature: config.temperature ?? DEFAULT_TEMPERATURE,
          maxOutputTokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
          abortSignal: controller.signal,
        };

        let response: GenerateContentResponse;
        try {
          response = await client.models.generateContent({
            model: modelName,
            contents: fullPrompt,
            config: generationConfig,
          });
        } finally {
          clearTimeout(timeout);
        }
        const latency_ms = Math.round(performance.now() - start);

        // Extract text from response
        let text = response.text ?? "";
        if (!text && response.candidates) {
          for (const candidate of response.candidates) {
            for (const part of candidate.content?.parts ?? []) {
              if (part.text) {
                text += part.text;
              }
            }
          }
        }

        const usage = response.usageMetadata;

        return {
          raw_response: text || null,
          latency_ms,
          model: modelName,
          tokens_used: usage?.totalTokenCount ?? undefined,
          finish_reason: response.candidates?.[0]?.finishReason ?? undefined,
        };
      } catch (err: unknown) {
        lastError = err instanceof Error ? err : new Error(String(err));

        // Rate limit errors: throw immediately, let the caller decide
        if (!isTransientError(lastError)) {
          throw lastError;
        }

        if (attempt < MAX_RETRIES - 1) {
          const delay = BASE_DELAY_MS * Math.pow(2, attempt);
          const jitter = Math.random() * delay * 0.1;
          console.warn(
            `[gemini] Transient error: ${lastError.message} — retrying in ${Math.round(delay + jitter)}ms (attempt ${attempt + 1}/${MAX_RETRIES})`
          );
          await sleep(delay + jitter);
        }
      }
    }

    throw lastError ?? new Error("Gemini API call failed after retries");
  }
}
