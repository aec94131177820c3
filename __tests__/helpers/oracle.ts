import { vi } from "vitest";
import type { ModelAdapter, ModelConfig, ModelResponse } from "../../models/index";

export type Reply = string | null | Error;

export function response(text: string | null): ModelResponse {
  return { raw_response: text, latency_ms: 1, model: "fake-model", finish_reason: "stop" };
}

/** An in-process oracle answering with `replies` in order, then failing. */
export function fakeOracle(...replies: Reply[]) {
  const queue = [...replies];
  const callModel = vi.fn(async (_prompt: string, _config: ModelConfig): Promise<ModelResponse> => {
    const next = queue.shift();
    if (next === undefined) throw new Error("fake oracle has no more replies");
    if (next instanceof Error) throw next;
    return response(next);
  });
  const oracle: ModelAdapter = { name: "fake-model", displayName: "Fake", callModel };
  return { oracle, callModel };
}

export const MODEL_CONFIG: ModelConfig = { model: "fake-model", temperature: 0 };

export function jsonBlock(rules: string[]): string {
  return "```json\n" + JSON.stringify(rules) + "\n```";
}
