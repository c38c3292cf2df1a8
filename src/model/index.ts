import type { ModelSpec } from "../config.js";
import { AnthropicModelClient } from "./anthropic.js";
import type { ModelClient } from "./types.js";

export function createModelClient(spec: ModelSpec): ModelClient {
  switch (spec.provider) {
    case "anthropic":
      return new AnthropicModelClient(spec.model);
  }
}

export type { ModelClient, ModelTurnRequest } from "./types.js";
