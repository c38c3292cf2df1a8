import fs from "node:fs";
import path from "node:path";
import { config as loadDotEnv } from "dotenv";

const localEnvPath = path.resolve(process.cwd(), ".env.local");
if (fs.existsSync(localEnvPath)) {
  loadDotEnv({ path: localEnvPath, quiet: true });
}
loadDotEnv({ quiet: true });

export type ModelProvider = "anthropic";

export type ModelSpec = {
  provider: ModelProvider;
  model: string;
};

export type PawConfig = {
  llm: ModelSpec;
  memoryLlm: ModelSpec;
  bashTimeoutSeconds: number;
  debug: boolean;
};

export const DEFAULT_LLM_URL = "anthropic:///claude-sonnet-4-5-20250929";
export const DEFAULT_MEMORY_LLM_URL = "anthropic:///claude-haiku-4-5-20251001";
export const DEFAULT_BASH_TIMEOUT_SECONDS = 120;
const MAX_BASH_TIMEOUT_SECONDS = 60 * 20;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** `<provider>:///<model>`, e.g. `anthropic:///claude-haiku-4-5-20251001`. */
export function parseModelUrl(value: string, variable = "LLM_URL"): ModelSpec {
  const match = value.trim().match(/^([a-z][a-z0-9+.-]*):\/\/([^/]*)\/([^?#]+)$/i);
  if (!match?.[1] || match[3] === undefined) {
    throw new ConfigError(`Invalid ${variable} "${value}". Use <provider>:///<model>.`);
  }
  if (match[2]) {
    throw new ConfigError(`Invalid ${variable} "${value}": hosts are not supported, use <provider>:///<model>.`);
  }

  const provider = match[1].toLowerCase();
  if (provider !== "anthropic") {
    throw new ConfigError(`Unsupported provider "${provider}" in ${variable}. Use "anthropic".`);
  }
  const model = decodeURIComponent(match[3]).trim();
  if (!model) {
    throw new ConfigError(`Invalid ${variable} "${value}": missing model name.`);
  }
  return { provider, model };
}

export function parseBashTimeoutSeconds(value: string | undefined): number {
  const raw = (value ?? "").trim();
  if (!raw) {
    return DEFAULT_BASH_TIMEOUT_SECONDS;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_BASH_TIMEOUT_SECONDS) {
    throw new ConfigError(
      `Invalid PAW_BASH_TIMEOUT_SECONDS "${value}". Use a whole number of seconds between 1 and ${MAX_BASH_TIMEOUT_SECONDS}.`,
    );
  }
  return parsed;
}

function parseFlag(value: string | undefined): boolean {
  const normalized = (value ?? "").trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

export function loadPawConfig(env: NodeJS.ProcessEnv = process.env): PawConfig {
  return {
    llm: parseModelUrl(env.LLM_URL?.trim() || DEFAULT_LLM_URL, "LLM_URL"),
    memoryLlm: parseModelUrl(env.MEMORY_LLM_URL?.trim() || DEFAULT_MEMORY_LLM_URL, "MEMORY_LLM_URL"),
    bashTimeoutSeconds: parseBashTimeoutSeconds(env.PAW_BASH_TIMEOUT_SECONDS),
    debug: parseFlag(env.PAW_DEBUG),
  };
}
