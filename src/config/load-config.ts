import { readFileSync } from "fs";
import type { AdapterConfig } from "./adapter-config.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function assertString(value: unknown, field: string): asserts value is string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`Config field "${field}" must be a non-empty string`);
  }
}

function assertPositiveInteger(value: unknown, field: string): asserts value is number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Config field "${field}" must be a positive integer`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validate(obj: unknown): AdapterConfig {
  if (!isRecord(obj)) {
    throw new ConfigError("Config must be a JSON object");
  }

  if (obj["schema_version"] !== 1) {
    throw new ConfigError(`Config field "schema_version" must be 1`);
  }

  const region = obj["region"];
  assertString(region, "region");
  const modelId = obj["model_id"];
  assertString(modelId, "model_id");

  const config: AdapterConfig = { schema_version: 1, region, model_id: modelId };

  const profile = obj["profile"];
  if (profile !== undefined) {
    assertString(profile, "profile");
    config.profile = profile;
  }

  const maxAttempts = obj["max_attempts"];
  if (maxAttempts !== undefined) {
    assertPositiveInteger(maxAttempts, "max_attempts");
    config.max_attempts = maxAttempts;
  }

  return Object.freeze(config);
}

export function loadConfig(filePath: string): AdapterConfig {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, "utf-8");
    raw = JSON.parse(content) as unknown;
  } catch (err) {
    throw new ConfigError(
      `Failed to read config at "${filePath}": ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return validate(raw);
}
