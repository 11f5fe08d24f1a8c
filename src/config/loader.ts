import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { LeadSyncConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

export function loadConfig(path?: string): LeadSyncConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      return parseConfig({});
    }
    throw err;
  }

  const substituted = substituteEnv(content);
  const raw: unknown = JSON.parse(substituted);
  return parseConfig(raw);
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
