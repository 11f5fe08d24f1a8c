import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { LeadSyncConfig } from "./types.js";

export function getStateDir(): string {
  return process.env["LEADSYNC_STATE_DIR"] ?? join(homedir(), ".leadsync");
}

export function getConfigPath(): string {
  return process.env["LEADSYNC_CONFIG_PATH"] ?? "leadsync.config.json";
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}

export function resolveMemoryDbPath(config: LeadSyncConfig, stateDir: string): string {
  return config.memory.dbPath ?? join(stateDir, "leadsync.db");
}

/** Ruleset templates ship at the package root, next to `src/` and `dist/`. */
export function resolveTemplatesDir(config: LeadSyncConfig): string {
  if (config.templates.dir) return resolve(config.templates.dir);
  return resolve(dirname(fileURLToPath(import.meta.url)), "..", "..", "templates");
}
