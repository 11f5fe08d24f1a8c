import { z } from "zod";
import type { LeadSyncConfig } from "./types.js";

const serverSchema = z.object({
  port: z.number().int().positive().default(8000),
  hostname: z.string().default("127.0.0.1"),
  triggerToken: z.string().min(1).optional(),
});

const modelSchema = z.object({
  name: z.string().min(1).default("gemini-2.5-flash"),
  apiKey: z.string().min(1).optional(),
  baseUrl: z
    .string()
    .url()
    .default("https://generativelanguage.googleapis.com/v1beta"),
  timeoutMs: z.number().int().positive().default(120_000),
  fallbacks: z
    .record(z.string(), z.string().min(1))
    .default({ "gemini-2.5-flash-lite": "gemini-2.5-flash" }),
});

const memorySchema = z.object({
  dbPath: z.string().min(1).optional(),
});

const jiraSchema = z.object({
  baseUrl: z.string().url().optional(),
  email: z.string().optional(),
  apiToken: z.string().optional(),
});

const githubSchema = z.object({
  token: z.string().optional(),
  apiUrl: z.string().url().default("https://api.github.com"),
  repoOwner: z.string().optional(),
  repoName: z.string().optional(),
  branch: z.string().min(1).default("main"),
});

const slackSchema = z.object({
  botToken: z.string().optional(),
  signingSecret: z.string().optional(),
  channelId: z.string().optional(),
});

const docsSchema = z.object({
  accessToken: z.string().optional(),
  preferenceDocs: z
    .object({
      frontend: z.string().min(1).optional(),
      backend: z.string().min(1).optional(),
      database: z.string().min(1).optional(),
    })
    .default({}),
});

const digestSchema = z.object({
  windowMinutes: z.number().int().positive().default(60),
  schedule: z.string().min(1).optional(),
  idempotency: z.boolean().default(true),
  timezone: z.string().default("UTC"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const leadSyncConfigSchema = z.object({
  server: serverSchema.default({}),
  model: modelSchema.default({}),
  memory: memorySchema.default({}),
  jira: jiraSchema.default({}),
  github: githubSchema.default({}),
  slack: slackSchema.default({}),
  docs: docsSchema.default({}),
  digest: digestSchema.default({}),
  artifacts: z.object({ dir: z.string().min(1).default("artifacts") }).default({}),
  templates: z.object({ dir: z.string().min(1).optional() }).default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): LeadSyncConfig {
  return leadSyncConfigSchema.parse(raw);
}
