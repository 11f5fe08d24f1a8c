export type PreferenceCategory = "frontend" | "backend" | "database";

export interface LeadSyncConfig {
  readonly server: ServerConfig;
  readonly model: ModelConfig;
  readonly memory: MemoryConfig;
  readonly jira: JiraConfig;
  readonly github: GitHubConfig;
  readonly slack: SlackConfig;
  readonly docs: DocsConfig;
  readonly digest: DigestConfig;
  readonly artifacts: ArtifactsConfig;
  readonly templates: TemplatesConfig;
  readonly logging: LoggingConfig;
}

export interface ServerConfig {
  readonly port: number;
  readonly hostname: string;
  readonly triggerToken?: string;
}

export interface ModelConfig {
  readonly name: string;
  readonly apiKey?: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  /** Lower-tier model name → higher-tier substitute used when the former is unavailable. */
  readonly fallbacks: Readonly<Record<string, string>>;
}

export interface MemoryConfig {
  readonly dbPath?: string;
}

export interface JiraConfig {
  readonly baseUrl?: string;
  readonly email?: string;
  readonly apiToken?: string;
}

export interface GitHubConfig {
  readonly token?: string;
  readonly apiUrl: string;
  readonly repoOwner?: string;
  readonly repoName?: string;
  readonly branch: string;
}

export interface SlackConfig {
  readonly botToken?: string;
  readonly signingSecret?: string;
  readonly channelId?: string;
}

export interface DocsConfig {
  readonly accessToken?: string;
  readonly preferenceDocs: Readonly<Partial<Record<PreferenceCategory, string>>>;
}

export interface DigestConfig {
  readonly windowMinutes: number;
  readonly schedule?: string;
  readonly idempotency: boolean;
  readonly timezone: string;
}

export interface ArtifactsConfig {
  readonly dir: string;
}

export interface TemplatesConfig {
  readonly dir?: string;
}

export interface LoggingConfig {
  readonly level?: "debug" | "info" | "warn" | "error" | "silent";
  readonly file?: string;
  readonly json?: boolean;
}
