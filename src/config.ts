import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { logger } from "./logger";
import type { SourceName } from "./types";

export interface RateLimiting {
  delayBetweenRequestsMs: number;
  batchSize: number;
  batchPauseMs: number;
  maxRetries: number;
  backoffStartMs: number;
}

export interface SourceDefinition {
  enabled: boolean;
  endpointTemplate: string;
  timeoutMs: number;
  resultsPerPage?: number;
  maxResults?: number;
  rateLimiting?: RateLimiting;
}

export interface SourceConfig {
  description: string;
  concurrency: number;
  sources: Record<SourceName, SourceDefinition>;
}

export interface DirectoryCompany {
  name: string;
  sector: string | null;
  stage: string | null;
  excluded?: boolean;
}

export interface CompaniesConfig {
  description: string;
  greenhouse: string[];
  lever: string[];
  displayNames: Record<string, string>;
  directory: DirectoryCompany[];
}

export interface OnDemandSearch {
  queryTemplate: string;
  maxRoles: number;
  location: string;
  defaultRoles: string[];
  defaultLocations: string[];
}

export interface SearchConfig {
  description: string;
  poolQueries: string[];
  poolLocations: string[];
  onDemand: OnDemandSearch;
}

export interface FiltersConfig {
  description: string;
  locationKeywords: string[];
  seniorityKeywords: string[];
  b2cKeywords: string[];
  excludedKeywords: string[];
  targetRoleThreshold: number;
}

export interface ScheduleConfig {
  poolRuns: string[];
  ownerScout: string;
}

export interface EnvConfig {
  adzunaAppId: string;
  adzunaAppKey: string;
  serpApiKey: string;
  serperApiKey: string;
  aiApiKey: string;
  aiEndpoint: string;
  aiModel: string;
  telegramBotToken: string;
  ownerUserId: number | null;
  dryRun: boolean;
  timezone: string;
  nodeEnv: string;
  port: number;
  databasePath: string;
  adapterTimeoutMs: number;
}

export interface AppConfig {
  env: EnvConfig;
  sources: SourceConfig;
  companies: CompaniesConfig;
  search: SearchConfig;
  filters: FiltersConfig;
  schedule: ScheduleConfig;
}

const CONFIG_DIR = join(fileURLToPath(new URL(".", import.meta.url)), "../config");

export function parseEnvInt(
  value: string | undefined,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;

  if (typeof min === "number" && parsed < min) return min;
  if (typeof max === "number" && parsed > max) return max;
  return parsed;
}

export function loadJsonConfig<T>(filename: string, configDir = CONFIG_DIR): T {
  const filepath = join(configDir, filename);

  if (!existsSync(filepath)) {
    throw new Error(`Config file not found: ${filepath}`);
  }

  try {
    const raw = readFileSync(filepath, "utf-8");
    // Strip comments while preserving string contents (avoid corrupting URLs).
    const json = raw.replace(
      /\\"|"(?:\\"|[^"])*"|(\/\/.*|\/\*[\s\S]*?\*\/)/g,
      (match, comment) => (comment ? "" : match),
    );
    return JSON.parse(json) as T;
  } catch (error) {
    throw new Error(`Failed to parse config file ${filename}: ${error}`);
  }
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const owner = Number.parseInt(env.OWNER_USER_ID ?? "", 10);

  return {
    adzunaAppId: env.ADZUNA_APP_ID ?? "",
    adzunaAppKey: env.ADZUNA_APP_KEY ?? "",
    serpApiKey: env.SERPAPI_KEY ?? "",
    serperApiKey: env.SERPER_API_KEY ?? "",
    aiApiKey: env.AI_API_KEY ?? "",
    aiEndpoint:
      env.AI_ENDPOINT ?? "https://api.groq.com/openai/v1/chat/completions",
    aiModel: env.AI_MODEL ?? "openai/gpt-oss-120b",
    telegramBotToken: env.TELEGRAM_BOT_TOKEN ?? "",
    ownerUserId: Number.isNaN(owner) ? null : owner,
    dryRun: env.DRY_RUN === "true",
    timezone: env.TZ ?? "Asia/Kolkata",
    nodeEnv: env.NODE_ENV ?? "development",
    port: parseEnvInt(env.PORT, 3000, 1, 65535),
    databasePath: env.DATABASE_PATH ?? "data/scout.db",
    adapterTimeoutMs: parseEnvInt(env.ADAPTER_TIMEOUT_MS, 30000, 1000, 300000),
  };
}

export function loadConfig(
  options: { configDir?: string; env?: NodeJS.ProcessEnv } = {},
): AppConfig {
  logger.info("Loading configuration...");

  const configDir = options.configDir ?? CONFIG_DIR;
  const env = loadEnvConfig(options.env);
  const sources = loadJsonConfig<SourceConfig>("sources.json", configDir);
  const companies = loadJsonConfig<CompaniesConfig>("companies.json", configDir);
  const search = loadJsonConfig<SearchConfig>("search.json", configDir);
  const filters = loadJsonConfig<FiltersConfig>("filters.json", configDir);
  const schedule = loadJsonConfig<ScheduleConfig>("schedule.json", configDir);

  if (!env.telegramBotToken) {
    logger.warn("TELEGRAM_BOT_TOKEN not set — notifications will not be sent");
  }
  if (!env.aiApiKey) {
    logger.warn("AI_API_KEY not set — on-demand scoring will mark every batch as failed");
  }
  if (env.dryRun) {
    logger.info("🧪 DRY RUN MODE — no notifications will be sent");
  }

  const enabledSources = Object.entries(sources.sources)
    .filter(([, s]) => s.enabled)
    .map(([name]) => name);

  logger.info(`Config loaded successfully:`);
  logger.info(
    `  - ${enabledSources.length} enabled sources: ${enabledSources.join(", ") || "none"}`,
  );
  logger.info(
    `  - ${companies.greenhouse.length + companies.lever.length} ATS boards, ${companies.directory.length} directory companies`,
  );
  logger.info(`  - ${search.poolQueries.length} pool query templates`);
  logger.info(`  - Environment: ${env.nodeEnv}`);
  logger.info(`  - Timezone: ${env.timezone}`);

  return { env, sources, companies, search, filters, schedule };
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
