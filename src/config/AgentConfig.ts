import fs from "node:fs/promises";
import path from "node:path";
import { load as loadYaml } from "js-yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "../core/errors.js";
import { isRecord } from "../core/guards.js";
import { parseLogLevel } from "../observability/Logger.js";

/** Config file picked up from the working directory when no path is given. */
export const DEFAULT_CONFIG_FILE = "agent-runtime.yaml";

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

const modelSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().default("https://api.openai.com/v1"),
    name: z.string().min(1).default("gpt-4o-mini"),
    temperature: z.coerce.number().min(0).max(2).optional(),
    /** Per model call; also bounds the wait for each streamed event */
    timeoutMs: positiveInt.default(60_000),
    stream: z.boolean().default(true),
  })
  .default({});

const storageSchema = z
  .object({
    type: z.enum(["memory", "redis"]).default("memory"),
    redisUrl: z.string().min(1).optional(),
    keyPrefix: z.string().min(1).default("agent"),
    ttlSeconds: positiveInt.default(30 * 24 * 60 * 60),
    maxToolResults: positiveInt.optional(),
    retries: nonNegativeInt.default(3),
  })
  .default({})
  .superRefine((storage, ctx) => {
    if (storage.type === "redis" && !storage.redisUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["redisUrl"],
        message: "redisUrl is required when storage.type is redis",
      });
    }
  });

const engineSchema = z
  .object({
    maxToolIterations: positiveInt.default(4),
    maxContextTurns: nonNegativeInt.default(5),
    toolTimeoutMs: positiveInt.default(30_000),
    toolRetries: nonNegativeInt.default(0),
    channelCapacity: positiveInt.default(16),
  })
  .default({});

const cacheSchema = z
  .object({
    maxAgents: positiveInt.default(100),
    ttlMs: positiveInt.default(30 * 60 * 1000),
    maxQueuedTurnsPerConversation: nonNegativeInt.default(8),
  })
  .default({});

const serverSchema = z
  .object({
    host: z.string().min(1).default("0.0.0.0"),
    port: z.coerce.number().int().min(0).max(65_535).default(8000),
  })
  .default({});

export const agentRuntimeConfigSchema = z.object({
  model: modelSchema,
  storage: storageSchema,
  engine: engineSchema,
  cache: cacheSchema,
  server: serverSchema,
  defaultAgentKind: z.string().min(1).default("customer_service"),
  logLevel: z.enum(["silent", "error", "warn", "info", "debug", "trace"]).default("info"),
});

/**
 * Runtime configuration. Built once at process start and passed explicitly
 * into every component; nothing reads it ambiently.
 */
export type AgentRuntimeConfig = z.infer<typeof agentRuntimeConfigSchema>;
export type ModelConfig = AgentRuntimeConfig["model"];
export type StorageConfig = AgentRuntimeConfig["storage"];
export type EngineConfig = AgentRuntimeConfig["engine"];
export type CacheConfig = AgentRuntimeConfig["cache"];

export interface LoadConfigOptions {
  /** YAML file; when omitted, ./agent-runtime.yaml is used if present */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Applied last, over file and environment */
  overrides?: Record<string, unknown>;
}

export interface ConfigLoadResult {
  config: AgentRuntimeConfig;
  configPath?: string;
}

/**
 * Validate a raw config object and fill defaults.
 */
export function parseConfig(raw: unknown): AgentRuntimeConfig {
  const result = agentRuntimeConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Load config from an optional YAML file, then environment variables, then
 * explicit overrides.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ConfigLoadResult> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let fileConfig: Record<string, unknown> = {};
  let configPath: string | undefined;
  if (options.configPath) {
    configPath = path.resolve(cwd, options.configPath);
    fileConfig = await readConfigFile(configPath);
  } else {
    const candidate = path.resolve(cwd, DEFAULT_CONFIG_FILE);
    if (await fileExists(candidate)) {
      configPath = candidate;
      fileConfig = await readConfigFile(candidate);
    }
  }

  const merged = mergeLayers(
    mergeLayers(fileConfig, configFromEnv(env)),
    options.overrides ?? {},
  );
  return { config: parseConfig(merged), configPath };
}

/**
 * Map environment variables onto the config shape. Unset variables are omitted.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  const set = (section: string, key: string, value: unknown) => {
    if (value === undefined || value === "") return;
    const current = layer[section];
    const target: Record<string, unknown> = isRecord(current) ? current : {};
    target[key] = value;
    layer[section] = target;
  };

  set("model", "apiKey", env.MODEL_API_KEY ?? env.OPENAI_API_KEY);
  set("model", "baseUrl", env.MODEL_API_BASE_URL);
  set("model", "name", env.MODEL_NAME ?? env.MODEL_DEPLOYMENT_NAME);
  set("model", "temperature", env.MODEL_TEMPERATURE);
  set("model", "timeoutMs", env.MODEL_TIMEOUT_MS);
  set("model", "stream", parseBoolean(env.MODEL_STREAM));
  set("storage", "type", env.STORAGE_TYPE?.toLowerCase());
  set("storage", "redisUrl", env.REDIS_URL);
  set("storage", "keyPrefix", env.STORAGE_KEY_PREFIX);
  set("storage", "ttlSeconds", env.STORAGE_TTL_SECONDS);
  set("engine", "maxToolIterations", env.MAX_TOOL_ITERATIONS);
  set("engine", "maxContextTurns", env.CHAT_HISTORY_LIMIT);
  set("engine", "toolTimeoutMs", env.TOOL_TIMEOUT_MS);
  set("engine", "toolRetries", env.TOOL_RETRIES);
  set("server", "port", env.AGENTS_SERVER_PORT ?? env.PORT);
  set("server", "host", env.AGENTS_SERVER_HOST);

  const level = parseLogLevel(env.AGENT_LOG_LEVEL ?? env.LOG_LEVEL);
  if (level) layer.logLevel = level;
  if (env.DEFAULT_AGENT_TYPE) layer.defaultAgentKind = env.DEFAULT_AGENT_TYPE;
  return layer;
}

/**
 * Deep-merge plain objects; arrays and scalars in `overlay` replace.
 */
export function mergeLayers(
  base: Record<string, unknown>,
  overlay: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const existing = out[key];
    out[key] =
      isRecord(existing) && isRecord(value) ? mergeLayers(existing, value) : value;
  }
  return out;
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(error)}`);
  }
  let parsed: unknown;
  try {
    parsed = loadYaml(text) ?? {};
  } catch (error) {
    throw new ConfigError(`Cannot parse config file ${configPath}: ${errorMessage(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a mapping`);
  }
  return parsed;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function parseBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  return undefined;
}
