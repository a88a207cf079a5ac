// Runtime configuration: env file → validated GatewayConfig, plus provider profiles from JSON
import { config as loadDotenv } from "dotenv";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { homedir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import {
  DEFAULT_IMAGE_MEDIA_TYPES,
  RESERVED_PROVIDER_FIELDS,
  fallbackProfile,
  type ProviderProfile,
} from "./providers/profile.js";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export interface GatewayConfig {
  host: string;
  port: number;
  provider: {
    name: string;
    baseUrl: string;
    apiKey?: string;
    profilesFile: string;
  };
  cache: {
    enabled: boolean;
    maxEntries: number;
    ttlMs: number;
    namespace: string;
    maxEntryBytes: number;
  };
  batch: {
    maxSize: number;
    maxConcurrency: number;
    streamingThreshold: number;
    chunkSize: number;
    itemTimeoutMs: number;
  };
  toolMaxRounds: number;
  requestTimeoutMs: number;
  logLevel?: string;
}

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no", "on", "off"])
  .transform((v) => v === "true" || v === "1" || v === "yes" || v === "on");

const positiveInt = z.coerce.number().int().positive();

// timers misfire past 2^31 - 1 ms
const timeoutSeconds = positiveInt.max(2_147_483);

const envSchema = z.object({
  GATEWAY_HOST: z.string().min(1).default("127.0.0.1"),
  GATEWAY_PORT: z.coerce.number().int().min(0).max(65535).default(17870),
  PROVIDER_NAME: z.string().min(1).default("openai"),
  PROVIDER_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  PROVIDER_API_KEY: z.string().min(1).optional(),
  PROVIDERS_FILE: z.string().min(1).optional(),
  CACHE_ENABLED: flag.default("true"),
  CACHE_MAX_ENTRIES: positiveInt.default(1000),
  CACHE_TTL_SECONDS: positiveInt.default(3600),
  CACHE_NAMESPACE: z.string().min(1).default("default"),
  CACHE_MAX_ENTRY_BYTES: positiveInt.default(5 * 1024 * 1024),
  BATCH_MAX_SIZE: positiveInt.default(100),
  BATCH_MAX_CONCURRENCY: positiveInt.default(8),
  BATCH_STREAMING_THRESHOLD: z.coerce.number().int().nonnegative().default(20),
  BATCH_CHUNK_SIZE: positiveInt.default(10),
  BATCH_ITEM_TIMEOUT_SECONDS: timeoutSeconds.default(300),
  TOOL_MAX_ROUNDS: positiveInt.default(5),
  REQUEST_TIMEOUT_SECONDS: timeoutSeconds.default(600),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
});

/** `~/.llm-gateway/.env`, or GATEWAY_ENV_FILE */
export function defaultEnvPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.GATEWAY_ENV_FILE || join(homedir(), ".llm-gateway", ".env");
}

/** Load the env file into process.env (existing variables win). Returns the path used. */
export function loadEnvFile(path = defaultEnvPath()): string {
  loadDotenv({ path });
  return path;
}

/** config/providers.json next to the sources, or next to the build output */
export function defaultProfilesFile(): string {
  const candidates = ["../config/providers.json", "../../config/providers.json"].map((rel) =>
    fileURLToPath(new URL(rel, import.meta.url)),
  );
  return candidates.find((p) => existsSync(p)) ?? candidates[0];
}

export function parseConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  // unset and empty variables both mean "use the default"
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    host: e.GATEWAY_HOST,
    port: e.GATEWAY_PORT,
    provider: {
      name: e.PROVIDER_NAME,
      baseUrl: e.PROVIDER_BASE_URL,
      apiKey: e.PROVIDER_API_KEY,
      profilesFile: e.PROVIDERS_FILE ?? defaultProfilesFile(),
    },
    cache: {
      enabled: e.CACHE_ENABLED,
      maxEntries: e.CACHE_MAX_ENTRIES,
      ttlMs: e.CACHE_TTL_SECONDS * 1000,
      namespace: e.CACHE_NAMESPACE,
      maxEntryBytes: e.CACHE_MAX_ENTRY_BYTES,
    },
    batch: {
      maxSize: e.BATCH_MAX_SIZE,
      maxConcurrency: e.BATCH_MAX_CONCURRENCY,
      streamingThreshold: e.BATCH_STREAMING_THRESHOLD,
      chunkSize: e.BATCH_CHUNK_SIZE,
      itemTimeoutMs: e.BATCH_ITEM_TIMEOUT_SECONDS * 1000,
    },
    toolMaxRounds: e.TOOL_MAX_ROUNDS,
    requestTimeoutMs: e.REQUEST_TIMEOUT_SECONDS * 1000,
    logLevel: e.LOG_LEVEL,
  };
}

const profileSchema = z.object({
  name: z.string().min(1),
  allowedExtensions: z
    .array(z.string().min(1))
    .default([])
    .superRefine((keys, ctx) => {
      for (const key of keys) {
        if (RESERVED_PROVIDER_FIELDS.includes(key)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${key}" is set by the gateway and cannot be allow-listed` });
        }
      }
    }),
  supportsVision: z.boolean().default(true),
  imageMediaTypes: z.array(z.string().min(1)).default([...DEFAULT_IMAGE_MEDIA_TYPES]),
});

const profilesFileSchema = z.object({ providers: z.array(profileSchema) });

/** Parse a providers document; throws ConfigError on any problem */
export function parseProviderProfiles(json: unknown): Map<string, ProviderProfile> {
  const parsed = profilesFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `providers file ${i.path.join(".")}: ${i.message}`));
  }
  const profiles = new Map<string, ProviderProfile>();
  for (const p of parsed.data.providers) {
    if (profiles.has(p.name)) throw new ConfigError([`providers file: duplicate provider "${p.name}"`]);
    profiles.set(p.name, p);
  }
  return profiles;
}

export async function loadProviderProfiles(file: string): Promise<Map<string, ProviderProfile>> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (err) {
    throw new ConfigError([`cannot read providers file ${file}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ConfigError([`providers file ${file} is not valid JSON`]);
  }
  return parseProviderProfiles(json);
}

/** Profile for `name`; unknown providers get a conservative default that forwards no extensions */
export function resolveProfile(profiles: ReadonlyMap<string, ProviderProfile>, name: string): ProviderProfile {
  return profiles.get(name) ?? fallbackProfile(name);
}
