import { afterEach, describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  ConfigError,
  defaultEnvPath,
  defaultProfilesFile,
  loadEnvFile,
  loadProviderProfiles,
  parseConfig,
  parseProviderProfiles,
  resolveProfile,
} from "../adapters/config.js";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    const config = parseConfig({});
    expect(config).toMatchObject({
      host: "127.0.0.1",
      port: 17870,
      provider: { name: "openai", baseUrl: "https://api.openai.com/v1", apiKey: undefined },
      cache: { enabled: true, maxEntries: 1000, ttlMs: 3_600_000, namespace: "default", maxEntryBytes: 5 * 1024 * 1024 },
      batch: { maxSize: 100, maxConcurrency: 8, streamingThreshold: 20, chunkSize: 10, itemTimeoutMs: 300_000 },
      toolMaxRounds: 5,
      requestTimeoutMs: 600_000,
    });
    expect(config.provider.profilesFile).toBe(defaultProfilesFile());
  });

  it("reads overrides and treats empty values as unset", () => {
    const config = parseConfig({
      GATEWAY_PORT: "9000",
      PROVIDER_NAME: "local",
      PROVIDER_BASE_URL: "http://127.0.0.1:8080/v1",
      PROVIDER_API_KEY: "test-secret",
      CACHE_ENABLED: "off",
      CACHE_TTL_SECONDS: "60",
      BATCH_MAX_CONCURRENCY: "2",
      GATEWAY_HOST: "",
      LOG_LEVEL: "debug",
    });
    expect(config.port).toBe(9000);
    expect(config.host).toBe("127.0.0.1");
    expect(config.provider).toMatchObject({ name: "local", baseUrl: "http://127.0.0.1:8080/v1", apiKey: "test-secret" });
    expect(config.cache.enabled).toBe(false);
    expect(config.cache.ttlMs).toBe(60_000);
    expect(config.batch.maxConcurrency).toBe(2);
    expect(config.logLevel).toBe("debug");
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      parseConfig({ GATEWAY_PORT: "abc", CACHE_ENABLED: "maybe", BATCH_CHUNK_SIZE: "0" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues.map((i) => i.split(":")[0])).toEqual(["GATEWAY_PORT", "CACHE_ENABLED", "BATCH_CHUNK_SIZE"]);
  });

  it("caps timeouts at what a timer can hold", () => {
    const config = parseConfig({ REQUEST_TIMEOUT_SECONDS: "2147483", BATCH_ITEM_TIMEOUT_SECONDS: "2147483" });
    expect(config.requestTimeoutMs).toBe(2_147_483_000);
    expect(config.batch.itemTimeoutMs).toBe(2_147_483_000);

    let caught: unknown;
    try {
      parseConfig({ REQUEST_TIMEOUT_SECONDS: "2147484", BATCH_ITEM_TIMEOUT_SECONDS: "3000000" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues.map((i) => i.split(":")[0])).toEqual(["BATCH_ITEM_TIMEOUT_SECONDS", "REQUEST_TIMEOUT_SECONDS"]);
  });
});

describe("env file", () => {
  const dirs: string[] = [];
  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
    delete process.env.GATEWAY_CONFIG_TEST_VALUE;
  });

  it("defaults to the home directory unless GATEWAY_ENV_FILE is set", () => {
    expect(defaultEnvPath({ GATEWAY_ENV_FILE: "/etc/gateway.env" })).toBe("/etc/gateway.env");
    expect(defaultEnvPath({}).endsWith(join(".llm-gateway", ".env"))).toBe(true);
  });

  it("loads variables without overriding the environment", () => {
    const dir = mkdtempSync(join(tmpdir(), "gateway-env-"));
    dirs.push(dir);
    const file = join(dir, ".env");
    writeFileSync(file, "GATEWAY_CONFIG_TEST_VALUE=from-file\n");

    expect(loadEnvFile(file)).toBe(file);
    expect(process.env.GATEWAY_CONFIG_TEST_VALUE).toBe("from-file");

    process.env.GATEWAY_CONFIG_TEST_VALUE = "from-env";
    loadEnvFile(file);
    expect(process.env.GATEWAY_CONFIG_TEST_VALUE).toBe("from-env");
  });
});

describe("provider profiles", () => {
  it("loads the shipped profiles file", async () => {
    const profiles = await loadProviderProfiles(defaultProfilesFile());
    expect([...profiles.keys()]).toEqual(["openai", "openrouter", "local"]);
    expect(profiles.get("local")).toEqual({
      name: "local",
      allowedExtensions: ["seed", "top_k", "min_p", "repetition_penalty"],
      supportsVision: false,
      imageMediaTypes: [],
    });
  });

  it("applies defaults to sparse entries", () => {
    const profiles = parseProviderProfiles({ providers: [{ name: "tiny" }] });
    expect(profiles.get("tiny")).toEqual({
      name: "tiny",
      allowedExtensions: [],
      supportsVision: true,
      imageMediaTypes: ["image/jpeg", "image/png", "image/gif", "image/webp"],
    });
  });

  it("refuses to allow-list fields the gateway sets", () => {
    expect(() => parseProviderProfiles({ providers: [{ name: "bad", allowedExtensions: ["seed", "model"] }] })).toThrow(
      'providers file providers.0.allowedExtensions: "model" is set by the gateway and cannot be allow-listed',
    );
  });

  it("rejects duplicate provider names", () => {
    expect(() => parseProviderProfiles({ providers: [{ name: "a" }, { name: "a" }] })).toThrow(
      'providers file: duplicate provider "a"',
    );
  });

  it("reports unreadable files as ConfigError", async () => {
    await expect(loadProviderProfiles(join(tmpdir(), "no-such-gateway-dir", "providers.json"))).rejects.toBeInstanceOf(
      ConfigError,
    );
  });

  it("falls back to a profile that forwards nothing", () => {
    const profile = resolveProfile(new Map(), "mystery");
    expect(profile.name).toBe("mystery");
    expect(profile.allowedExtensions).toEqual([]);
  });
});
