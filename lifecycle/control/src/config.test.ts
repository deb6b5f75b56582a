import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { TIMING, ValidationError } from "@riftctl/contracts";
import {
  DEFAULT_BASE_URL,
  clearConfigCache,
  normalizeBaseUrl,
  parseSimpleToml,
  resolveClientConfig,
} from "./config";

const ENV_KEYS = ["RIFT_CONFIG", "RIFT_TOKEN", "RIFT_BASE_URL", "RIFT_PROTO_VERSION", "RIFT_RETRIES"] as const;

let tempDir: string;
let configPath: string;
const savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

beforeEach(() => {
  for (const key of ENV_KEYS) {
    savedEnv[key] = process.env[key];
    delete process.env[key];
  }
  tempDir = mkdtempSync(join(tmpdir(), "riftctl-config-test-"));
  configPath = join(tempDir, "config.toml");
  process.env.RIFT_CONFIG = configPath;
  clearConfigCache();
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = savedEnv[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
  rmSync(tempDir, { recursive: true, force: true });
  clearConfigCache();
  vi.restoreAllMocks();
});

describe("parseSimpleToml", () => {
  test("reads sections, scalars, arrays and comments", () => {
    const parsed = parseSimpleToml(
      [
        "# top comment",
        "name = bare",
        "[client]",
        'token = "abc#def" # trailing',
        "retries = 3",
        "enabled = true",
        "regions = [\"a\", \"b\"]",
      ].join("\n"),
    );
    expect(parsed["__global__"]).toEqual({ name: "bare" });
    expect(parsed["client"]).toEqual({ token: "abc#def", retries: 3, enabled: true, regions: ["a", "b"] });
  });

  test("rejects a line without an assignment", () => {
    expect(() => parseSimpleToml("[client]\ntoken\n")).toThrow('line 2: expected "key = value"');
  });
});

describe("normalizeBaseUrl", () => {
  test("ends with exactly one slash", () => {
    expect(normalizeBaseUrl("https://api.test.invalid")).toBe("https://api.test.invalid/");
    expect(normalizeBaseUrl("https://api.test.invalid///")).toBe("https://api.test.invalid/");
  });
});

describe("resolveClientConfig", () => {
  test("falls back to defaults when only a token is given", () => {
    const config = resolveClientConfig({ token: "test-secret" });
    expect(config).toEqual({
      token: "test-secret",
      baseUrl: `${DEFAULT_BASE_URL}/`,
      protoVersion: "2025-06-10",
      retries: TIMING.RETRY_COUNT,
      requestTimeoutMs: TIMING.REQUEST_TIMEOUT_MS,
    });
  });

  test("environment fills what the file leaves out", () => {
    process.env.RIFT_TOKEN = "env-token";
    process.env.RIFT_BASE_URL = "https://env.test.invalid";
    process.env.RIFT_RETRIES = "7";
    const config = resolveClientConfig();
    expect(config.token).toBe("env-token");
    expect(config.baseUrl).toBe("https://env.test.invalid/");
    expect(config.retries).toBe(7);
  });

  test("the config file wins over the environment", () => {
    writeFileSync(configPath, '[client]\ntoken = "file-token"\nretries = 1\n');
    process.env.RIFT_TOKEN = "env-token";
    process.env.RIFT_RETRIES = "7";
    const config = resolveClientConfig();
    expect(config.token).toBe("file-token");
    expect(config.retries).toBe(1);
  });

  test("explicit options win over the config file", () => {
    writeFileSync(configPath, '[client]\ntoken = "file-token"\nbase_url = "https://file.test.invalid"\n');
    const config = resolveClientConfig({ token: "explicit-token", retries: 0 });
    expect(config.token).toBe("explicit-token");
    expect(config.baseUrl).toBe("https://file.test.invalid/");
    expect(config.retries).toBe(0);
  });

  test("an unparsable file is reported and ignored", () => {
    const warn = vi.spyOn(console, "warn");
    writeFileSync(configPath, "[client]\nthis is not toml\n");
    process.env.RIFT_TOKEN = "env-token";
    expect(resolveClientConfig().token).toBe("env-token");
    expect(warn).toHaveBeenCalledWith(`[config] Failed to parse ${configPath}: line 2: expected "key = value"`);
  });

  test("a missing token is a validation error before anything else happens", () => {
    let caught: unknown;
    try {
      resolveClientConfig();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ code: "MISSING_REQUIRED_FIELD", category: "validation" });
  });

  test("an explicit empty token overrides the environment and is rejected", () => {
    process.env.RIFT_TOKEN = "env-token";
    expect(() => resolveClientConfig({ token: "" })).toThrow(
      "missing API token: pass it explicitly, set client.token in the config file, or set RIFT_TOKEN",
    );
  });

  test("explicit empty base URL and protocol version are rejected", () => {
    process.env.RIFT_BASE_URL = "https://env.test.invalid";
    process.env.RIFT_PROTO_VERSION = "2025-05-29";
    expect(() => resolveClientConfig({ token: "test-secret", baseUrl: "" })).toThrow("base URL is empty");
    expect(() => resolveClientConfig({ token: "test-secret", protoVersion: "" })).toThrow("protocol version is empty");
  });

  test("unknown protocol versions pass through with a warning", () => {
    const warn = vi.spyOn(console, "warn");
    const config = resolveClientConfig({ token: "test-secret", protoVersion: "2030-01-01" });
    expect(config.protoVersion).toBe("2030-01-01");
    expect(warn).toHaveBeenCalledWith("[config] unknown protocol version 2030-01-01, sending it as-is");
  });

  test("negative retries are rejected", () => {
    expect(() => resolveClientConfig({ token: "test-secret", retries: -1 })).toThrow(
      "retries must be a non-negative integer, got -1",
    );
  });
});
