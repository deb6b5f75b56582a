// config.ts - Client configuration: explicit options > config file > env > defaults
//
// The config file is ~/.riftctl/config.toml (override with RIFT_CONFIG):
//
//   [client]
//   token = "..."
//   base_url = "https://api.cloudrift.ai"
//   proto_version = "2025-06-10"
//   retries = 4

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { homedir } from "os";
import {
  TIMING,
  ValidationError,
  DEFAULT_PROTO_VERSION,
  isKnownProtoVersion,
} from "@riftctl/contracts";

export const DEFAULT_BASE_URL = "https://api.cloudrift.ai";

// =============================================================================
// Types
// =============================================================================

/** Values a caller may pin explicitly. Anything left out falls through. */
export interface ConfigOverrides {
  token?: string;
  baseUrl?: string;
  protoVersion?: string;
  retries?: number;
  requestTimeoutMs?: number;
}

export interface ResolvedClientConfig {
  token: string;
  /** Always ends with exactly one "/" */
  baseUrl: string;
  protoVersion: string;
  retries: number;
  requestTimeoutMs: number;
}

interface FileClientConfig {
  token?: string;
  base_url?: string;
  proto_version?: string;
  retries?: number;
}

// =============================================================================
// Config File Path
// =============================================================================

function getConfigPath(): string {
  return process.env.RIFT_CONFIG ?? join(homedir(), ".riftctl", "config.toml");
}

// =============================================================================
// Simple TOML Parser (subset: sections + key=value pairs)
// =============================================================================

type TomlValue = string | number | boolean | TomlValue[];

/**
 * Parse a minimal TOML-like config. Supports [section] headers, key = value
 * (strings, numbers, booleans, arrays) and # comments.
 */
export function parseSimpleToml(content: string): Record<string, Record<string, TomlValue>> {
  const result: Record<string, Record<string, TomlValue>> = {};
  let section: Record<string, TomlValue> = {};
  result["__global__"] = section;

  for (const [index, rawLine] of content.split("\n").entries()) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const sectionMatch = line.match(/^\[([a-zA-Z0-9_.-]+)\]$/);
    if (sectionMatch?.[1]) {
      section = result[sectionMatch[1]] ?? {};
      result[sectionMatch[1]] = section;
      continue;
    }

    const eqIdx = line.indexOf("=");
    if (eqIdx === -1) {
      throw new Error(`line ${index + 1}: expected "key = value"`);
    }
    const key = line.slice(0, eqIdx).trim();
    section[key] = parseTomlValue(line.slice(eqIdx + 1));
  }

  return result;
}

/** Drop text after an unquoted `#`. A `#` inside double quotes is kept. */
function stripInlineComment(value: string): string {
  let inQuote = false;
  for (let i = 0; i < value.length; i++) {
    if (value[i] === '"' && (i === 0 || value[i - 1] !== "\\")) inQuote = !inQuote;
    if (value[i] === "#" && !inQuote) return value.slice(0, i).trim();
  }
  return value.trim();
}

function parseTomlValue(raw: string): TomlValue {
  const value = stripInlineComment(raw);

  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1);
  }

  if (value.startsWith("[") && value.endsWith("]")) {
    const inner = value.slice(1, -1).trim();
    if (!inner) return [];
    return inner.split(",").map((item) => parseTomlValue(item));
  }

  if (value === "true") return true;
  if (value === "false") return false;

  const num = Number(value);
  if (!isNaN(num) && value !== "") return num;

  return value;
}

// =============================================================================
// Load Config
// =============================================================================

let _cachedFileConfig: FileClientConfig | null = null;

/**
 * Load the [client] section of the config file. A missing file is an empty
 * config; an unparsable one is logged and treated as empty. Cached after the
 * first load.
 */
export function loadConfigFile(): FileClientConfig {
  if (_cachedFileConfig) return _cachedFileConfig;

  const configPath = getConfigPath();
  if (!existsSync(configPath)) {
    _cachedFileConfig = {};
    return _cachedFileConfig;
  }

  try {
    const raw = parseSimpleToml(readFileSync(configPath, "utf-8"));
    _cachedFileConfig = mapToClientConfig(raw["client"] ?? {}, configPath);
  } catch (err) {
    console.warn(`[config] Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    _cachedFileConfig = {};
  }

  return _cachedFileConfig;
}

/** Clear the cached config file. Test-only. */
export function clearConfigCache(): void {
  _cachedFileConfig = null;
}

function mapToClientConfig(section: Record<string, TomlValue>, configPath: string): FileClientConfig {
  const config: FileClientConfig = {};
  for (const [key, value] of Object.entries(section)) {
    switch (key) {
      case "token":
      case "base_url":
      case "proto_version":
        if (typeof value === "string") {
          config[key] = value;
          continue;
        }
        break;
      case "retries":
        if (typeof value === "number") {
          config.retries = value;
          continue;
        }
        break;
      default:
        console.warn(`[config] ${configPath}: ignoring unknown key client.${key}`);
        continue;
    }
    console.warn(`[config] ${configPath}: ignoring client.${key}, unexpected value type`);
  }
  return config;
}

// =============================================================================
// Resolution
// =============================================================================

function envRetries(): number | undefined {
  const raw = process.env.RIFT_RETRIES;
  if (!raw) return undefined;
  const parsed = parseInt(raw, 10);
  if (isNaN(parsed)) {
    console.warn(`[config] ignoring RIFT_RETRIES=${raw}, not a number`);
    return undefined;
  }
  return parsed;
}

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, "") + "/";
}

/**
 * Resolve the effective client config. Throws ValidationError, before any
 * network call, when no token is configured anywhere or retries is invalid.
 */
export function resolveClientConfig(overrides: ConfigOverrides = {}): ResolvedClientConfig {
  const file = loadConfigFile();

  // An explicit value wins even when empty; empty file or env values fall through.
  const token = overrides.token ?? (file.token || process.env.RIFT_TOKEN || "");
  if (token === "") {
    throw new ValidationError(
      "missing API token: pass it explicitly, set client.token in the config file, or set RIFT_TOKEN",
      { code: "MISSING_REQUIRED_FIELD" },
    );
  }

  const baseUrl = overrides.baseUrl ?? (file.base_url || process.env.RIFT_BASE_URL || DEFAULT_BASE_URL);
  if (baseUrl === "") {
    throw new ValidationError("base URL is empty", { code: "MISSING_REQUIRED_FIELD" });
  }

  const protoVersion =
    overrides.protoVersion ?? (file.proto_version || process.env.RIFT_PROTO_VERSION || DEFAULT_PROTO_VERSION);
  if (protoVersion === "") {
    throw new ValidationError("protocol version is empty", { code: "MISSING_REQUIRED_FIELD" });
  }
  if (!isKnownProtoVersion(protoVersion)) {
    console.warn(`[config] unknown protocol version ${protoVersion}, sending it as-is`);
  }

  const retries = overrides.retries ?? file.retries ?? envRetries() ?? TIMING.RETRY_COUNT;
  if (!Number.isInteger(retries) || retries < 0) {
    throw new ValidationError(`retries must be a non-negative integer, got ${retries}`, {
      code: "INVALID_FORMAT",
    });
  }

  return {
    token,
    baseUrl: normalizeBaseUrl(baseUrl),
    protoVersion,
    retries,
    requestTimeoutMs: overrides.requestTimeoutMs ?? TIMING.REQUEST_TIMEOUT_MS,
  };
}
