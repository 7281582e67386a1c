import { parse } from "smol-toml";
import { readFileSync } from "fs";
import { resolve } from "path";

export type ExportVariant = "bulk" | "standard";
export type CacheBackend = "file" | "postgres";

export interface ZendeskSettings {
  subdomain?: string;
  base_url?: string;
  page_size: number;
  max_ids_per_request: number;
}

export interface ExportSettings {
  output_dir: string;
  concurrency: number;
  variant: ExportVariant;
}

export interface CacheSettings {
  backend: CacheBackend;
  path: string;
  ttl_hours: number;
}

export interface RetrySettings {
  max_attempts: number;
  base_delay_ms: number;
  max_delay_ms: number;
}

export interface Config {
  zendesk: ZendeskSettings;
  export: ExportSettings;
  cache: CacheSettings;
  retry: RetrySettings;
}

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Table, name: string): Table {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isTable(value)) {
    throw new Error(`config.toml: [${name}] must be a table`);
  }
  return value;
}

function optionalString(table: Table, key: string, where: string): string | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(`config.toml: ${where}.${key} must be a non-empty string`);
  }
  return value;
}

function positiveInt(table: Table, key: string, where: string, fallback: number): number {
  const value = table[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new Error(`config.toml: ${where}.${key} must be a positive integer`);
  }
  return value;
}

function oneOf<T extends string>(table: Table, key: string, where: string, allowed: readonly T[], fallback: T): T {
  const value = table[key];
  if (value === undefined) return fallback;
  const match = allowed.find((a) => a === value);
  if (!match) {
    throw new Error(`config.toml: ${where}.${key} must be one of ${allowed.join(", ")}`);
  }
  return match;
}

/**
 * Validate a parsed TOML document and fill in defaults.
 */
export function buildConfig(raw: Table): Config {
  const zendesk = section(raw, "zendesk");
  const exp = section(raw, "export");
  const cache = section(raw, "cache");
  const retry = section(raw, "retry");

  const subdomain = optionalString(zendesk, "subdomain", "zendesk");
  const baseUrl = optionalString(zendesk, "base_url", "zendesk");
  if (!subdomain && !baseUrl && !process.env.ZENDESK_SUBDOMAIN) {
    throw new Error("config.toml: [zendesk] subdomain or base_url is required");
  }

  const maxAttempts = positiveInt(retry, "max_attempts", "retry", 3);
  const baseDelay = positiveInt(retry, "base_delay_ms", "retry", 500);
  const maxDelay = positiveInt(retry, "max_delay_ms", "retry", 8000);
  if (maxDelay < baseDelay) {
    throw new Error("config.toml: retry.max_delay_ms must be >= retry.base_delay_ms");
  }

  return {
    zendesk: {
      subdomain,
      base_url: baseUrl,
      page_size: Math.min(positiveInt(zendesk, "page_size", "zendesk", 100), 100),
      max_ids_per_request: Math.min(positiveInt(zendesk, "max_ids_per_request", "zendesk", 100), 100),
    },
    export: {
      output_dir: optionalString(exp, "output_dir", "export") ?? "./data/exports",
      concurrency: positiveInt(exp, "concurrency", "export", 5),
      variant: oneOf(exp, "variant", "export", ["bulk", "standard"] as const, "bulk"),
    },
    cache: {
      backend: oneOf(cache, "backend", "cache", ["file", "postgres"] as const, "file"),
      path: optionalString(cache, "path", "cache") ?? "./data/user-cache.json",
      ttl_hours: positiveInt(cache, "ttl_hours", "cache", 24),
    },
    retry: {
      max_attempts: maxAttempts,
      base_delay_ms: baseDelay,
      max_delay_ms: maxDelay,
    },
  };
}

export function loadConfig(configPath?: string): Config {
  const p = configPath ?? resolve(process.cwd(), "config.toml");
  const raw = readFileSync(p, "utf-8");
  return buildConfig(parse(raw));
}

/**
 * Resolve the helpdesk root URL, e.g. "https://acme.zendesk.com".
 * ZENDESK_SUBDOMAIN in the environment wins over the file.
 */
export function resolveBaseUrl(config: Config): string {
  const subdomain = process.env.ZENDESK_SUBDOMAIN ?? config.zendesk.subdomain;
  if (subdomain) return `https://${subdomain}.zendesk.com`;
  if (config.zendesk.base_url) return config.zendesk.base_url.replace(/\/+$/, "");
  throw new Error("config.toml: [zendesk] subdomain or base_url is required");
}

export function cacheTtlMs(config: Config): number {
  return config.cache.ttl_hours * 60 * 60 * 1000;
}
