// src/config.ts
//
// settings.json is the source of truth. Strings may reference environment
// variables as ${NAME}; unset variables become empty strings.

import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { FolderMatch } from "./change-detector.js";
import {
  DEFAULT_COPY_TIMEOUT_MS,
  DEFAULT_MAX_COPY_RETRIES,
  DEFAULT_RETENTION_DAYS,
  DEFAULT_RETRY_BACKOFF_BASE_MS,
  DEFAULT_WORKER_POOL_SIZE,
} from "./constants.js";
import { ConfigError, errorMessage } from "./errors.js";
import { CURATED_HASH_ALGOS, listSupportedHashes, type HashAlg } from "./hash.js";
import { parseLogLevel } from "./logger.js";
import type { FilterCriteria } from "./records.js";

/** What the engine consumes; passed explicitly, never read from globals. */
export interface EngineConfig {
  maxCopyRetries: number;
  retryBackoffBaseMs: number;
  workerPoolSize: number;
  copyTimeoutMs: number;
  verifyChecksum: boolean;
  checksumAlgorithm: HashAlg;
  mtimeToleranceMs: number;
  folderMatch: FolderMatch;
  ignore: string[];
}

export function defaultEngineConfig(
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  return {
    maxCopyRetries: DEFAULT_MAX_COPY_RETRIES,
    retryBackoffBaseMs: DEFAULT_RETRY_BACKOFF_BASE_MS,
    workerPoolSize: DEFAULT_WORKER_POOL_SIZE,
    copyTimeoutMs: DEFAULT_COPY_TIMEOUT_MS,
    verifyChecksum: false,
    checksumAlgorithm: "sha256",
    mtimeToleranceMs: 0,
    folderMatch: "exact",
    ignore: [],
    ...overrides,
  };
}

const commandSchema = z.array(z.string().min(1)).min(1);

const settingsSchema = z.object({
  paths: z.object({
    sourceRoot: z.string().min(1),
    destinationRoot: z.string().min(1),
    recordsFile: z.string().min(1),
    ledger: z.string().min(1).default("state/ledger.db"),
  }),
  filter: z.object({
    matchColumn: z.string().min(1),
    matchValue: z.string().min(1),
    emptyColumn: z.string().min(1),
    idColumn: z.string().min(1).optional(),
  }),
  transfer: z
    .object({
      maxCopyRetries: z.number().int().min(1).default(DEFAULT_MAX_COPY_RETRIES),
      retryBackoffBaseMs: z
        .number()
        .int()
        .min(0)
        .default(DEFAULT_RETRY_BACKOFF_BASE_MS),
      workerPoolSize: z.number().int().min(1).max(64).default(DEFAULT_WORKER_POOL_SIZE),
      copyTimeoutMs: z.number().int().min(0).default(DEFAULT_COPY_TIMEOUT_MS),
      verifyChecksum: z.boolean().default(false),
      checksumAlgorithm: z
        .enum(CURATED_HASH_ALGOS)
        .refine((alg) => listSupportedHashes().includes(alg), {
          message: "not available in this Node.js build",
        })
        .default("sha256"),
      mtimeToleranceMs: z.number().int().min(0).default(0),
      folderMatch: z.enum(["exact", "case-insensitive", "contains"]).default("exact"),
      ignore: z.array(z.string()).default([]),
    })
    .default({}),
  ledger: z
    .object({
      format: z.enum(["sqlite", "jsonl"]).default("sqlite"),
      retentionDays: z.number().int().min(1).default(DEFAULT_RETENTION_DAYS),
    })
    .default({}),
  connectivity: z
    .object({
      checkCommand: commandSchema.nullable().default(null),
      connectCommand: commandSchema.nullable().default(null),
      retries: z.number().int().min(1).default(3),
      retryDelayMs: z.number().int().min(0).default(5_000),
      timeoutMs: z.number().int().min(1).default(30_000),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      file: z.string().min(1).nullable().default(null),
    })
    .default({}),
});

export type Settings = z.infer<typeof settingsSchema>;

export interface LoadedSettings {
  settings: Settings;
  source: string;
}

export function substituteEnv(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Za-z0-9_]+)\}/g, (_, name: string) => env[name] ?? "");
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, substituteEnv(v, env)]),
    );
  }
  return value;
}

export function settingsSearchPaths(
  explicit?: string,
  cwd: string = process.cwd(),
): string[] {
  if (explicit) return [path.resolve(cwd, explicit)];
  return [
    path.join(cwd, "settings.json"),
    path.join(cwd, "config", "settings.json"),
  ];
}

export function parseSettings(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Settings {
  const parsed = settingsSchema.safeParse(substituteEnv(raw, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".") || "<root>"}: ${i.message}`,
    );
    throw new ConfigError(`invalid settings: ${issues.join("; ")}`, issues);
  }
  const settings = parsed.data;
  const envLevel = env.BATCH_RELAY_LOG_LEVEL;
  if (envLevel) {
    settings.logging.level = parseLogLevel(envLevel, settings.logging.level);
  }
  return settings;
}

export function loadSettings(
  explicit?: string,
  opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): LoadedSettings {
  const candidates = settingsSearchPaths(explicit, opts.cwd);
  const found = candidates.find((p) => existsSync(p));
  if (!found) {
    throw new ConfigError(
      `settings.json not found; looked in: ${candidates.join(", ")}`,
    );
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigError(`unable to parse ${found}: ${errorMessage(err)}`);
  }
  const settings = parseSettings(raw, opts.env);
  // relative paths are relative to the settings file, not the cwd
  const base = path.dirname(found);
  for (const key of ["sourceRoot", "destinationRoot", "recordsFile", "ledger"] as const) {
    settings.paths[key] = path.resolve(base, settings.paths[key]);
  }
  if (settings.logging.file) {
    settings.logging.file = path.resolve(base, settings.logging.file);
  }
  return { settings, source: found };
}

export function engineConfigFrom(settings: Settings): EngineConfig {
  return defaultEngineConfig({ ...settings.transfer });
}

export function criteriaFrom(settings: Settings): FilterCriteria {
  const { matchColumn, matchValue, emptyColumn } = settings.filter;
  return { matchColumn, matchValue, emptyColumn };
}

