/**
 * Configuration schema.
 * Config files are plain objects; this module fills defaults, applies
 * environment overrides and rejects anything malformed.
 */

import { z } from "zod";
import { ConfigValidationError } from "../errors/config.errors.js";
import { LOG_LEVELS, type LogLevel } from "../logging/logger.js";

// ── Regions ──

const REGION_NAMES = ["SNYK-US-01", "SNYK-US-02", "SNYK-EU-01", "SNYK-AU-01"] as const;

export type SnykRegion = (typeof REGION_NAMES)[number];

export const SNYK_REGIONS: Record<SnykRegion, { apiUrl: string; appUrl: string }> = {
  "SNYK-US-01": { apiUrl: "https://api.snyk.io/rest", appUrl: "https://app.snyk.io" },
  "SNYK-US-02": { apiUrl: "https://api.us.snyk.io/rest", appUrl: "https://app.us.snyk.io" },
  "SNYK-EU-01": { apiUrl: "https://api.eu.snyk.io/rest", appUrl: "https://app.eu.snyk.io" },
  "SNYK-AU-01": { apiUrl: "https://api.au.snyk.io/rest", appUrl: "https://app.au.snyk.io" },
};

// ── Schema ──

const versionList = z.array(z.string().regex(/^\d{4}-\d{2}-\d{2}(~[a-z]+)?$/)).min(1);

const configSchema = z
  .object({
    snyk: z
      .object({
        token: z.string().min(1),
        region: z.enum(REGION_NAMES).default("SNYK-US-01"),
        /** Overrides the region's REST base */
        apiUrl: z.string().url().optional(),
        orgId: z.string().min(1).optional(),
        groupId: z.string().min(1).optional(),
        integrationTypes: z.array(z.string().min(1)).min(1).default(["gitlab", "cli"]),
        versions: z
          .object({
            organizations: versionList.default(["2024-10-15", "2023-05-29", "2023-06-18"]),
            groups: versionList.default(["2024-10-15", "2023-05-29"]),
            targets: versionList.default(["2024-10-15", "2024-09-04", "2023-05-29", "2023-06-18"]),
            projects: versionList.default(["2024-10-15"]),
          })
          .strict()
          .default({}),
      })
      .strict(),
    gitlab: z
      .object({
        url: z.string().url().default("https://gitlab.com"),
        token: z.string().min(1).optional(),
        /** Extra hosts to treat as GitLab when resolving target URLs */
        hosts: z.array(z.string().min(1)).default([]),
      })
      .strict()
      .default({}),
    http: z
      .object({
        maxRetries: z.number().int().min(0).default(3),
        baseDelayMs: z.number().int().min(0).default(1000),
        rateLimitFallbackMs: z.number().int().min(0).default(5000),
        timeoutMs: z.number().int().positive().default(30000),
        pageSize: z.number().int().min(1).max(100).default(100),
      })
      .strict()
      .default({}),
    duplicates: z
      .object({
        enabled: z.boolean().default(true),
        separator: z.string().min(1).default(":"),
      })
      .strict()
      .default({}),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .strict();

/** Shape accepted from config files and `defineConfig` */
export type ScanDriftConfigInput = z.input<typeof configSchema>;

/** Fully defaulted config handed to the rest of the system */
export type ScanDriftConfig = z.output<typeof configSchema>;

/** Type helper for scan-drift.config files */
export function defineConfig(config: ScanDriftConfigInput): ScanDriftConfigInput {
  return config;
}

// ── Environment overrides ──

type Env = Record<string, string | undefined>;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Layer SNYK_* / GITLAB_* variables over a raw config object */
export function applyEnvOverrides(raw: unknown, env: Env): Record<string, unknown> {
  const base: Record<string, unknown> = isRecord(raw) ? raw : {};
  const snyk: Record<string, unknown> = isRecord(base.snyk) ? { ...base.snyk } : {};
  const gitlab: Record<string, unknown> = isRecord(base.gitlab) ? { ...base.gitlab } : {};
  const out: Record<string, unknown> = { ...base };

  if (env.SNYK_TOKEN) snyk.token = env.SNYK_TOKEN;
  if (env.SNYK_REGION) snyk.region = env.SNYK_REGION;
  if (env.SNYK_ORG_ID) snyk.orgId = env.SNYK_ORG_ID;
  if (env.SNYK_GROUP_ID) snyk.groupId = env.SNYK_GROUP_ID;
  if (env.GITLAB_URL) gitlab.url = env.GITLAB_URL;
  if (env.GITLAB_TOKEN) gitlab.token = env.GITLAB_TOKEN;
  const level = env.SCAN_DRIFT_LOG_LEVEL;
  if (level && isLogLevel(level)) out.logLevel = level;

  out.snyk = snyk;
  out.gitlab = gitlab;
  return out;
}

/** Validate a raw config object, throwing ConfigValidationError with every issue */
export function parseConfig(raw: unknown, env: Env = {}): ScanDriftConfig {
  const result = configSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    );
  }
  return result.data;
}

/** REST base for the configured region, honoring an explicit apiUrl */
export function snykApiUrl(config: ScanDriftConfig): string {
  return (config.snyk.apiUrl ?? SNYK_REGIONS[config.snyk.region].apiUrl).replace(/\/+$/, "");
}

export function snykAppUrl(config: ScanDriftConfig): string {
  return SNYK_REGIONS[config.snyk.region].appUrl;
}
