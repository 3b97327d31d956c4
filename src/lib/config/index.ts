/**
 * Application configuration
 * Environment variables (optionally from .env) plus the JSON feed source list.
 * The source list is validated with zod and frozen: reconfiguring means restarting.
 */

import { readFileSync } from 'fs';
import path from 'path';
import cron from 'node-cron';
import { z } from 'zod';
import { ConfigError } from '../errors';
import type { FeedSource } from '../db/models';

const categorySchema = z
  .string()
  .regex(/^[A-Z][A-Z0-9_]*$/, 'category must be an upper-case tag such as CYBERSEC');

export const feedSourceSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  url: z.string().url(),
  categories: z.array(categorySchema).min(1),
  fetchMethod: z.literal('rss').default('rss'),
  /** Suggested refresh interval in minutes */
  updateIntervalMin: z.number().int().positive().default(60),
  enabled: z.boolean().default(true),
});

export const sourcesFileSchema = z.object({
  feedSources: z.array(feedSourceSchema).superRefine((sources, ctx) => {
    const seen = new Set<string>();
    sources.forEach((source, index) => {
      if (seen.has(source.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate source id "${source.id}"`,
          path: [index, 'id'],
        });
      }
      seen.add(source.id);
    });
  }),
});

export interface AppConfig {
  feedConfigPath: string;
  storeUrl: string;
  fetchTimeoutMs: number;
  maxConcurrentFetches: number;
  refreshCron: string;
  retentionDays: number;
  sources: readonly FeedSource[];
}

export const DEFAULTS = {
  feedConfigPath: 'config/sources.json',
  storeUrl: 'file:data/intelligence.db',
  fetchTimeoutSeconds: 30,
  maxConcurrentFetches: 5,
  refreshCron: '*/5 * * * *',
  retentionDays: 30,
} as const;

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/** Validate an already-parsed source list; the result is deeply frozen. */
export function parseSources(input: unknown): readonly FeedSource[] {
  const result = sourcesFileSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid feed source configuration: ${formatIssues(result.error)}`);
  }
  return Object.freeze(
    result.data.feedSources.map((source) =>
      Object.freeze({ ...source, categories: Object.freeze([...source.categories]) })
    )
  );
}

export function loadSources(filePath: string): readonly FeedSource[] {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read feed source file ${filePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Feed source file ${filePath} is not valid JSON`, { cause: error });
  }
  return parseSources(parsed);
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const feedConfigPath = path.resolve(cwd, env.FEED_CONFIG_PATH || DEFAULTS.feedConfigPath);
  const refreshCron = env.REFRESH_CRON || DEFAULTS.refreshCron;

  if (!cron.validate(refreshCron)) {
    throw new ConfigError(`REFRESH_CRON is not a valid cron expression: "${refreshCron}"`);
  }

  return {
    feedConfigPath,
    storeUrl: env.STORE_URL || DEFAULTS.storeUrl,
    fetchTimeoutMs: positiveInt(env, 'FETCH_TIMEOUT_SECONDS', DEFAULTS.fetchTimeoutSeconds) * 1000,
    maxConcurrentFetches: positiveInt(env, 'MAX_CONCURRENT_FETCHES', DEFAULTS.maxConcurrentFetches),
    refreshCron,
    retentionDays: positiveInt(env, 'RETENTION_DAYS', DEFAULTS.retentionDays),
    sources: loadSources(feedConfigPath),
  };
}
