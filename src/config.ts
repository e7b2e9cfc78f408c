import { readFileSync, existsSync } from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import path from 'path';
import { config as loadDotenv } from 'dotenv';

// Load .env file
loadDotenv();

export const SITE_IDS = ['craigslist', 'apartments', 'hotpads', 'zillow'] as const;

const SearchConfigSchema = z.object({
  towns: z.array(z.string().min(1)).min(1).default(['Troy', 'Albany', 'Schenectady']),
  state: z.string().default('NY'),
  priceMin: z.number().int().nonnegative().default(1000),
  priceMax: z.number().int().nonnegative().default(1150),
  bedrooms: z.number().int().nonnegative().default(1),
}).refine((s) => s.priceMin <= s.priceMax, {
  message: 'search.priceMin must not exceed search.priceMax',
});

const ScraperConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(45000),
  requestTimeoutMs: z.number().int().positive().default(20000),
  concurrency: z.number().int().default(2).transform((n) => Math.min(4, Math.max(1, n))),
  maxCardsPerPage: z.number().int().positive().default(50),
});

const StorageConfigSchema = z.object({
  path: z.string().default(process.env.DATABASE_PATH || './data/seen.db'),
  runLogPath: z.string().default('./data/runs.db'),
});

const ScheduleConfigSchema = z.object({
  intervalMinutes: z.number().positive().default(60),
  runOnStart: z.boolean().default(true),
});

const EmailConfigSchema = z.object({
  fromName: z.string().default('ApartmentBot'),
  smtp: z.object({
    host: z.string().default('smtp.gmail.com'),
    port: z.number().int().default(465),
    secure: z.boolean().default(true),
  }).default({}),
});

const ConfigSchema = z.object({
  search: SearchConfigSchema.default({}),
  sites: z.array(z.enum(SITE_IDS)).min(1).default([...SITE_IDS])
    .transform((sites) => Array.from(new Set(sites))),
  scraper: ScraperConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  schedule: ScheduleConfigSchema.default({}),
  email: EmailConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type EmailConfig = z.infer<typeof EmailConfigSchema>;

let cachedConfig: Config | null = null;

/**
 * Validate an already-parsed YAML document (or `{}` for all defaults).
 */
export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw ?? {});
}

export function loadConfig(configPath?: string): Config {
  if (cachedConfig && !configPath) return cachedConfig;

  const resolvedPath = path.resolve(
    configPath || process.env.APTWATCH_CONFIG || './config/config.local.yaml'
  );

  if (!existsSync(resolvedPath)) {
    throw new Error(
      `Config file not found at ${resolvedPath}\n` +
      `Please copy config/config.example.yaml to config/config.local.yaml and adjust your search.`
    );
  }

  const rawConfig = readFileSync(resolvedPath, 'utf-8');
  const config = parseConfig(parse(rawConfig));

  if (!configPath) cachedConfig = config;
  return config;
}

export function getEnv(key: string, required = true): string {
  const value = process.env[key];
  if (!value && required) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

export function getEmailCredentials(): { user: string; password: string } {
  return {
    user: getEnv('EMAIL_USER'),
    password: getEnv('EMAIL_PASSWORD'),
  };
}

export function getRecipient(): string {
  return getEnv('RECIPIENT_EMAIL');
}
