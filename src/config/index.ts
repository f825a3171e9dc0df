import * as dotenv from 'dotenv';
import fs from 'fs';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

const stringList = z.array(z.string().min(1));

const TierSchema = z.object({
    max_days: z.number().int().min(0),
    points: z.number().int(),
});

const SettingsSchema = z.object({
    normalizer: z.object({
        domestic_countries: stringList,
        domestic_nationalities: stringList,
        min_clean_name_length: z.number().int().min(1),
        max_non_alnum_ratio: z.number().min(0).max(1),
    }),
    identity: z.object({
        match_threshold: z.number().int().min(0).max(100),
        locality_bonus: z.number().int().min(0),
        active_bonus: z.number().int().min(0),
        results_per_query: z.number().int().min(1).max(100),
    }),
    sponsor: z.object({
        route_allowlist: stringList,
    }),
    signals: z.object({
        recency_tiers: z.array(TierSchema).min(1),
        mailbox_phrases: stringList,
        sector_boost_keywords: stringList,
        sector_penalty_keywords: stringList,
        sector_boost_code_prefixes: stringList,
        sector_penalty_code_prefixes: stringList,
        priority_countries: stringList,
        subsidiary_tokens: stringList,
    }),
    scoring: z.object({
        thresholds: z.object({
            hot: z.number().int().min(0).max(100),
            medium: z.number().int().min(0).max(100),
        }).refine((t) => t.hot >= t.medium, 'hot threshold must be >= medium threshold'),
        incorporation_base: z.number().int(),
        route_weights: z.array(z.object({ match: z.string().min(1), points: z.number().int() })),
        weights: z.object({
            foreign_beneficial_owner: z.number().int(),
            corporate_beneficial_owner: z.number().int(),
            foreign_officer_residence: z.number().int(),
            foreign_officer_address: z.number().int(),
            foreign_officer_nationality: z.number().int(),
            foreign_registered_office: z.number().int(),
            priority_country: z.number().int(),
            subsidiary_name: z.number().int(),
            mailbox_per_hit: z.number().int().max(0),
            mailbox_floor: z.number().int().max(0),
            sector_boost: z.number().int().min(0),
            sector_penalty: z.number().int().max(0),
            verified_site: z.number().int().min(0),
            plausible_site: z.number().int().min(0),
            hiring_intent_max: z.number().int().min(0),
        }),
        max_rationale: z.number().int().min(1),
    }),
    enrichment: z.object({
        locale: z.string(),
        top_k: z.number().int().min(1).max(5),
        verified_threshold: z.number().int().min(0).max(10),
        plausible_threshold: z.number().int().min(0).max(10),
        max_follow_links: z.number().int().min(0).max(10),
        page_text_limit: z.number().int().min(1000),
        verification: z.object({
            identifier_points: z.number().int().min(0),
            postcode_points: z.number().int().min(0),
            name_high_similarity: z.number().int().min(0).max(100),
            name_high_points: z.number().int().min(0),
            name_moderate_similarity: z.number().int().min(0).max(100),
            name_moderate_points: z.number().int().min(0),
            confirmation_bonus: z.number().int().min(0),
        }),
        deny_domains: stringList,
        directory_phrases: stringList,
        free_hosting: stringList,
        candidate_path_hints: stringList,
        follow_link_hints: stringList,
        role_email_prefixes: stringList,
        preferred_email_prefixes: stringList,
        placeholder_email_domains: stringList,
        free_mail_domains: stringList,
        hiring_intent: z.object({
            max_queries: z.number().int().min(0).max(5),
            role_keywords: stringList,
            positive_keywords: stringList,
            negative_keywords: stringList,
        }),
    }),
    leads: z.object({
        max_output: z.number().int().min(1),
        min_output: z.number().int().min(0),
        backfill_days: z.number().int().min(1),
        resurface_cooldown_days: z.number().int().min(0),
        backfill_scan_limit: z.number().int().min(1),
    }),
});

const EnvSchema = z.object({
    COMPANIES_HOUSE_API_KEY: z.string().optional(),
    SERPAPI_API_KEY: z.string().optional(),
    SQLITE_PATH: z.string().optional(),
    OUTPUT_CSV_PATH: z.string().optional(),
    SPONSOR_REGISTER_PAGE_URL: z.string().url().optional(),
    SPONSOR_REGISTER_CSV_URL: z.string().url().optional(),
    SETTINGS_PATH: z.string().optional(),
    LOOKBACK_DAYS: z.string().optional(),
    INCORPORATIONS_MAX: z.string().optional(),
    SEARCH_MAX_CALLS_PER_RUN: z.string().optional(),
    SEARCH_SLEEP_MS: z.string().optional(),
    MAX_OUTPUT_LEADS: z.string().optional(),
    MIN_OUTPUT_LEADS: z.string().optional(),
    ENRICH_CACHE_DAYS: z.string().optional(),
    ENRICH_CONCURRENCY: z.string().optional(),
    HTTP_TIMEOUT_MS: z.string().optional(),
    PAGE_TIMEOUT_MS: z.string().optional(),
    HTTP_RETRIES: z.string().optional(),
    INCLUDE_PERSONAL_EMAILS: z.enum(['true', 'false']).optional(),
    HIRING_INTENT_ENABLED: z.enum(['true', 'false']).optional(),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug']).optional(),
    LOG_DIR: z.string().optional(),
    SERVICE_NAME: z.string().optional(),
    NODE_ENV: z.string().optional(),
});

function parseInteger(
    value: string | undefined,
    fallback: number,
    name: string,
    opts?: { min?: number; max?: number }
): number {
    if (value === undefined || value === '') {
        return fallback;
    }

    const n = Number.parseInt(value, 10);
    if (!Number.isFinite(n)) {
        throw new ConfigurationError(`${name} must be an integer`);
    }
    if (opts?.min !== undefined && n < opts.min) {
        throw new ConfigurationError(`${name} must be >= ${opts.min}`);
    }
    if (opts?.max !== undefined && n > opts.max) {
        throw new ConfigurationError(`${name} must be <= ${opts.max}`);
    }
    return n;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `- ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n');
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object') {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

export const DEFAULT_SETTINGS_PATH = fileURLToPath(new URL('./default.yaml', import.meta.url));

function readSettings(settingsPath: string) {
    let raw: unknown;
    try {
        raw = yaml.load(fs.readFileSync(settingsPath, 'utf8'));
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(`Cannot read settings file ${settingsPath}: ${reason}`);
    }

    const parsed = SettingsSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid settings file ${settingsPath}:\n${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

export interface LoadConfigOptions {
    env?: Record<string, string | undefined>;
    settingsPath?: string;
    loadDotenv?: boolean;
}

export function loadConfig(options: LoadConfigOptions = {}) {
    if (options.loadDotenv) {
        dotenv.config();
    }

    const parsed = EnvSchema.safeParse(options.env ?? process.env);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid environment configuration:\n${formatIssues(parsed.error)}`);
    }
    const env = parsed.data;

    const settings = readSettings(options.settingsPath || env.SETTINGS_PATH || DEFAULT_SETTINGS_PATH);

    const maxOutput = parseInteger(env.MAX_OUTPUT_LEADS, settings.leads.max_output, 'MAX_OUTPUT_LEADS', { min: 1, max: 500 });
    const minOutput = parseInteger(env.MIN_OUTPUT_LEADS, settings.leads.min_output, 'MIN_OUTPUT_LEADS', { min: 0, max: 500 });

    const config = {
        ...settings,
        leads: {
            ...settings.leads,
            max_output: maxOutput,
            min_output: Math.min(minOutput, maxOutput),
        },
        runtime: {
            companiesHouseApiKey: env.COMPANIES_HOUSE_API_KEY || '',
            serpApiKey: env.SERPAPI_API_KEY || '',
            sqlitePath: env.SQLITE_PATH || './data/lead_radar.sqlite',
            outputCsvPath: env.OUTPUT_CSV_PATH || '',
            sponsorRegisterPageUrl: env.SPONSOR_REGISTER_PAGE_URL
                || 'https://www.gov.uk/government/publications/register-of-licensed-sponsors-workers',
            sponsorRegisterCsvUrl: env.SPONSOR_REGISTER_CSV_URL || '',
            lookbackDays: parseInteger(env.LOOKBACK_DAYS, 30, 'LOOKBACK_DAYS', { min: 1, max: 365 }),
            incorporationsMax: parseInteger(env.INCORPORATIONS_MAX, 140, 'INCORPORATIONS_MAX', { min: 0, max: 5000 }),
            searchMaxCallsPerRun: parseInteger(env.SEARCH_MAX_CALLS_PER_RUN, 80, 'SEARCH_MAX_CALLS_PER_RUN', { min: 0 }),
            searchSleepMs: parseInteger(env.SEARCH_SLEEP_MS, 1200, 'SEARCH_SLEEP_MS', { min: 0 }),
            enrichCacheDays: parseInteger(env.ENRICH_CACHE_DAYS, 60, 'ENRICH_CACHE_DAYS', { min: 0 }),
            enrichConcurrency: parseInteger(env.ENRICH_CONCURRENCY, 1, 'ENRICH_CONCURRENCY', { min: 1, max: 16 }),
            httpTimeoutMs: parseInteger(env.HTTP_TIMEOUT_MS, 30000, 'HTTP_TIMEOUT_MS', { min: 1000 }),
            pageTimeoutMs: parseInteger(env.PAGE_TIMEOUT_MS, 20000, 'PAGE_TIMEOUT_MS', { min: 1000 }),
            httpRetries: parseInteger(env.HTTP_RETRIES, 3, 'HTTP_RETRIES', { min: 0, max: 10 }),
            includePersonalEmails: env.INCLUDE_PERSONAL_EMAILS === 'true',
            hiringIntentEnabled: env.HIRING_INTENT_ENABLED === 'true',
            userAgent: 'Mozilla/5.0 (compatible; LeadRadar/1.0; +https://example.org/bot)',
        },
        logging: {
            level: env.LOG_LEVEL || 'info',
            production: env.NODE_ENV === 'production',
            serviceName: env.SERVICE_NAME || 'lead-radar',
            logDir: env.LOG_DIR || undefined,
        },
    };

    return deepFreeze(config);
}

export type AppConfig = ReturnType<typeof loadConfig>;
