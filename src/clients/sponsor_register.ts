import type { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { AppConfig } from '../config';
import type { SponsorRegisterSource, SponsorRow } from '../types';
import { NetworkError, ValidationError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { createHttpClient } from './http';

const RecordsSchema = z.array(z.record(z.string()));

const COLUMN_ALIASES = {
    name: ['Organisation Name', 'Organisation name'],
    locality: ['Town/City', 'Town', 'City'],
    county: ['County'],
    route: ['Route'],
    sub_route: ['Sub Route', 'Sub-route'],
} satisfies Record<keyof SponsorRow, string[]>;

function pick(record: Record<string, string>, names: string[]): string {
    for (const name of names) {
        const value = record[name];
        if (value !== undefined) return value.replace(/\s+/g, ' ').trim();
    }
    return '';
}

/**
 * First link on the publication page that points at a CSV file.
 */
export function findCsvLink(html: string, pageUrl: string): string | null {
    const $ = cheerio.load(html);
    let found: string | null = null;
    $('a[href]').each((_, el) => {
        const href = ($(el).attr('href') || '').trim();
        if (/\.csv(?:$|[?#])/i.test(href)) {
            try {
                found = new URL(href, pageUrl).href;
                return false;
            } catch {
                return undefined;
            }
        }
        return undefined;
    });
    return found;
}

export function parseSponsorCsv(csvText: string): SponsorRow[] {
    let raw: unknown;
    try {
        raw = parse(csvText, {
            columns: true,
            bom: true,
            skip_empty_lines: true,
            relax_column_count: true,
            trim: true,
        });
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ValidationError(`Sponsor register CSV parse failed: ${message}`);
    }

    const records = RecordsSchema.safeParse(raw);
    if (!records.success) {
        throw new ValidationError('Sponsor register CSV has an unexpected shape');
    }

    return records.data
        .map((r) => ({
            name: pick(r, COLUMN_ALIASES.name),
            locality: pick(r, COLUMN_ALIASES.locality),
            county: pick(r, COLUMN_ALIASES.county),
            route: pick(r, COLUMN_ALIASES.route),
            sub_route: pick(r, COLUMN_ALIASES.sub_route),
        }))
        .filter((r) => r.name !== '');
}

/**
 * 📋 SPONSOR REGISTER SOURCE
 * Resolves the CSV link from the publication page (unless a direct CSV URL is
 * configured) and parses the register.
 */
export class GovUkSponsorRegister implements SponsorRegisterSource {
    private readonly http: AxiosInstance;

    constructor(private readonly config: AppConfig, http?: AxiosInstance) {
        this.http = http ?? createHttpClient({
            timeoutMs: Math.max(config.runtime.httpTimeoutMs, 60000),
            retries: config.runtime.httpRetries,
            userAgent: config.runtime.userAgent,
        });
    }

    private async getText(url: string): Promise<string> {
        try {
            const res = await this.http.get<string>(url, { responseType: 'text' });
            return typeof res.data === 'string' ? res.data : String(res.data);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new NetworkError(`Sponsor register download failed: ${message}`, { url });
        }
    }

    async resolveCsvUrl(): Promise<string> {
        if (this.config.runtime.sponsorRegisterCsvUrl) {
            return this.config.runtime.sponsorRegisterCsvUrl;
        }
        const pageUrl = this.config.runtime.sponsorRegisterPageUrl;
        const link = findCsvLink(await this.getText(pageUrl), pageUrl);
        if (!link) {
            throw new ValidationError('No CSV link found on the sponsor register page', { url: pageUrl });
        }
        return link;
    }

    async fetchRows(): Promise<SponsorRow[]> {
        const csvUrl = await this.resolveCsvUrl();
        const rows = parseSponsorCsv(await this.getText(csvUrl));
        Logger.info(`📋 Sponsor register loaded: ${rows.length} rows`, { url: csvUrl });
        return rows;
    }
}
