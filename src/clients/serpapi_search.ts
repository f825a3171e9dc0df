import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppConfig } from '../config';
import type { SearchProvider, SerpResult } from '../types';
import { ConfigurationError, NetworkError, ValidationError } from '../utils/errors';
import { createHttpClient } from './http';

const SerpApiResponseSchema = z.object({
    organic_results: z.array(z.object({
        title: z.string().default(''),
        link: z.string().default(''),
        snippet: z.string().default(''),
    })).default([]),
    error: z.string().optional(),
});

/**
 * en-GB → { hl: 'en', gl: 'uk' }
 */
export function localeParams(locale: string): { hl: string; gl: string } {
    const [lang = 'en', region = 'GB'] = locale.split(/[-_]/);
    const gl = region.toLowerCase() === 'gb' ? 'uk' : region.toLowerCase();
    return { hl: lang.toLowerCase(), gl };
}

export class SerpApiSearchProvider implements SearchProvider {
    readonly name = 'serpapi';
    private readonly http: AxiosInstance;

    constructor(private readonly config: AppConfig, http?: AxiosInstance) {
        if (!http && !config.runtime.serpApiKey) {
            throw new ConfigurationError('SERPAPI_API_KEY is required');
        }
        this.http = http ?? createHttpClient({
            baseURL: 'https://serpapi.com',
            timeoutMs: config.runtime.httpTimeoutMs,
            retries: config.runtime.httpRetries,
            userAgent: config.runtime.userAgent,
        });
    }

    async query(q: string, locale: string): Promise<SerpResult[]> {
        let data: unknown;
        try {
            const res = await this.http.get<unknown>('/search.json', {
                params: {
                    engine: 'google',
                    q,
                    num: 10,
                    api_key: this.config.runtime.serpApiKey,
                    ...localeParams(locale),
                },
            });
            data = res.data;
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new NetworkError(`SerpAPI request failed: ${message}`);
        }

        const parsed = SerpApiResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new ValidationError('Unexpected SerpAPI payload');
        }
        if (parsed.data.error && parsed.data.organic_results.length === 0) {
            // "no results" is reported through the error field
            if (/hasn't returned any results/i.test(parsed.data.error)) return [];
            throw new NetworkError(`SerpAPI error: ${parsed.data.error}`);
        }
        return parsed.data.organic_results.filter((r) => r.link);
    }
}
