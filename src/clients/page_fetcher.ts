import type { AxiosInstance } from 'axios';
import axios from 'axios';
import * as cheerio from 'cheerio';
import type { AppConfig } from '../config';
import type { FetchedPage, PageFetcher, PageLink } from '../types';
import { Logger } from '../utils/logger';

const MAX_BODY_BYTES = 2_000_000;

/**
 * Visible text and absolute links of an HTML document. `mailto:` addresses are
 * appended to the text so that contact extraction sees them.
 */
export function parsePage(html: string, baseUrl: string): { text: string; links: PageLink[] } {
    const $ = cheerio.load(html);
    $('script, style, noscript, template, svg').remove();

    const links: PageLink[] = [];
    const mailto: string[] = [];
    $('a[href]').each((_, el) => {
        const href = ($(el).attr('href') || '').trim();
        if (/^mailto:/i.test(href)) {
            const address = decodeURIComponent(href.slice(7).split('?')[0] ?? '');
            if (address) mailto.push(address);
            return;
        }
        let absolute: URL;
        try {
            absolute = new URL(href, baseUrl);
        } catch {
            return;
        }
        if (absolute.protocol !== 'http:' && absolute.protocol !== 'https:') return;
        links.push({ url: absolute.href, text: $(el).text().replace(/\s+/g, ' ').trim() });
    });

    // keep adjacent block elements from running together
    $('body *').append(' ');

    const title = $('title').first().text();
    const body = $('body').length > 0 ? $('body').text() : $.root().text();
    const text = [title, body, ...mailto]
        .join(' ')
        .replace(/\s+/g, ' ')
        .trim();
    return { text, links };
}

/**
 * Plain HTTP fetcher with a short timeout. Never throws: failures come back as
 * `ok: false` with empty text.
 */
export class HttpPageFetcher implements PageFetcher {
    private readonly http: AxiosInstance;

    constructor(config: AppConfig, http?: AxiosInstance) {
        this.http = http ?? axios.create({
            timeout: config.runtime.pageTimeoutMs,
            maxRedirects: 5,
            maxContentLength: MAX_BODY_BYTES,
            responseType: 'text',
            headers: {
                'User-Agent': config.runtime.userAgent,
                'Accept': 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.5',
                'Accept-Language': 'en-GB,en;q=0.9',
            },
            validateStatus: () => true,
        });
    }

    async fetch(url: string): Promise<FetchedPage> {
        try {
            const res = await this.http.get<string>(url);
            const contentType = String(res.headers['content-type'] || '');
            const isHtml = contentType === '' || contentType.includes('html');
            if (res.status < 200 || res.status >= 300 || !isHtml || typeof res.data !== 'string') {
                return { url, status: res.status, ok: false, text: '', links: [] };
            }
            const { text, links } = parsePage(res.data, url);
            return { url, status: res.status, ok: true, text, links };
        } catch (err) {
            Logger.debug('[PageFetcher] Fetch failed', {
                url,
                error_message: err instanceof Error ? err.message : String(err),
            });
            return { url, status: 0, ok: false, text: '', links: [] };
        }
    }
}
