import type { Entity, SerpResult } from '../../types';
import { normalizeEntityName, simplify } from '../normalizer/text_normalizer';
import type { BudgetedSearch } from './search_budget';

export interface DiscoverySettings {
    top_k: number;
    deny_domains: string[];
    directory_phrases: string[];
    free_hosting: string[];
    candidate_path_hints: string[];
}

export interface SiteCandidate {
    url: string;
    host: string;
    score: number;
    title: string;
}

export type DiscoveryOutcome =
    | { status: 'ok'; candidates: SiteCandidate[] }
    | { status: 'budget' }
    | { status: 'failed'; error: Error };

export function hostOf(url: string): string {
    try {
        const withProtocol = /^https?:\/\//i.test(url) ? url : `https://${url}`;
        return new URL(withProtocol).hostname.replace(/^www\./, '').toLowerCase();
    } catch {
        return '';
    }
}

/**
 * 🌐 SITE DISCOVERY (Stage A)
 * One search per entity, deny-list filtering and heuristic ranking of the
 * remaining hosts.
 */
export class SiteDiscovery {
    constructor(private readonly settings: DiscoverySettings) { }

    buildQuery(entity: Entity): string {
        return [`"${entity.display_name}"`, 'official website', entity.address.locality, entity.address.postcode]
            .map((p) => p.trim())
            .filter(Boolean)
            .join(' ');
    }

    isDenied(url: string): boolean {
        const host = hostOf(url);
        if (!host) return true;
        return this.settings.deny_domains.some((blocked) => host === blocked || host.endsWith(`.${blocked}`));
    }

    scoreResult(entity: Entity, result: SerpResult): number {
        const name = normalizeEntityName(entity.display_name);
        const brand = name.slice(0, 6).trim();
        const title = simplify(result.title);
        const snippet = simplify(result.snippet);
        const host = hostOf(result.link);

        let path = '';
        try {
            path = new URL(result.link).pathname.toLowerCase();
        } catch {
            path = '';
        }

        let score = 0;
        if (this.settings.candidate_path_hints.some((hint) => path.includes(hint))) score += 8;
        if (brand && title.includes(brand)) score += 12;
        if (brand && snippet.includes(brand)) score += 6;
        if (name && title.includes(name)) score += 10;
        if (name && snippet.includes(name)) score += 5;

        const rawTitle = result.title.toLowerCase();
        const rawSnippet = result.snippet.toLowerCase();
        if (this.settings.directory_phrases.some((p) => rawTitle.includes(p))) score -= 25;
        if (this.settings.directory_phrases.some((p) => rawSnippet.includes(p))) score -= 15;

        if (host.endsWith('.uk')) score += 3;
        if (this.settings.free_hosting.some((h) => host.includes(h))) score -= 10;
        return score;
    }

    /**
     * Top-K candidate base URLs, one per host, best score first.
     */
    rank(entity: Entity, results: SerpResult[]): SiteCandidate[] {
        const byHost = new Map<string, SiteCandidate>();
        for (const result of results) {
            if (!/^https?:\/\//i.test(result.link) || this.isDenied(result.link)) continue;

            let base: string;
            try {
                const parsed = new URL(result.link);
                base = `${parsed.protocol}//${parsed.hostname}/`;
            } catch {
                continue;
            }
            const host = hostOf(result.link);
            const score = this.scoreResult(entity, result);
            const existing = byHost.get(host);
            if (!existing || score > existing.score) {
                byHost.set(host, { url: base, host, score, title: result.title });
            }
        }

        return [...byHost.values()]
            .sort((a, b) => b.score - a.score)
            .slice(0, this.settings.top_k);
    }

    async discover(entity: Entity, search: BudgetedSearch): Promise<DiscoveryOutcome> {
        const outcome = await search.search(this.buildQuery(entity));
        if (outcome.status !== 'ok') return outcome;
        return { status: 'ok', candidates: this.rank(entity, outcome.results) };
    }
}
