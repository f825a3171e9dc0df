import type { Entity, HiringIntent } from '../../types';
import type { BudgetedSearch } from './search_budget';
import { hostOf } from './site_discovery';

export interface HiringIntentSettings {
    max_queries: number;
    role_keywords: string[];
    positive_keywords: string[];
    negative_keywords: string[];
}

export const MAX_HIRING_INTENT = 40;

/**
 * Looks for public vacancy evidence (careers pages, job-board snippets) for a
 * verified site. Every query is paid from the shared search budget.
 */
export class HiringIntentProbe {
    constructor(private readonly settings: HiringIntentSettings) { }

    buildQueries(entity: Entity, website: string): string[] {
        const host = hostOf(website);
        const queries = [`"${entity.display_name}" careers OR jobs OR vacancies`];
        if (host) queries.push(`site:${host} careers OR jobs`);
        return queries.slice(0, this.settings.max_queries);
    }

    scoreText(text: string, link: string, host: string): { points: number; careersPage: boolean } {
        const t = text.toLowerCase();
        let points = 0;
        for (const k of this.settings.positive_keywords) {
            if (t.includes(k.toLowerCase())) points += 3;
        }
        if (this.settings.role_keywords.some((k) => t.includes(k.toLowerCase()))) points += 2;
        for (const k of this.settings.negative_keywords) {
            if (t.includes(k.toLowerCase())) points -= 5;
        }
        const careersPage = !!host && hostOf(link) === host && /\/(careers|jobs|vacancies|join-us)/i.test(link);
        if (careersPage) points += 4;
        return { points, careersPage };
    }

    async probe(entity: Entity, website: string, search: BudgetedSearch): Promise<HiringIntent | null> {
        const host = hostOf(website);
        let ran = 0;
        let score = 0;
        const evidence: string[] = [];

        for (const query of this.buildQueries(entity, website)) {
            const outcome = await search.search(query);
            if (outcome.status === 'budget') break;
            if (outcome.status === 'failed') continue;
            ran++;
            for (const result of outcome.results) {
                const { points, careersPage } = this.scoreText(`${result.title} ${result.snippet}`, result.link, host);
                score += points;
                if (careersPage && evidence.length < 3 && !evidence.includes(`Careers page: ${result.link}`)) {
                    evidence.push(`Careers page: ${result.link}`);
                }
            }
        }

        if (ran === 0) return null;
        return { score: Math.max(0, Math.min(MAX_HIRING_INTENT, score)), evidence };
    }
}
