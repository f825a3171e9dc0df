import type { Entity, FetchedPage, PageFetcher } from '../../types';
import { Logger } from '../../utils/logger';
import { tokenCoverage } from '../../utils/similarity';
import { escapeRegExp, isRegistryNumber, normalizeEntityName, postcodeKey } from '../normalizer/text_normalizer';
import { hostOf, type SiteCandidate } from './site_discovery';

export interface VerificationSettings {
    verified_threshold: number;
    plausible_threshold: number;
    max_follow_links: number;
    page_text_limit: number;
    follow_link_hints: string[];
    verification: {
        identifier_points: number;
        postcode_points: number;
        name_high_similarity: number;
        name_high_points: number;
        name_moderate_similarity: number;
        name_moderate_points: number;
        confirmation_bonus: number;
    };
}

export interface PageVerification {
    score: number;
    evidence: string[];
}

export interface CandidateVerification {
    candidate: SiteCandidate;
    score: number;
    evidence: string[];
    pages: FetchedPage[];
}

export const MAX_VERIFICATION_SCORE = 10;

const SKIP_EXTENSIONS = /\.(pdf|jpe?g|png|gif|svg|webp|zip|docx?|xlsx?|mp4)$/i;

/**
 * 🛡️ SITE VERIFIER (Stage B)
 * Cross-checks a candidate site against the entity's registry facts.
 */
export class SiteVerifier {
    constructor(
        private readonly settings: VerificationSettings,
        private readonly fetcher: PageFetcher
    ) { }

    scorePage(entity: Entity, text: string): PageVerification {
        const v = this.settings.verification;
        const body = text.slice(0, this.settings.page_text_limit);
        const evidence: string[] = [];
        let score = 0;
        let checks = 0;

        if (isRegistryNumber(entity.identifier)) {
            const pattern = new RegExp(`(^|[^A-Za-z0-9])${escapeRegExp(entity.identifier)}(?![A-Za-z0-9])`, 'i');
            if (pattern.test(body)) {
                score += v.identifier_points;
                checks++;
                evidence.push(`Company number ${entity.identifier} on page`);
            }
        }

        const postcode = postcodeKey(entity.address.postcode);
        if (postcode.length >= 5 && body.toUpperCase().replace(/\s+/g, '').includes(postcode)) {
            score += v.postcode_points;
            checks++;
            evidence.push(`Postcode ${entity.address.postcode.trim().toUpperCase()} on page`);
        }

        const similarity = tokenCoverage(normalizeEntityName(entity.display_name), body);
        if (similarity >= v.name_high_similarity) {
            score += v.name_high_points;
            checks++;
            evidence.push(`Name match ${similarity}`);
        } else if (similarity >= v.name_moderate_similarity) {
            score += v.name_moderate_points;
            checks++;
            evidence.push(`Partial name match ${similarity}`);
        }

        if (checks >= 2) {
            score += v.confirmation_bonus;
        }

        return { score: Math.min(MAX_VERIFICATION_SCORE, score), evidence };
    }

    /**
     * Same-site contact/about/legal links, at most `max_follow_links`.
     */
    pickFollowLinks(page: FetchedPage, baseUrl: string): string[] {
        const host = hostOf(baseUrl);
        const hints = this.settings.follow_link_hints;
        const picked: string[] = [];
        const seen = new Set<string>([baseUrl]);

        for (const link of page.links) {
            if (picked.length >= this.settings.max_follow_links) break;
            let parsed: URL;
            try {
                parsed = new URL(link.url);
            } catch {
                continue;
            }
            if (!/^https?:$/.test(parsed.protocol) || hostOf(parsed.href) !== host) continue;
            if (SKIP_EXTENSIONS.test(parsed.pathname)) continue;

            parsed.hash = '';
            const href = parsed.href;
            if (seen.has(href) || parsed.pathname === '/') continue;

            const path = parsed.pathname.toLowerCase();
            const anchor = link.text.toLowerCase();
            if (hints.some((h) => path.includes(h) || anchor.includes(h))) {
                seen.add(href);
                picked.push(href);
            }
        }
        return picked;
    }

    async verifyCandidate(entity: Entity, candidate: SiteCandidate): Promise<CandidateVerification | null> {
        const home = await this.fetcher.fetch(candidate.url);
        if (!home.ok) {
            Logger.debug(`[SiteVerifier] Homepage unavailable (${home.status})`, { url: candidate.url });
            return null;
        }

        const first = this.scorePage(entity, home.text);
        let score = first.score;
        const evidence = new Set(first.evidence);
        const pages = [home];

        if (score >= this.settings.plausible_threshold) {
            for (const url of this.pickFollowLinks(home, candidate.url)) {
                const page = await this.fetcher.fetch(url);
                if (!page.ok) continue;
                pages.push(page);
                const result = this.scorePage(entity, page.text);
                score = Math.max(score, result.score);
                result.evidence.forEach((e) => evidence.add(e));
            }
        }

        return { candidate, score, evidence: [...evidence], pages };
    }

    /**
     * Candidates in rank order; stops at the first VERIFIED one, otherwise
     * returns the best-scoring candidate seen (null when none could be fetched).
     */
    async verify(entity: Entity, candidates: SiteCandidate[]): Promise<CandidateVerification | null> {
        let best: CandidateVerification | null = null;
        for (const candidate of candidates) {
            const result = await this.verifyCandidate(entity, candidate);
            if (!result) continue;
            if (result.score >= this.settings.verified_threshold) {
                return result;
            }
            if (!best || result.score > best.score) {
                best = result;
            }
        }
        return best;
    }
}
