import type { MatchResult, RegistryClient, RegistrySearchHit } from '../../types';
import { Logger } from '../../utils/logger';
import { toError } from '../../utils/errors';
import { ratio, tokenSetRatio } from '../../utils/similarity';
import { collapse, nameQueryVariants, normalizeEntityName } from '../normalizer/text_normalizer';

export interface IdentitySettings {
    match_threshold: number;
    locality_bonus: number;
    active_bonus: number;
    results_per_query: number;
}

interface CandidateRank {
    raw: number;
    closeness: number;
    exact: boolean;
}

function outranks(a: CandidateRank, b: CandidateRank): boolean {
    if (a.raw !== b.raw) return a.raw > b.raw;
    return a.closeness > b.closeness;
}

/**
 * 🔎 IDENTITY RESOLVER
 * Matches a free-text organisation name against registry search results.
 *
 * A best candidate below the threshold is reported as "no match" (empty
 * identifier, score 0); the rejected score is kept only for logging.
 */
export class IdentityResolver {
    constructor(
        private readonly registry: RegistryClient,
        private readonly settings: IdentitySettings
    ) { }

    static noMatch(partial: Partial<MatchResult> = {}): MatchResult {
        return {
            identifier: '',
            score: 0,
            title: '',
            candidates: 0,
            errors: 0,
            best_rejected_score: 0,
            ...partial,
        };
    }

    /**
     * Candidate score: token-set similarity of normalized names, plus locality and status bonuses, capped at 100.
     */
    scoreCandidate(name: string, locality: string, hit: { title: string; status: string; address_snippet: string }): number {
        return Math.min(100, this.rankCandidate(name, locality, hit).raw);
    }

    /**
     * Uncapped score plus the edit similarity of the normalized names, so a
     * superset name ("ACME FOODS" for "ACME") ranks below the exact one.
     */
    private rankCandidate(name: string, locality: string, hit: { title: string; status: string; address_snippet: string }): CandidateRank {
        const wanted = normalizeEntityName(name);
        const found = normalizeEntityName(hit.title);
        let raw = tokenSetRatio(wanted, found);
        const town = collapse(locality);
        if (town && collapse(hit.address_snippet).includes(town)) {
            raw += this.settings.locality_bonus;
        }
        if (hit.status.trim().toLowerCase() === 'active') {
            raw += this.settings.active_bonus;
        }
        return { raw, closeness: ratio(wanted, found), exact: wanted !== '' && wanted === found };
    }

    async resolve(name: string, locality = '', threshold = this.settings.match_threshold): Promise<MatchResult> {
        const variants = nameQueryVariants(name, locality);
        if (variants.length === 0) {
            return IdentityResolver.noMatch();
        }

        const scored = new Set<string>();
        let best: ({ identifier: string; title: string } & CandidateRank) | null = null;
        let errors = 0;

        for (const query of variants) {
            let hits: RegistrySearchHit[];
            try {
                hits = await this.registry.search(query, { limit: this.settings.results_per_query });
            } catch (err) {
                errors++;
                Logger.warn(`[IdentityResolver] Registry search failed for "${query}"`, {
                    company_name: name,
                    error: toError(err),
                });
                continue;
            }

            for (const hit of hits) {
                if (!hit.identifier || scored.has(hit.identifier)) continue;
                scored.add(hit.identifier);

                const rank = this.rankCandidate(name, locality, hit);
                if (!best || outranks(rank, best)) {
                    best = { identifier: hit.identifier, title: hit.title, ...rank };
                }
            }

            if (best?.exact) break;
        }

        const score = best ? Math.min(100, best.raw) : 0;
        if (!best || score < threshold) {
            return IdentityResolver.noMatch({
                candidates: scored.size,
                errors,
                best_rejected_score: score,
            });
        }

        return {
            identifier: best.identifier,
            score,
            title: best.title,
            candidates: scored.size,
            errors,
            best_rejected_score: 0,
        };
    }
}
