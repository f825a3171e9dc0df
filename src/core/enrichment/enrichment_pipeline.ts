import type { AppConfig } from '../../config';
import {
    EnrichStatus,
    type Entity,
    type EnrichmentResult,
    type PageFetcher,
    type SearchProvider,
} from '../../types';
import { Logger } from '../../utils/logger';
import { ContactExtractor } from './contact_extractor';
import { HiringIntentProbe } from './hiring_intent';
import { BudgetedSearch, SearchBudget, SearchThrottle } from './search_budget';
import { SiteDiscovery } from './site_discovery';
import { SiteVerifier } from './site_verifier';

export interface EnrichmentCache {
    getFreshEnrichment(identifier: string, now: Date, ttlDays: number): EnrichmentResult | null;
    putEnrichment(identifier: string, result: EnrichmentResult): void;
}

export interface EnrichmentStats {
    attempted: number;
    cached: number;
    verified: number;
    plausible: number;
    skipped_budget: number;
}

const NOT_CACHEABLE = new Set<EnrichStatus>([
    EnrichStatus.SKIPPED_BUDGET,
    EnrichStatus.SKIPPED_LOW_PRIORITY,
    EnrichStatus.SEARCH_FAILED,
]);

export function emptyEnrichment(status: EnrichStatus, now: Date): EnrichmentResult {
    return {
        website: '',
        level: 'NONE',
        verification_score: 0,
        evidence: [],
        emails: [],
        phones: [],
        status,
        stage: 'NOT_ATTEMPTED',
        hiring_intent: null,
        from_cache: false,
        updated_at: now.toISOString(),
    };
}

/**
 * 🧪 ENRICHMENT PIPELINE
 * NOT_ATTEMPTED → DISCOVERED → VERIFIED | PLAUSIBLE | UNVERIFIED → CONTACTS_EXTRACTED
 *
 * Search calls go through one shared budget. Contacts are only ever read from
 * a VERIFIED site.
 */
export class EnrichmentPipeline {
    readonly budget: SearchBudget;
    readonly stats: EnrichmentStats = { attempted: 0, cached: 0, verified: 0, plausible: 0, skipped_budget: 0 };

    private readonly search: BudgetedSearch;
    private readonly discovery: SiteDiscovery;
    private readonly verifier: SiteVerifier;
    private readonly contacts: ContactExtractor;
    private readonly hiringIntent: HiringIntentProbe;

    constructor(
        private readonly config: AppConfig,
        provider: SearchProvider,
        fetcher: PageFetcher,
        private readonly cache: EnrichmentCache | null = null
    ) {
        const e = config.enrichment;
        this.budget = new SearchBudget(config.runtime.searchMaxCallsPerRun);
        this.search = new BudgetedSearch(provider, this.budget, new SearchThrottle(config.runtime.searchSleepMs), e.locale);
        this.discovery = new SiteDiscovery(e);
        this.verifier = new SiteVerifier(e, fetcher);
        this.contacts = new ContactExtractor(e, config.runtime.includePersonalEmails);
        this.hiringIntent = new HiringIntentProbe(e.hiring_intent);
    }

    async enrich(entity: Entity, now: Date): Promise<EnrichmentResult> {
        const cached = this.cache?.getFreshEnrichment(entity.identifier, now, this.config.runtime.enrichCacheDays);
        if (cached) {
            this.stats.cached++;
            return { ...cached, from_cache: true };
        }

        const result = await this.runStages(entity, now);

        if (result.status === EnrichStatus.SKIPPED_BUDGET) this.stats.skipped_budget++;
        if (result.level === 'VERIFIED') this.stats.verified++;
        if (result.level === 'PLAUSIBLE') this.stats.plausible++;

        if (this.cache && !NOT_CACHEABLE.has(result.status)) {
            this.cache.putEnrichment(entity.identifier, result);
        }
        return result;
    }

    private async runStages(entity: Entity, now: Date): Promise<EnrichmentResult> {
        const e = this.config.enrichment;

        const discovered = await this.discovery.discover(entity, this.search);
        if (discovered.status === 'budget') {
            return emptyEnrichment(EnrichStatus.SKIPPED_BUDGET, now);
        }
        this.stats.attempted++;
        if (discovered.status === 'failed') {
            return emptyEnrichment(EnrichStatus.SEARCH_FAILED, now);
        }
        if (discovered.candidates.length === 0) {
            return { ...emptyEnrichment(EnrichStatus.NO_CANDIDATE, now), stage: 'UNVERIFIED' };
        }

        const best = await this.verifier.verify(entity, discovered.candidates);
        if (!best) {
            return { ...emptyEnrichment(EnrichStatus.NO_CANDIDATE, now), stage: 'DISCOVERED' };
        }

        if (best.score >= e.verified_threshold) {
            const { emails, phones } = this.contacts.extract(best.pages, best.candidate.host);
            const hiring = this.config.runtime.hiringIntentEnabled
                ? await this.hiringIntent.probe(entity, best.candidate.url, this.search)
                : null;
            const found = emails.length > 0 || phones.length > 0;
            Logger.info(`[Enrichment] Verified ${best.candidate.url} (${best.score}/10)`, {
                company_name: entity.display_name,
                url: best.candidate.url,
            });
            return {
                website: best.candidate.url,
                level: 'VERIFIED',
                verification_score: best.score,
                evidence: best.evidence,
                emails,
                phones,
                status: found ? EnrichStatus.VERIFIED_WITH_CONTACTS : EnrichStatus.VERIFIED_NO_CONTACTS,
                stage: found ? 'CONTACTS_EXTRACTED' : 'VERIFIED',
                hiring_intent: hiring,
                from_cache: false,
                updated_at: now.toISOString(),
            };
        }

        if (best.score >= e.plausible_threshold) {
            return {
                ...emptyEnrichment(EnrichStatus.PLAUSIBLE, now),
                website: best.candidate.url,
                level: 'PLAUSIBLE',
                verification_score: best.score,
                evidence: best.evidence,
                stage: 'PLAUSIBLE',
            };
        }

        return {
            ...emptyEnrichment(EnrichStatus.LOW_CONFIDENCE, now),
            verification_score: best.score,
            evidence: best.evidence,
            stage: 'UNVERIFIED',
        };
    }
}
