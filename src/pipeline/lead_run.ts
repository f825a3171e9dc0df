import crypto from 'crypto';
import pLimit from 'p-limit';
import type { AppConfig } from '../config';
import { EnrichmentPipeline, emptyEnrichment } from '../core/enrichment/enrichment_pipeline';
import { IdentityResolver } from '../core/identity/identity_resolver';
import { entityNameKey, LeadAssembler, type LeadDraft } from '../core/leads/lead_assembler';
import { cleanDisplayName, collapse, TextNormalizer } from '../core/normalizer/text_normalizer';
import { ScoringEngine } from '../core/scoring/scoring_engine';
import { SignalExtractor } from '../core/signals/signal_extractor';
import type { SeenEntry, StateStore, StoredLead } from '../db/state_store';
import {
    EnrichStatus,
    type Entity,
    type EnrichmentResult,
    type IncorporationItem,
    type Lead,
    type PageFetcher,
    type RegistryClient,
    type RegistryFacts,
    type SearchProvider,
    type Signals,
    type SponsorRegisterSource,
    type SponsorRow,
} from '../types';
import { toError } from '../utils/errors';
import { Logger } from '../utils/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface LeadRunDeps {
    config: AppConfig;
    store: StateStore;
    registry: RegistryClient;
    sponsors: SponsorRegisterSource;
    search: SearchProvider;
    fetcher: PageFetcher;
}

export type RunStats = {
    sponsor_rows: number;
    sponsor_new: number;
    sponsor_matched: number;
    incorporations: number;
    overseas_candidates: number;
    items_failed: number;
    suppressed: number;
    merged_leads: number;
    enrichment_attempted: number;
    enrichment_cached: number;
    verified: number;
    search_calls: number;
    backfilled: number;
    output: number;
};

export interface RunReport {
    run_id: string;
    baseline: boolean;
    leads: Lead[];
    stats: RunStats;
}

export function sponsorSeenKey(row: SponsorRow): string {
    return ['SPONSOR', row.name, row.locality, row.route, row.sub_route].map((p) => collapse(p)).join('::');
}

export function incorporationSeenKey(companyNumber: string): string {
    return `CH::${collapse(companyNumber)}`;
}

function seenEntry(key: string): SeenEntry {
    return { key, source: key.startsWith('SPONSOR::') ? 'SPONSOR_REGISTER' : 'COMPANIES_HOUSE' };
}

function isoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * 🚀 LEAD RUN
 * One end-to-end pass: sponsor register diff, recent incorporations,
 * resolution, scoring, budget-gated enrichment, assembly, atomic commit.
 */
export class LeadRun {
    private readonly config: AppConfig;
    private readonly store: StateStore;
    private readonly registry: RegistryClient;
    private readonly sponsors: SponsorRegisterSource;
    private readonly normalizer: TextNormalizer;
    private readonly resolver: IdentityResolver;
    private readonly extractor: SignalExtractor;
    private readonly scoring: ScoringEngine;
    private readonly assembler: LeadAssembler;
    private readonly enrichment: EnrichmentPipeline;

    constructor(deps: LeadRunDeps) {
        this.config = deps.config;
        this.store = deps.store;
        this.registry = deps.registry;
        this.sponsors = deps.sponsors;
        this.normalizer = new TextNormalizer(deps.config.normalizer);
        this.resolver = new IdentityResolver(deps.registry, deps.config.identity);
        this.extractor = new SignalExtractor(deps.config.signals, this.normalizer);
        this.scoring = new ScoringEngine(deps.config.scoring);
        this.assembler = new LeadAssembler(deps.config.leads, deps.config.scoring.max_rationale);
        this.enrichment = new EnrichmentPipeline(deps.config, deps.search, deps.fetcher, deps.store);
    }

    private newStats(): RunStats {
        return {
            sponsor_rows: 0, sponsor_new: 0, sponsor_matched: 0, incorporations: 0, overseas_candidates: 0,
            items_failed: 0, suppressed: 0, merged_leads: 0, enrichment_attempted: 0, enrichment_cached: 0,
            verified: 0, search_calls: 0, backfilled: 0, output: 0,
        };
    }

    isAllowedRoute(row: SponsorRow): boolean {
        const route = collapse(row.route);
        const combined = collapse(`${row.route}: ${row.sub_route}`);
        return this.config.sponsor.route_allowlist.some((r) => {
            const allowed = collapse(r);
            return allowed === route || allowed === combined;
        });
    }

    isOverseasLinked(signals: Signals): boolean {
        return signals.foreign_beneficial_owner
            || signals.foreign_officer_residence > 0
            || signals.foreign_officer_address > 0
            || signals.foreign_officer_nationality > 0
            || signals.foreign_registered_office;
    }

    async execute(now: Date = new Date()): Promise<RunReport> {
        const runId = `run-${now.toISOString().replace(/[-:.]/g, '')}-${crypto.randomUUID().slice(0, 8)}`;
        this.store.startRun(runId, now);
        Logger.info(`🚀 Run started`, { run_id: runId });

        try {
            const report = await this.runStages(runId, now);
            Logger.info(`✅ Run finished: ${report.leads.length} leads`, { run_id: runId, ...report.stats });
            return report;
        } catch (err) {
            const error = toError(err);
            this.store.failRun(runId, new Date(), error);
            Logger.logError('❌ Run failed', error, { run_id: runId });
            throw error;
        }
    }

    private async runStages(runId: string, now: Date): Promise<RunReport> {
        const stats = this.newStats();
        const drafts: LeadDraft[] = [];
        const considered: string[] = [];

        // 1. Sponsor register
        const rows = await this.loadSponsorRows();
        const unique = new Map<string, SponsorRow>();
        for (const row of rows) {
            if (!this.isAllowedRoute(row) || this.normalizer.isNoiseName(row.name)) continue;
            unique.set(sponsorSeenKey(row), row);
        }
        stats.sponsor_rows = unique.size;

        const baseline = !this.store.isSponsorBaselined() && unique.size > 0;
        if (baseline) {
            this.store.baselineSponsorRows([...unique.keys()], now);
            Logger.info(`📌 Sponsor register baselined: ${unique.size} rows marked seen`, { run_id: runId });
        } else if (this.store.isSponsorBaselined()) {
            for (const [key, row] of unique) {
                if (this.store.isSeen(key)) continue;
                stats.sponsor_new++;
                try {
                    const draft = await this.sponsorDraft(row, key, now);
                    if (!draft) {
                        stats.items_failed++;
                        continue;
                    }
                    if (draft.entity.identifier !== entityNameKey(row.name, row.locality)) stats.sponsor_matched++;
                    drafts.push(draft);
                } catch (err) {
                    stats.items_failed++;
                    Logger.logError('[LeadRun] Sponsor row skipped', toError(err), { company_name: row.name });
                }
            }
        }

        // 2. Recent incorporations
        const items = await this.loadIncorporations(now);
        stats.incorporations = items.length;
        for (const item of items) {
            const key = incorporationSeenKey(item.company_number);
            if (this.store.isSeen(key)) continue;
            try {
                const facts = await this.fetchFacts(item.company_number);
                const entity = facts.profile ?? this.entityFromIncorporation(item);
                const signals = this.extractor.extract(facts, entity.display_name, now);
                if (!this.isOverseasLinked(signals)) {
                    considered.push(key);
                    continue;
                }
                stats.overseas_candidates++;
                drafts.push({
                    entity,
                    signals,
                    provenance: ['COMPANIES_HOUSE'],
                    sponsor_route: '',
                    sponsor_sub_route: '',
                    seen_keys: [key],
                });
            } catch (err) {
                stats.items_failed++;
                Logger.logError('[LeadRun] Incorporation skipped', toError(err), {
                    company_number: item.company_number,
                    company_name: item.company_name,
                });
            }
        }

        // 3. Merge, score, rank
        const merged = this.assembler.merge(drafts);
        const active: LeadDraft[] = [];
        for (const draft of merged) {
            if (this.store.isSuppressed(draft.entity.identifier)) {
                stats.suppressed++;
                considered.push(...draft.seen_keys);
                continue;
            }
            active.push(draft);
        }
        stats.merged_leads = active.length;

        const scored = this.assembler.rank(active.map((draft) => ({
            draft,
            entity: draft.entity,
            score: this.scoring.score(draft),
        })));

        // 4. Enrich the capped head, re-score
        const head = new Set(this.assembler.cap(scored).map((s) => s.draft));
        const limit = pLimit(this.config.runtime.enrichConcurrency);
        const fresh = await Promise.all(scored.map((item) => limit(async () => {
            const eligible = head.has(item.draft)
                && (item.score.bucket !== 'WATCH' || item.draft.provenance.includes('SPONSOR_REGISTER'));
            const enrichment = eligible
                ? await this.enrichSafely(item.entity, now)
                : emptyEnrichment(EnrichStatus.SKIPPED_LOW_PRIORITY, now);
            const score = this.scoring.rescore(item.score, enrichment);
            return this.assembler.build(item.draft, score, enrichment, now);
        })));

        const es = this.enrichment.stats;
        stats.enrichment_attempted = es.attempted;
        stats.enrichment_cached = es.cached;
        stats.verified = es.verified;
        stats.search_calls = this.enrichment.budget.spent;

        // 5. Finalize with backfill
        const final = this.assembler.finalize(fresh, (exclude) => this.store.recentLeads({
            now,
            days: this.config.leads.backfill_days,
            cooldownDays: this.config.leads.resurface_cooldown_days,
            limit: this.config.leads.backfill_scan_limit,
            exclude,
        }));
        stats.backfilled = final.backfilled;
        stats.output = final.leads.length;

        // 6. Atomic commit
        const surfaced = new Set(final.leads.map((l) => l.entity.identifier));
        const stored: StoredLead[] = [
            ...fresh.map((lead) => ({ lead, surfaced: surfaced.has(lead.entity.identifier) })),
            ...final.leads.filter((l) => l.backfilled).map((lead) => ({ lead, surfaced: true })),
        ];
        const seenKeys = new Set([...considered, ...fresh.flatMap((l) => l.seen_keys)]);
        this.store.commitRun(runId, {
            leads: stored,
            seen: [...seenKeys].map(seenEntry),
            stats: { ...stats },
        }, now);

        return { run_id: runId, baseline, leads: final.leads, stats };
    }

    private async loadSponsorRows(): Promise<SponsorRow[]> {
        try {
            return await this.sponsors.fetchRows();
        } catch (err) {
            Logger.logError('[LeadRun] Sponsor register unavailable, continuing without it', toError(err));
            return [];
        }
    }

    private async loadIncorporations(now: Date): Promise<IncorporationItem[]> {
        const from = isoDate(new Date(now.getTime() - this.config.runtime.lookbackDays * DAY_MS));
        try {
            return await this.registry.incorporatedBetween(from, isoDate(now), this.config.runtime.incorporationsMax);
        } catch (err) {
            Logger.logError('[LeadRun] Incorporation listing unavailable, continuing without it', toError(err));
            return [];
        }
    }

    private async fetchFacts(identifier: string): Promise<RegistryFacts> {
        const [profile, officers, owners] = await Promise.all([
            this.registry.profile(identifier),
            this.registry.officers(identifier),
            this.registry.owners(identifier),
        ]);
        return { profile, officers, owners };
    }

    private entityFromIncorporation(item: IncorporationItem): Entity {
        return {
            identifier: item.company_number,
            display_name: item.company_name,
            registration_date: item.date_of_creation,
            status: item.company_status,
            classification_codes: [],
            address: { street: '', locality: item.locality, postcode: item.postcode, country: '' },
        };
    }

    /**
     * Resolves a sponsor row to the registry (mapping cache first). Returns null
     * when the registry could not be queried at all, so the row is retried next run.
     */
    private async sponsorDraft(row: SponsorRow, seenKey: string, now: Date): Promise<LeadDraft | null> {
        const mappingKey = entityNameKey(row.name, row.locality);
        let identifier = this.store.getSponsorMapping(mappingKey)?.company_number ?? '';

        if (!identifier) {
            const match = await this.resolver.resolve(row.name, row.locality);
            if (!match.identifier && match.errors > 0 && match.candidates === 0) {
                Logger.warn('[LeadRun] Registry unreachable for sponsor row, will retry next run', { company_name: row.name });
                return null;
            }
            if (match.identifier) {
                this.store.putSponsorMapping(mappingKey, match.identifier, match.score, now);
                identifier = match.identifier;
            } else {
                Logger.debug(`[LeadRun] No registry match (best ${match.best_rejected_score})`, { company_name: row.name });
            }
        }

        const facts: RegistryFacts = identifier
            ? await this.fetchFacts(identifier)
            : { profile: null, officers: [], owners: [] };

        const entity: Entity = facts.profile ?? {
            identifier: identifier || mappingKey,
            display_name: cleanDisplayName(row.name),
            registration_date: null,
            status: '',
            classification_codes: [],
            address: { street: '', locality: row.locality, postcode: '', country: '' },
        };

        return {
            entity,
            signals: this.extractor.extract(facts, row.name, now),
            provenance: ['SPONSOR_REGISTER'],
            sponsor_route: row.route,
            sponsor_sub_route: row.sub_route,
            seen_keys: [seenKey],
        };
    }

    private async enrichSafely(entity: Entity, now: Date): Promise<EnrichmentResult> {
        try {
            return await this.enrichment.enrich(entity, now);
        } catch (err) {
            Logger.logError('[LeadRun] Enrichment failed', toError(err), { company_name: entity.display_name });
            return emptyEnrichment(EnrichStatus.SEARCH_FAILED, now);
        }
    }
}
