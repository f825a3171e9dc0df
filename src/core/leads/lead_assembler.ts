import crypto from 'crypto';
import type { EnrichmentResult, Entity, Lead, LeadSource, ScoreResult, Signals } from '../../types';
import { collapse, isRegistryNumber, normalizeEntityName } from '../normalizer/text_normalizer';

export interface LeadSettings {
    max_output: number;
    min_output: number;
}

export interface LeadDraft {
    entity: Entity;
    signals: Signals;
    provenance: LeadSource[];
    sponsor_route: string;
    sponsor_sub_route: string;
    seen_keys: string[];
}

export interface FinalizedLeads {
    leads: Lead[];
    backfilled: number;
}

const SOURCE_ORDER: LeadSource[] = ['SPONSOR_REGISTER', 'COMPANIES_HOUSE'];

export function entityNameKey(name: string, locality: string): string {
    return `NAME::${normalizeEntityName(name)}::${collapse(locality)}`;
}

export function mergeKey(entity: Entity): string {
    return isRegistryNumber(entity.identifier)
        ? entity.identifier
        : entityNameKey(entity.display_name, entity.address.locality);
}

export function leadIdFor(identifier: string): string {
    return `LR-${crypto.createHash('sha1').update(identifier).digest('hex').slice(0, 10).toUpperCase()}`;
}

function completeness(entity: Entity): number {
    return [
        entity.display_name,
        entity.registration_date ?? '',
        entity.status,
        entity.classification_codes.length > 0 ? 'x' : '',
        entity.address.street,
        entity.address.locality,
        entity.address.postcode,
        entity.address.country,
    ].filter((v) => v.trim() !== '').length;
}

function fillEntity(base: Entity, other: Entity): Entity {
    return {
        identifier: isRegistryNumber(base.identifier) || !isRegistryNumber(other.identifier) ? base.identifier : other.identifier,
        display_name: base.display_name || other.display_name,
        registration_date: base.registration_date ?? other.registration_date,
        status: base.status || other.status,
        classification_codes: base.classification_codes.length > 0 ? base.classification_codes : other.classification_codes,
        address: {
            street: base.address.street || other.address.street,
            locality: base.address.locality || other.address.locality,
            postcode: base.address.postcode || other.address.postcode,
            country: base.address.country || other.address.country,
        },
    };
}

/**
 * 🧩 LEAD ASSEMBLER
 * One lead per entity: merge, rank, cap, backfill.
 */
export class LeadAssembler {
    constructor(private readonly settings: LeadSettings, private readonly maxRationale: number) { }

    /**
     * Merges drafts sharing a registry number (or name+locality key). The more
     * complete entity wins and its blanks are filled from the other.
     */
    merge(drafts: LeadDraft[]): LeadDraft[] {
        const merged = new Map<string, LeadDraft>();
        for (const draft of drafts) {
            const key = mergeKey(draft.entity);
            const current = merged.get(key);
            if (!current) {
                merged.set(key, { ...draft, provenance: [...draft.provenance], seen_keys: [...draft.seen_keys] });
                continue;
            }

            const [base, other] = completeness(draft.entity) > completeness(current.entity)
                ? [draft, current]
                : [current, draft];
            const provenance = new Set([...current.provenance, ...draft.provenance]);

            merged.set(key, {
                entity: fillEntity(base.entity, other.entity),
                signals: base.signals,
                provenance: SOURCE_ORDER.filter((s) => provenance.has(s)),
                sponsor_route: current.sponsor_route || draft.sponsor_route,
                sponsor_sub_route: current.sponsor_route ? current.sponsor_sub_route : draft.sponsor_sub_route,
                seen_keys: [...new Set([...current.seen_keys, ...draft.seen_keys])],
            });
        }
        return [...merged.values()];
    }

    build(draft: LeadDraft, score: ScoreResult, enrichment: EnrichmentResult, now: Date): Lead {
        const nowIso = now.toISOString();
        return {
            lead_id: leadIdFor(draft.entity.identifier),
            entity: draft.entity,
            signals: draft.signals,
            score,
            enrichment,
            provenance: draft.provenance,
            sponsor_route: draft.sponsor_route,
            sponsor_sub_route: draft.sponsor_sub_route,
            seen_keys: draft.seen_keys,
            backfilled: false,
            first_seen: nowIso,
            last_seen: nowIso,
        };
    }

    /**
     * Score descending, then name and identifier for a stable order.
     */
    rank<T extends { score: ScoreResult; entity: Entity }>(items: T[]): T[] {
        return [...items].sort((a, b) =>
            b.score.score - a.score.score
            || a.entity.display_name.localeCompare(b.entity.display_name)
            || a.entity.identifier.localeCompare(b.entity.identifier)
        );
    }

    cap<T>(items: T[]): T[] {
        return items.slice(0, this.settings.max_output);
    }

    tagBackfill(lead: Lead): Lead {
        const tag = `Backfill: first seen ${lead.first_seen.slice(0, 10)}`;
        return {
            ...lead,
            backfilled: true,
            score: {
                ...lead.score,
                rationale: [tag, ...lead.score.rationale.filter((r) => !r.startsWith('Backfill:'))].slice(0, this.maxRationale),
            },
        };
    }

    /**
     * Sort and cap the fresh leads; below the minimum target, top up from
     * `backfillPool` (called with every fresh identifier to exclude), then
     * re-sort and re-cap.
     */
    finalize(fresh: Lead[], backfillPool: (exclude: Set<string>) => Lead[]): FinalizedLeads {
        const ranked = this.cap(this.rank(fresh));
        if (ranked.length >= this.settings.min_output) {
            return { leads: ranked, backfilled: 0 };
        }

        const exclude = new Set(fresh.map((l) => l.entity.identifier));
        const extra = backfillPool(exclude)
            .filter((l) => !exclude.has(l.entity.identifier))
            .slice(0, this.settings.min_output - ranked.length)
            .map((l) => this.tagBackfill(l));

        const leads = this.cap(this.rank([...ranked, ...extra]));
        return { leads, backfilled: leads.filter((l) => l.backfilled).length };
    }
}
