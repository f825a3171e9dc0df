import type { Bucket, EnrichmentResult, LeadSource, ScoreResult, Signals } from '../../types';

export interface ScoringSettings {
    thresholds: { hot: number; medium: number };
    incorporation_base: number;
    route_weights: Array<{ match: string; points: number }>;
    weights: {
        foreign_beneficial_owner: number;
        corporate_beneficial_owner: number;
        foreign_officer_residence: number;
        foreign_officer_address: number;
        foreign_officer_nationality: number;
        foreign_registered_office: number;
        priority_country: number;
        subsidiary_name: number;
        mailbox_per_hit: number;
        mailbox_floor: number;
        sector_boost: number;
        sector_penalty: number;
        verified_site: number;
        plausible_site: number;
        hiring_intent_max: number;
    };
    max_rationale: number;
}

export interface ScoreInput {
    provenance: LeadSource[];
    sponsor_route: string;
    sponsor_sub_route: string;
    signals: Signals;
}

export const SCORE_MIN = 0;
export const SCORE_MAX = 100;

function clampScore(value: number): number {
    return Math.max(SCORE_MIN, Math.min(SCORE_MAX, Math.round(value)));
}

function signed(points: number): string {
    return points >= 0 ? `+${points}` : `${points}`;
}

/**
 * ⚖️ SCORING ENGINE
 * Source base weight + signal points, clamped to [0, 100], with a rationale
 * entry per applied contribution in application order.
 */
export class ScoringEngine {
    constructor(private readonly settings: ScoringSettings) { }

    bucketFor(score: number): Bucket {
        if (score >= this.settings.thresholds.hot) return 'HOT';
        if (score >= this.settings.thresholds.medium) return 'MEDIUM';
        return 'WATCH';
    }

    /**
     * Route weight for a sponsor licence, first configured match wins.
     */
    routeWeight(route: string, subRoute = ''): { match: string; points: number } | null {
        const text = `${route} ${subRoute}`.toLowerCase();
        return this.settings.route_weights.find((r) => text.includes(r.match.toLowerCase())) ?? null;
    }

    score(input: ScoreInput): ScoreResult {
        const w = this.settings.weights;
        const s = input.signals;
        const applied: Array<[string, number]> = [];
        const add = (label: string, points: number) => {
            applied.push([label, points]);
        };

        const route = input.sponsor_route ? this.routeWeight(input.sponsor_route, input.sponsor_sub_route) : null;
        if (route) {
            add(`Sponsor licence: ${route.match}`, route.points);
        } else if (input.provenance.includes('COMPANIES_HOUSE') && this.settings.incorporation_base !== 0) {
            add('New incorporation', this.settings.incorporation_base);
        }

        if (s.foreign_beneficial_owner) add('Foreign beneficial owner', w.foreign_beneficial_owner);
        if (s.corporate_beneficial_owner) add('Corporate beneficial owner', w.corporate_beneficial_owner);
        if (s.foreign_officer_residence > 0) add(`Officers resident abroad: ${s.foreign_officer_residence}`, w.foreign_officer_residence);
        if (s.foreign_officer_address > 0) add(`Officers with overseas address: ${s.foreign_officer_address}`, w.foreign_officer_address);
        if (s.foreign_officer_nationality > 0) add(`Non-UK officer nationality: ${s.foreign_officer_nationality}`, w.foreign_officer_nationality);
        if (s.foreign_registered_office) add('Registered office outside the UK', w.foreign_registered_office);
        if (s.priority_country_link) add(`Priority country link: ${s.priority_country_link}`, w.priority_country);
        if (s.subsidiary_style_name) add('Subsidiary-style name', w.subsidiary_name);
        if (s.recency) add(`Incorporated ${s.recency.days} days ago`, s.recency.points);
        if (s.mailbox_address_hits.length > 0) {
            const points = Math.max(w.mailbox_floor, w.mailbox_per_hit * s.mailbox_address_hits.length);
            add(`Mailbox-style address: ${s.mailbox_address_hits.join(', ')}`, points);
        }
        if (s.sector?.kind === 'BOOST') add(`Sector boost: ${s.sector.match}`, w.sector_boost);
        if (s.sector?.kind === 'PENALTY') add(`Sector penalty: ${s.sector.match}`, w.sector_penalty);

        const total = clampScore(applied.reduce((sum, [, points]) => sum + points, 0));
        return {
            score: total,
            bucket: this.bucketFor(total),
            rationale: applied
                .map(([label, points]) => `${label} (${signed(points)})`)
                .slice(0, this.settings.max_rationale),
        };
    }

    /**
     * Adds enrichment-derived points on top of a previous result, same clamp rule.
     */
    rescore(previous: ScoreResult, enrichment: EnrichmentResult): ScoreResult {
        const w = this.settings.weights;
        const extra: string[] = [];
        let points = 0;

        if (enrichment.level === 'VERIFIED') {
            points += w.verified_site;
            extra.push(`Verified website (${signed(w.verified_site)})`);
        } else if (enrichment.level === 'PLAUSIBLE') {
            points += w.plausible_site;
            extra.push(`Plausible website (${signed(w.plausible_site)})`);
        }

        const intent = enrichment.hiring_intent ? Math.min(w.hiring_intent_max, enrichment.hiring_intent.score) : 0;
        if (intent > 0) {
            points += intent;
            extra.push(`Hiring intent (${signed(intent)})`);
        }

        // enrichment lines displace trailing signal lines so every added point stays explained
        const max = this.settings.max_rationale;
        const kept = previous.rationale.slice(0, Math.max(0, max - extra.length));
        const total = clampScore(previous.score + points);
        return {
            score: total,
            bucket: this.bucketFor(total),
            rationale: [...kept, ...extra].slice(0, max),
        };
    }
}
