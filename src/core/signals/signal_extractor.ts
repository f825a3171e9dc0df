import type { RegistryFacts, Signals } from '../../types';
import { canonCountry, collapse, escapeRegExp, type TextNormalizer, tokenize } from '../normalizer/text_normalizer';

export interface SignalSettings {
    recency_tiers: Array<{ max_days: number; points: number }>;
    mailbox_phrases: string[];
    sector_boost_keywords: string[];
    sector_penalty_keywords: string[];
    sector_boost_code_prefixes: string[];
    sector_penalty_code_prefixes: string[];
    priority_countries: string[];
    subsidiary_tokens: string[];
}

const CORPORATE_OWNER_KINDS = ['corporate-entity', 'legal-person', 'other-registrable-person'];

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parses YYYY-MM-DD (time part ignored) as a UTC date.
 */
export function parseRegistryDate(value: string | null | undefined): Date | null {
    const m = /^(\d{4})-(\d{2})-(\d{2})/.exec((value || '').trim());
    if (!m) return null;
    const date = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
    return Number.isNaN(date.getTime()) ? null : date;
}

export function daysBetween(from: Date, to: Date): number {
    const start = Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate());
    const end = Date.UTC(to.getUTCFullYear(), to.getUTCMonth(), to.getUTCDate());
    return Math.floor((end - start) / DAY_MS);
}

/**
 * 🧬 SIGNAL EXTRACTOR
 * Pure transformation from registry facts to named signals.
 * Missing fields never raise: they simply produce no signal.
 */
export class SignalExtractor {
    private readonly tiers: Array<{ max_days: number; points: number }>;
    private readonly priority: Set<string>;
    private readonly mailboxPatterns: Array<{ phrase: string; pattern: RegExp }>;

    constructor(
        private readonly settings: SignalSettings,
        private readonly normalizer: TextNormalizer
    ) {
        this.tiers = [...settings.recency_tiers].sort((a, b) => a.max_days - b.max_days);
        this.priority = new Set(settings.priority_countries.map((c) => canonCountry(c)));
        // Longest phrases first so that "VIRTUAL OFFICE" consumes its "OFFICE".
        this.mailboxPatterns = [...settings.mailbox_phrases]
            .sort((a, b) => b.length - a.length)
            .map((phrase) => ({
                phrase,
                pattern: new RegExp(`(^|[^A-Z0-9])${escapeRegExp(collapse(phrase))}(?=$|[^A-Z0-9])`, 'g'),
            }));
    }

    extract(facts: RegistryFacts, name: string, now: Date): Signals {
        const profile = facts.profile;
        const isForeign = (country: string) => !this.normalizer.isDomesticCountry(country);

        return {
            foreign_officer_address: facts.officers.filter((o) => isForeign(o.address_country)).length,
            foreign_officer_residence: facts.officers.filter((o) => isForeign(o.residence_country)).length,
            foreign_officer_nationality: facts.officers.filter((o) => !this.normalizer.isDomesticNationality(o.nationality)).length,
            corporate_beneficial_owner: facts.owners.some((o) => this.isCorporateOwner(o.kind)),
            foreign_beneficial_owner: facts.owners.some((o) => isForeign(o.country)),
            foreign_registered_office: profile ? isForeign(profile.address.country) : false,
            priority_country_link: this.priorityCountry(facts),
            subsidiary_style_name: this.looksLikeSubsidiary(profile?.display_name || name),
            recency: this.recency(profile?.registration_date ?? null, now),
            mailbox_address_hits: profile
                ? this.mailboxHits([profile.address.street, profile.address.locality, profile.address.postcode].join(' '))
                : [],
            sector: profile ? this.sector(profile.classification_codes) : null,
        };
    }

    isCorporateOwner(kind: string): boolean {
        const k = kind.toLowerCase();
        return CORPORATE_OWNER_KINDS.some((c) => k.includes(c));
    }

    /**
     * First configured priority country among officer residence/address countries and the registered office.
     */
    priorityCountry(facts: RegistryFacts): string | null {
        const countries: string[] = [];
        for (const o of facts.officers) {
            countries.push(o.residence_country, o.address_country);
        }
        if (facts.profile) countries.push(facts.profile.address.country);

        for (const c of countries) {
            const canon = canonCountry(c);
            if (canon && this.priority.has(canon)) return canon;
        }
        return null;
    }

    looksLikeSubsidiary(name: string): boolean {
        const tokens = new Set(tokenize(name));
        return this.settings.subsidiary_tokens.some((t) => tokens.has(collapse(t)));
    }

    recency(registrationDate: string | null, now: Date): { days: number; points: number } | null {
        const date = parseRegistryDate(registrationDate);
        if (!date) return null;
        const days = daysBetween(date, now);
        if (days < 0) return null;
        const tier = this.tiers.find((t) => days <= t.max_days);
        return tier ? { days, points: tier.points } : null;
    }

    mailboxHits(addressText: string): string[] {
        let text = collapse(addressText);
        if (!text) return [];
        const hits = new Set<string>();
        for (const { phrase, pattern } of this.mailboxPatterns) {
            pattern.lastIndex = 0;
            if (pattern.test(text)) {
                hits.add(phrase);
                pattern.lastIndex = 0;
                text = text.replace(pattern, '$1 ');
            }
        }
        return this.settings.mailbox_phrases.filter((p) => hits.has(p));
    }

    /**
     * Codes are scanned in order; for each code the boost lists are tried before the
     * penalty lists and the first code matching either decides.
     */
    sector(codes: string[]): { kind: 'BOOST' | 'PENALTY'; match: string } | null {
        for (const code of codes) {
            const text = collapse(code);
            if (!text) continue;
            const numeric = /^\d+/.exec(text)?.[0] ?? '';

            const boost = this.settings.sector_boost_keywords.find((k) => text.includes(collapse(k)))
                ?? (numeric ? this.settings.sector_boost_code_prefixes.find((p) => numeric.startsWith(p)) : undefined);
            if (boost) return { kind: 'BOOST', match: boost };

            const penalty = this.settings.sector_penalty_keywords.find((k) => text.includes(collapse(k)))
                ?? (numeric ? this.settings.sector_penalty_code_prefixes.find((p) => numeric.startsWith(p)) : undefined);
            if (penalty) return { kind: 'PENALTY', match: penalty };
        }
        return null;
    }
}
