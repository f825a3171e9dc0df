/**
 * Text normalization for organisation names, countries and addresses.
 * Everything here is pure: null/undefined input yields an empty string.
 */

export const LEGAL_SUFFIXES = new Set([
    'LIMITED', 'LTD', 'PLC', 'LLP', 'GROUP', 'HOLDINGS', 'HOLDING', 'INTERNATIONAL', 'INTL', 'UK',
]);

const COUNTRY_ALIASES: Record<string, string> = {
    'USA': 'UNITED STATES',
    'US': 'UNITED STATES',
    'U.S.A.': 'UNITED STATES',
    'U.S.': 'UNITED STATES',
    'UNITED STATES OF AMERICA': 'UNITED STATES',
    'UAE': 'UNITED ARAB EMIRATES',
    'U.A.E.': 'UNITED ARAB EMIRATES',
    'PRC': 'CHINA',
    "PEOPLE'S REPUBLIC OF CHINA": 'CHINA',
    'DEUTSCHLAND': 'GERMANY',
    'HOLLAND': 'NETHERLANDS',
    'THE NETHERLANDS': 'NETHERLANDS',
    'REPUBLIC OF IRELAND': 'IRELAND',
    'SOUTH KOREA': 'KOREA',
    'REPUBLIC OF KOREA': 'KOREA',
};

/**
 * Whitespace-collapsed, upper-cased text.
 */
export function collapse(text: string | null | undefined): string {
    if (!text) return '';
    return text.replace(/\s+/g, ' ').trim().toUpperCase();
}

/**
 * Upper-cased, diacritics removed, every non-alphanumeric run turned into one space.
 */
export function simplify(text: string | null | undefined): string {
    if (!text) return '';
    return text
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .toUpperCase()
        .replace(/[^A-Z0-9]+/g, ' ')
        .trim();
}

export function tokenize(text: string | null | undefined): string[] {
    const simple = simplify(text);
    return simple ? simple.split(' ') : [];
}

/**
 * Entity-normalized name: punctuation stripped, "&" spelled out, legal suffixes
 * and a leading "THE" removed. Falls back to the simplified form when the name
 * consists of suffixes only.
 */
export function normalizeEntityName(text: string | null | undefined): string {
    if (!text) return '';
    const prepared = text
        .replace(/\bL\.T\.D\.?/gi, ' LTD ')
        .replace(/&/g, ' AND ');
    const tokens = tokenize(prepared);
    if (tokens.length === 0) return '';

    const kept = tokens.filter((t) => !LEGAL_SUFFIXES.has(t));
    if (kept[0] === 'THE' && kept.length > 1) {
        kept.shift();
    }
    return kept.length > 0 ? kept.join(' ') : tokens.join(' ');
}

/**
 * Display-friendly cleanup that keeps the original casing.
 */
export function cleanDisplayName(text: string | null | undefined): string {
    if (!text) return '';
    return text
        .replace(/\s+/g, ' ')
        .replace(/^[\s"'`.,;:*\-]+/, '')
        .replace(/[\s"'`,;:*\-]+$/, '')
        .trim();
}

export function canonCountry(country: string | null | undefined): string {
    const c = collapse(country);
    return COUNTRY_ALIASES[c] ?? c;
}

export function postcodeKey(postcode: string | null | undefined): string {
    if (!postcode) return '';
    return postcode.toUpperCase().replace(/[^A-Z0-9]/g, '');
}

/**
 * Share of non-space characters that are not letters or digits.
 */
export function nonAlnumRatio(text: string | null | undefined): number {
    const compact = (text || '').replace(/\s+/g, '');
    if (compact.length === 0) return 1;
    const other = compact.replace(/[A-Za-z0-9]/g, '').length;
    return other / compact.length;
}

export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Registry numbers are eight characters: digits, or a two-letter prefix (SC, NI, OC...) and digits.
 */
export function isRegistryNumber(identifier: string): boolean {
    return /^(?:\d{8}|[A-Z]{2}\d{6})$/.test(identifier);
}

/**
 * Up to four registry-search variants in preference order.
 */
export function nameQueryVariants(name: string, locality?: string): string[] {
    const raw = cleanDisplayName(name);
    if (!raw) return [];

    const variants = [raw, normalizeEntityName(raw)];
    if (raw.includes('&')) {
        variants.push(raw.replace(/\s*&\s*/g, ' and '));
    } else if (/\band\b/i.test(raw)) {
        variants.push(raw.replace(/\s+and\s+/gi, ' & '));
    }
    const town = cleanDisplayName(locality);
    if (town) {
        variants.push(`${raw} ${town}`);
    }

    const seen = new Set<string>();
    const out: string[] = [];
    for (const v of variants) {
        const key = collapse(v);
        if (!key || seen.has(key)) continue;
        seen.add(key);
        out.push(v);
    }
    return out.slice(0, 4);
}

export interface NormalizerSettings {
    domestic_countries: string[];
    domestic_nationalities: string[];
    min_clean_name_length: number;
    max_non_alnum_ratio: number;
}

/**
 * Config-bound classification helpers (domestic allow-lists, noise filter).
 */
export class TextNormalizer {
    private readonly domesticCountries: Set<string>;
    private readonly domesticNationalities: Set<string>;

    constructor(private readonly settings: NormalizerSettings) {
        this.domesticCountries = new Set(settings.domestic_countries.map((c) => collapse(c)));
        this.domesticNationalities = new Set(settings.domestic_nationalities.map((n) => collapse(n)));
    }

    /**
     * Empty counts as domestic: missing data is never read as foreign.
     */
    isDomesticCountry(country: string | null | undefined): boolean {
        const c = collapse(country);
        if (!c) return true;
        return this.domesticCountries.has(c) || this.domesticCountries.has(c.replace(/\./g, ''));
    }

    isDomesticNationality(nationality: string | null | undefined): boolean {
        const parts = (nationality || '')
            .split(/[,/;]/)
            .map((p) => collapse(p))
            .filter(Boolean);
        return parts.every((p) => this.domesticNationalities.has(p));
    }

    isNoiseName(name: string | null | undefined): boolean {
        const clean = cleanDisplayName(name);
        if (clean.length < this.settings.min_clean_name_length) return true;
        return nonAlnumRatio(clean) > this.settings.max_non_alnum_ratio;
    }
}
