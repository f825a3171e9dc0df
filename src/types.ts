export type LeadSource = 'SPONSOR_REGISTER' | 'COMPANIES_HOUSE';

export type Bucket = 'HOT' | 'MEDIUM' | 'WATCH';

export type VerificationLevel = 'NONE' | 'PLAUSIBLE' | 'VERIFIED';

export interface RegisteredAddress {
    street: string;
    locality: string;
    postcode: string;
    country: string;
}

/**
 * Canonical organisation. `identifier` is the registry number when known,
 * otherwise a derived `NAME::<name>::<locality>` key.
 */
export interface Entity {
    identifier: string;
    display_name: string;
    registration_date: string | null;
    status: string;
    classification_codes: string[];
    address: RegisteredAddress;
}

export interface SponsorRow {
    name: string;
    locality: string;
    county: string;
    route: string;
    sub_route: string;
}

export interface IncorporationItem {
    company_number: string;
    company_name: string;
    date_of_creation: string | null;
    company_status: string;
    locality: string;
    postcode: string;
}

// --- Registry collaborator contract ---

export interface RegistrySearchHit {
    title: string;
    identifier: string;
    status: string;
    address_snippet: string;
}

export interface Officer {
    name: string;
    address_country: string;
    residence_country: string;
    nationality: string;
}

export interface BeneficialOwner {
    name: string;
    kind: string;
    country: string;
}

export interface RegistryFacts {
    profile: Entity | null;
    officers: Officer[];
    owners: BeneficialOwner[];
}

export interface RegistryClient {
    search(query: string, hints?: { limit?: number }): Promise<RegistrySearchHit[]>;
    profile(identifier: string): Promise<Entity | null>;
    officers(identifier: string): Promise<Officer[]>;
    owners(identifier: string): Promise<BeneficialOwner[]>;
    incorporatedBetween(from: string, to: string, max: number): Promise<IncorporationItem[]>;
}

export interface SponsorRegisterSource {
    fetchRows(): Promise<SponsorRow[]>;
}

// --- Enrichment collaborator contracts ---

export interface SerpResult {
    title: string;
    link: string;
    snippet: string;
}

export interface SearchProvider {
    name: string;
    query(q: string, locale: string): Promise<SerpResult[]>;
}

export interface PageLink {
    url: string;
    text: string;
}

export interface FetchedPage {
    url: string;
    status: number;
    ok: boolean;
    text: string;
    links: PageLink[];
}

export interface PageFetcher {
    fetch(url: string): Promise<FetchedPage>;
}

// --- Pipeline records ---

export interface MatchResult {
    identifier: string;
    score: number;
    title: string;
    candidates: number;
    errors: number;
    best_rejected_score: number;
}

export interface Signals {
    foreign_officer_address: number;
    foreign_officer_residence: number;
    foreign_officer_nationality: number;
    corporate_beneficial_owner: boolean;
    foreign_beneficial_owner: boolean;
    foreign_registered_office: boolean;
    priority_country_link: string | null;
    subsidiary_style_name: boolean;
    recency: { days: number; points: number } | null;
    mailbox_address_hits: string[];
    sector: { kind: 'BOOST' | 'PENALTY'; match: string } | null;
}

export interface ScoreResult {
    score: number;
    bucket: Bucket;
    rationale: string[];
}

export type EnrichmentStage =
    | 'NOT_ATTEMPTED'
    | 'DISCOVERED'
    | 'UNVERIFIED'
    | 'PLAUSIBLE'
    | 'VERIFIED'
    | 'CONTACTS_EXTRACTED';

export enum EnrichStatus {
    SKIPPED_BUDGET = 'Skipped (budget cap)',
    SKIPPED_LOW_PRIORITY = 'Skipped (low priority)',
    NO_CANDIDATE = 'No website found',
    SEARCH_FAILED = 'Search failed',
    LOW_CONFIDENCE = 'Low confidence',
    PLAUSIBLE = 'Manual verify needed',
    VERIFIED_WITH_CONTACTS = 'Verified & scraped',
    VERIFIED_NO_CONTACTS = 'Verified (no contacts found)',
}

export interface HiringIntent {
    score: number;
    evidence: string[];
}

export interface EnrichmentResult {
    website: string;
    level: VerificationLevel;
    verification_score: number;
    evidence: string[];
    emails: string[];
    phones: string[];
    status: EnrichStatus;
    stage: EnrichmentStage;
    hiring_intent: HiringIntent | null;
    from_cache: boolean;
    updated_at: string;
}

export interface Lead {
    lead_id: string;
    entity: Entity;
    signals: Signals;
    score: ScoreResult;
    enrichment: EnrichmentResult;
    provenance: LeadSource[];
    sponsor_route: string;
    sponsor_sub_route: string;
    seen_keys: string[];
    backfilled: boolean;
    first_seen: string;
    last_seen: string;
}
