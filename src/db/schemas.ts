import { z } from 'zod';
import { EnrichStatus } from '../types';

// Shapes of the JSON payloads stored in SQLite; parsed back on read.

const AddressSchema = z.object({
    street: z.string(),
    locality: z.string(),
    postcode: z.string(),
    country: z.string(),
});

export const EntitySchema = z.object({
    identifier: z.string(),
    display_name: z.string(),
    registration_date: z.string().nullable(),
    status: z.string(),
    classification_codes: z.array(z.string()),
    address: AddressSchema,
});

export const SignalsSchema = z.object({
    foreign_officer_address: z.number(),
    foreign_officer_residence: z.number(),
    foreign_officer_nationality: z.number(),
    corporate_beneficial_owner: z.boolean(),
    foreign_beneficial_owner: z.boolean(),
    foreign_registered_office: z.boolean(),
    priority_country_link: z.string().nullable(),
    subsidiary_style_name: z.boolean(),
    recency: z.object({ days: z.number(), points: z.number() }).nullable(),
    mailbox_address_hits: z.array(z.string()),
    sector: z.object({ kind: z.enum(['BOOST', 'PENALTY']), match: z.string() }).nullable(),
});

export const EnrichmentResultSchema = z.object({
    website: z.string(),
    level: z.enum(['NONE', 'PLAUSIBLE', 'VERIFIED']),
    verification_score: z.number(),
    evidence: z.array(z.string()),
    emails: z.array(z.string()),
    phones: z.array(z.string()),
    status: z.nativeEnum(EnrichStatus),
    stage: z.enum(['NOT_ATTEMPTED', 'DISCOVERED', 'UNVERIFIED', 'PLAUSIBLE', 'VERIFIED', 'CONTACTS_EXTRACTED']),
    hiring_intent: z.object({ score: z.number(), evidence: z.array(z.string()) }).nullable(),
    from_cache: z.boolean(),
    updated_at: z.string(),
});

export const LeadSchema = z.object({
    lead_id: z.string(),
    entity: EntitySchema,
    signals: SignalsSchema,
    score: z.object({
        score: z.number(),
        bucket: z.enum(['HOT', 'MEDIUM', 'WATCH']),
        rationale: z.array(z.string()),
    }),
    enrichment: EnrichmentResultSchema,
    provenance: z.array(z.enum(['SPONSOR_REGISTER', 'COMPANIES_HOUSE'])),
    sponsor_route: z.string(),
    sponsor_sub_route: z.string(),
    seen_keys: z.array(z.string()),
    backfilled: z.boolean(),
    first_seen: z.string(),
    last_seen: z.string(),
});
