import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppConfig } from '../config';
import type {
    BeneficialOwner,
    Entity,
    IncorporationItem,
    Officer,
    RegistryClient,
    RegistrySearchHit,
} from '../types';
import { ConfigurationError, NetworkError, ValidationError } from '../utils/errors';
import { createHttpClient, isNotFound } from './http';

const API_BASE = 'https://api.company-information.service.gov.uk';
const PAGE_SIZE = 100;

const AddressSchema = z.object({
    premises: z.string().optional(),
    address_line_1: z.string().optional(),
    address_line_2: z.string().optional(),
    locality: z.string().optional(),
    region: z.string().optional(),
    postal_code: z.string().optional(),
    country: z.string().optional(),
}).partial();

const SearchSchema = z.object({
    items: z.array(z.object({
        title: z.string().default(''),
        company_number: z.string().default(''),
        company_status: z.string().default(''),
        address_snippet: z.string().default(''),
    })).default([]),
});

const ProfileSchema = z.object({
    company_name: z.string().default(''),
    company_number: z.string(),
    company_status: z.string().default(''),
    date_of_creation: z.string().optional(),
    sic_codes: z.array(z.string()).default([]),
    registered_office_address: AddressSchema.default({}),
});

const OfficersSchema = z.object({
    items: z.array(z.object({
        name: z.string().default(''),
        address: AddressSchema.optional(),
        country_of_residence: z.string().optional(),
        nationality: z.string().optional(),
        resigned_on: z.string().optional(),
    })).default([]),
});

const OwnersSchema = z.object({
    items: z.array(z.object({
        name: z.string().default(''),
        kind: z.string().default(''),
        address: AddressSchema.optional(),
        country_of_residence: z.string().optional(),
        identification: z.object({ country_registered: z.string().optional() }).partial().optional(),
        ceased_on: z.string().optional(),
    })).default([]),
});

const AdvancedSearchSchema = z.object({
    items: z.array(z.object({
        company_number: z.string(),
        company_name: z.string().default(''),
        company_status: z.string().default(''),
        date_of_creation: z.string().optional(),
        registered_office_address: AddressSchema.optional(),
    })).default([]),
    hits: z.number().optional(),
});

type RawAddress = z.infer<typeof AddressSchema>;

export function flattenStreet(address: RawAddress | undefined): string {
    if (!address) return '';
    return [address.premises, address.address_line_1, address.address_line_2]
        .map((p) => (p || '').trim())
        .filter(Boolean)
        .join(', ');
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        throw new ValidationError(`Unexpected Companies House ${what} payload`, {
            issues: parsed.error.issues.slice(0, 3).map((i) => `${i.path.join('.')}: ${i.message}`),
        });
    }
    return parsed.data;
}

export function mapProfile(data: unknown): Entity {
    const p = parse(ProfileSchema, data, 'profile');
    const a = p.registered_office_address;
    return {
        identifier: p.company_number.trim().toUpperCase(),
        display_name: p.company_name.trim(),
        registration_date: p.date_of_creation ?? null,
        status: p.company_status,
        classification_codes: p.sic_codes,
        address: {
            street: flattenStreet(a),
            locality: (a.locality || '').trim(),
            postcode: (a.postal_code || '').trim(),
            country: (a.country || '').trim(),
        },
    };
}

export function mapOfficers(data: unknown): Officer[] {
    return parse(OfficersSchema, data, 'officers').items
        .filter((o) => !o.resigned_on)
        .map((o) => ({
            name: o.name,
            address_country: (o.address?.country || '').trim(),
            residence_country: (o.country_of_residence || '').trim(),
            nationality: (o.nationality || '').trim(),
        }));
}

export function mapOwners(data: unknown): BeneficialOwner[] {
    return parse(OwnersSchema, data, 'persons with significant control').items
        .filter((o) => !o.ceased_on)
        .map((o) => ({
            name: o.name,
            kind: o.kind,
            country: (o.identification?.country_registered || o.address?.country || o.country_of_residence || '').trim(),
        }));
}

/**
 * 🏛️ COMPANIES HOUSE CLIENT
 * Not-found responses come back as null / [] rather than errors.
 */
export class CompaniesHouseClient implements RegistryClient {
    private readonly http: AxiosInstance;

    constructor(config: AppConfig, http?: AxiosInstance) {
        if (!http && !config.runtime.companiesHouseApiKey) {
            throw new ConfigurationError('COMPANIES_HOUSE_API_KEY is required');
        }
        this.http = http ?? createHttpClient({
            baseURL: API_BASE,
            timeoutMs: config.runtime.httpTimeoutMs,
            retries: config.runtime.httpRetries,
            userAgent: config.runtime.userAgent,
            auth: { username: config.runtime.companiesHouseApiKey, password: '' },
        });
    }

    private async getJson(path: string, params?: Record<string, string | number>): Promise<unknown | null> {
        try {
            const res = await this.http.get<unknown>(path, { params });
            return res.data;
        } catch (err) {
            if (isNotFound(err)) return null;
            const message = err instanceof Error ? err.message : String(err);
            throw new NetworkError(`Companies House request failed: ${path}: ${message}`, { path });
        }
    }

    async search(query: string, hints?: { limit?: number }): Promise<RegistrySearchHit[]> {
        const data = await this.getJson('/search/companies', { q: query, items_per_page: hints?.limit ?? 10 });
        if (data === null) return [];
        return parse(SearchSchema, data, 'search').items.map((i) => ({
            title: i.title,
            identifier: i.company_number.trim().toUpperCase(),
            status: i.company_status,
            address_snippet: i.address_snippet,
        }));
    }

    async profile(identifier: string): Promise<Entity | null> {
        const data = await this.getJson(`/company/${encodeURIComponent(identifier)}`);
        return data === null ? null : mapProfile(data);
    }

    async officers(identifier: string): Promise<Officer[]> {
        const data = await this.getJson(`/company/${encodeURIComponent(identifier)}/officers`, { items_per_page: PAGE_SIZE });
        return data === null ? [] : mapOfficers(data);
    }

    async owners(identifier: string): Promise<BeneficialOwner[]> {
        const data = await this.getJson(`/company/${encodeURIComponent(identifier)}/persons-with-significant-control`, { items_per_page: PAGE_SIZE });
        return data === null ? [] : mapOwners(data);
    }

    async incorporatedBetween(from: string, to: string, max: number): Promise<IncorporationItem[]> {
        const out: IncorporationItem[] = [];
        let startIndex = 0;

        while (out.length < max) {
            const data = await this.getJson('/advanced-search/companies', {
                incorporated_from: from,
                incorporated_to: to,
                size: PAGE_SIZE,
                start_index: startIndex,
            });
            if (data === null) break;

            const page = parse(AdvancedSearchSchema, data, 'advanced search').items;
            for (const item of page) {
                out.push({
                    company_number: item.company_number.trim().toUpperCase(),
                    company_name: item.company_name.trim(),
                    date_of_creation: item.date_of_creation ?? null,
                    company_status: item.company_status,
                    locality: (item.registered_office_address?.locality || '').trim(),
                    postcode: (item.registered_office_address?.postal_code || '').trim(),
                });
                if (out.length >= max) break;
            }

            if (page.length < PAGE_SIZE) break;
            startIndex += PAGE_SIZE;
        }
        return out;
    }
}
