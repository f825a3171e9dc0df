import fs from 'fs';
import path from 'path';
import { createObjectCsvWriter } from 'csv-writer';
import type { Lead } from '../types';
import { ConfigurationError } from '../utils/errors';
import { Logger } from '../utils/logger';

export const CSV_COLUMNS = [
    'lead_id',
    'bucket',
    'score',
    'company_name',
    'company_number',
    'locality',
    'postcode',
    'provenance',
    'sponsor_route',
    'website',
    'verification_level',
    'verification_score',
    'emails',
    'phones',
    'enrich_status',
    'rationale',
    'backfilled',
] as const;

export type CsvColumn = typeof CSV_COLUMNS[number];
export type CsvRow = Record<CsvColumn, string | number>;

export function toCsvRow(lead: Lead): CsvRow {
    const route = [lead.sponsor_route, lead.sponsor_sub_route].filter(Boolean).join(': ');
    return {
        lead_id: lead.lead_id,
        bucket: lead.score.bucket,
        score: lead.score.score,
        company_name: lead.entity.display_name,
        company_number: lead.entity.identifier.startsWith('NAME::') ? '' : lead.entity.identifier,
        locality: lead.entity.address.locality,
        postcode: lead.entity.address.postcode,
        provenance: lead.provenance.join('+'),
        sponsor_route: route,
        website: lead.enrichment.website,
        verification_level: lead.enrichment.level,
        verification_score: lead.enrichment.verification_score,
        emails: lead.enrichment.emails.join('; '),
        phones: lead.enrichment.phones.join('; '),
        enrich_status: lead.enrichment.status,
        rationale: lead.score.rationale.join(' | '),
        backfilled: lead.backfilled ? 'yes' : 'no',
    };
}

/**
 * 📤 CSV EXPORT
 * Writes the run's final lead list, header included, replacing any previous file.
 */
export async function exportLeadsCsv(leads: Lead[], outputPath: string): Promise<string> {
    if (!outputPath) {
        throw new ConfigurationError('OUTPUT_CSV_PATH is required to export leads');
    }

    const filePath = path.resolve(outputPath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    const writer = createObjectCsvWriter({
        path: filePath,
        header: CSV_COLUMNS.map((id) => ({ id, title: id })),
    });
    await writer.writeRecords(leads.map(toCsvRow));

    Logger.info(`📤 Exported ${leads.length} leads to ${filePath}`);
    return filePath;
}
