/**
 * 🗄️ STATE STORE
 * SQLite (WAL) persistence for seen keys, run metadata, leads, the
 * enrichment cache and the sponsor → registry mapping cache.
 *
 * Tables:
 * - meta: run-level bookkeeping (baseline flag)
 * - seen: source-qualified keys already considered
 * - leads: one row per entity, upserted each run
 * - enrichment_cache: per-entity enrichment with timestamp
 * - sponsor_company_map: confirmed sponsor row → company number matches
 * - runs: run journal
 * - suppressions: entities that must never be surfaced again
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type { EnrichmentCache } from '../core/enrichment/enrichment_pipeline';
import type { EnrichmentResult, Lead, LeadSource } from '../types';
import { Logger } from '../utils/logger';
import { toError } from '../utils/errors';
import { EnrichmentResultSchema, LeadSchema } from './schemas';

const DAY_MS = 24 * 60 * 60 * 1000;

export const META_SPONSOR_BASELINED = 'sponsor_baselined';

export interface SeenEntry {
    key: string;
    source: LeadSource;
}

export interface StoredLead {
    lead: Lead;
    surfaced: boolean;
}

export interface RunCommit {
    leads: StoredLead[];
    seen: SeenEntry[];
    stats: Record<string, number>;
}

export interface RecentLeadQuery {
    now: Date;
    days: number;
    cooldownDays: number;
    limit: number;
    exclude: Set<string>;
}

export interface StoreStats {
    seen: number;
    leads: number;
    cached_enrichments: number;
    suppressed: number;
    runs: number;
    last_run: { run_id: string; status: string; started_utc: string; finished_utc: string | null } | null;
}

interface LeadRow {
    entity_id: string;
    payload: string;
    first_seen_utc: string;
}

export class StateStore implements EnrichmentCache {
    private readonly db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            const dataDir = path.dirname(dbPath);
            if (!fs.existsSync(dataDir)) {
                fs.mkdirSync(dataDir, { recursive: true });
            }
        }

        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
        this.db.pragma('busy_timeout = 30000');
        this.db.pragma('foreign_keys = ON');

        this.initializeSchema();
        Logger.debug(`🗄️ SQLite connected: ${dbPath}`);
    }

    private initializeSchema(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS meta (
                k TEXT PRIMARY KEY,
                v TEXT NOT NULL
            );

            CREATE TABLE IF NOT EXISTS seen (
                key TEXT PRIMARY KEY,
                source TEXT NOT NULL,
                first_seen_utc TEXT NOT NULL
            );

            CREATE TABLE IF NOT EXISTS leads (
                entity_id TEXT PRIMARY KEY,
                lead_id TEXT NOT NULL,
                company_name TEXT NOT NULL,
                score INTEGER NOT NULL,
                bucket TEXT NOT NULL,
                provenance TEXT NOT NULL,
                payload TEXT NOT NULL,
                first_seen_utc TEXT NOT NULL,
                last_seen_utc TEXT NOT NULL,
                last_surfaced_utc TEXT,
                run_id TEXT
            );

            CREATE TABLE IF NOT EXISTS enrichment_cache (
                entity_id TEXT PRIMARY KEY,
                payload TEXT NOT NULL,
                updated_utc TEXT NOT NULL
            );

            CREATE TABLE IF NOT EXISTS sponsor_company_map (
                sponsor_key TEXT PRIMARY KEY,
                company_number TEXT NOT NULL,
                match_score INTEGER NOT NULL,
                updated_utc TEXT NOT NULL
            );

            CREATE TABLE IF NOT EXISTS runs (
                run_id TEXT PRIMARY KEY,
                started_utc TEXT NOT NULL,
                finished_utc TEXT,
                status TEXT NOT NULL,
                stats TEXT,
                error TEXT
            );

            CREATE TABLE IF NOT EXISTS suppressions (
                entity_id TEXT PRIMARY KEY,
                reason TEXT NOT NULL,
                created_utc TEXT NOT NULL
            );

            CREATE INDEX IF NOT EXISTS idx_leads_recent ON leads(last_seen_utc, score);
        `);
    }

    close(): void {
        this.db.close();
    }

    // --- meta ---

    getMeta(key: string): string | null {
        const row = this.db.prepare<[string], { v: string }>('SELECT v FROM meta WHERE k = ?').get(key);
        return row?.v ?? null;
    }

    setMeta(key: string, value: string): void {
        this.db.prepare('INSERT INTO meta (k, v) VALUES (?, ?) ON CONFLICT(k) DO UPDATE SET v = excluded.v').run(key, value);
    }

    // --- seen ---

    isSeen(key: string): boolean {
        return this.db.prepare<[string], { key: string }>('SELECT key FROM seen WHERE key = ?').get(key) !== undefined;
    }

    private insertSeen(entries: SeenEntry[], nowIso: string): void {
        const stmt = this.db.prepare('INSERT OR IGNORE INTO seen (key, source, first_seen_utc) VALUES (?, ?, ?)');
        for (const entry of entries) {
            stmt.run(entry.key, entry.source, nowIso);
        }
    }

    /**
     * First-run baseline: every current sponsor row is recorded as seen and the
     * flag is set, in one transaction.
     */
    baselineSponsorRows(keys: string[], now: Date): void {
        const nowIso = now.toISOString();
        this.db.transaction(() => {
            this.insertSeen(keys.map((key) => ({ key, source: 'SPONSOR_REGISTER' as const })), nowIso);
            this.setMeta(META_SPONSOR_BASELINED, '1');
        })();
    }

    isSponsorBaselined(): boolean {
        return this.getMeta(META_SPONSOR_BASELINED) === '1';
    }

    // --- enrichment cache ---

    getFreshEnrichment(identifier: string, now: Date, ttlDays: number): EnrichmentResult | null {
        if (!identifier || ttlDays <= 0) return null;
        const row = this.db
            .prepare<[string], { payload: string; updated_utc: string }>('SELECT payload, updated_utc FROM enrichment_cache WHERE entity_id = ?')
            .get(identifier);
        if (!row) return null;

        const updated = Date.parse(row.updated_utc);
        if (Number.isNaN(updated) || now.getTime() - updated > ttlDays * DAY_MS) {
            return null;
        }

        const parsed = EnrichmentResultSchema.safeParse(JSON.parse(row.payload));
        if (!parsed.success) {
            Logger.warn('[StateStore] Discarding malformed cached enrichment', { company_number: identifier });
            return null;
        }
        return parsed.data;
    }

    putEnrichment(identifier: string, result: EnrichmentResult): void {
        if (!identifier) return;
        this.db.prepare(`
            INSERT INTO enrichment_cache (entity_id, payload, updated_utc) VALUES (?, ?, ?)
            ON CONFLICT(entity_id) DO UPDATE SET payload = excluded.payload, updated_utc = excluded.updated_utc
        `).run(identifier, JSON.stringify({ ...result, from_cache: false }), result.updated_at);
    }

    // --- sponsor mapping ---

    getSponsorMapping(sponsorKey: string): { company_number: string; match_score: number } | null {
        return this.db
            .prepare<[string], { company_number: string; match_score: number }>('SELECT company_number, match_score FROM sponsor_company_map WHERE sponsor_key = ?')
            .get(sponsorKey) ?? null;
    }

    putSponsorMapping(sponsorKey: string, companyNumber: string, matchScore: number, now: Date): void {
        this.db.prepare(`
            INSERT INTO sponsor_company_map (sponsor_key, company_number, match_score, updated_utc) VALUES (?, ?, ?, ?)
            ON CONFLICT(sponsor_key) DO UPDATE SET company_number = excluded.company_number,
                match_score = excluded.match_score, updated_utc = excluded.updated_utc
        `).run(sponsorKey, companyNumber, matchScore, now.toISOString());
    }

    // --- suppressions ---

    suppress(identifier: string, reason: string, now: Date): void {
        this.db.prepare(`
            INSERT INTO suppressions (entity_id, reason, created_utc) VALUES (?, ?, ?)
            ON CONFLICT(entity_id) DO UPDATE SET reason = excluded.reason
        `).run(identifier, reason, now.toISOString());
    }

    isSuppressed(identifier: string): boolean {
        return this.db.prepare<[string], { entity_id: string }>('SELECT entity_id FROM suppressions WHERE entity_id = ?').get(identifier) !== undefined;
    }

    // --- runs ---

    startRun(runId: string, now: Date): void {
        this.db.prepare("INSERT INTO runs (run_id, started_utc, status) VALUES (?, ?, 'RUNNING')").run(runId, now.toISOString());
    }

    failRun(runId: string, now: Date, error: Error): void {
        this.db.prepare("UPDATE runs SET finished_utc = ?, status = 'FAILED', error = ? WHERE run_id = ?")
            .run(now.toISOString(), error.message, runId);
    }

    /**
     * Stores every lead, marks every consumed key seen and closes the run in a
     * single transaction: a crash leaves either all of it or none of it.
     */
    commitRun(runId: string, commit: RunCommit, now: Date): void {
        const nowIso = now.toISOString();
        const existing = this.db.prepare<[string], { first_seen_utc: string }>('SELECT first_seen_utc FROM leads WHERE entity_id = ?');
        const upsert = this.db.prepare(`
            INSERT INTO leads (entity_id, lead_id, company_name, score, bucket, provenance, payload,
                first_seen_utc, last_seen_utc, last_surfaced_utc, run_id)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
            ON CONFLICT(entity_id) DO UPDATE SET
                lead_id = excluded.lead_id,
                company_name = excluded.company_name,
                score = excluded.score,
                bucket = excluded.bucket,
                provenance = excluded.provenance,
                payload = excluded.payload,
                last_seen_utc = excluded.last_seen_utc,
                last_surfaced_utc = COALESCE(excluded.last_surfaced_utc, leads.last_surfaced_utc),
                run_id = excluded.run_id
        `);
        const markSurfaced = this.db.prepare('UPDATE leads SET last_surfaced_utc = ? WHERE entity_id = ?');

        try {
            this.db.transaction(() => {
                for (const { lead, surfaced } of commit.leads) {
                    const id = lead.entity.identifier;
                    if (lead.backfilled) {
                        markSurfaced.run(nowIso, id);
                        continue;
                    }
                    const firstSeen = existing.get(id)?.first_seen_utc ?? lead.first_seen;
                    const stored: Lead = { ...lead, first_seen: firstSeen };
                    upsert.run(
                        id,
                        lead.lead_id,
                        lead.entity.display_name,
                        lead.score.score,
                        lead.score.bucket,
                        lead.provenance.join('+'),
                        JSON.stringify(stored),
                        firstSeen,
                        lead.last_seen,
                        surfaced ? nowIso : null,
                        runId
                    );
                }
                this.insertSeen(commit.seen, nowIso);
                this.db.prepare("UPDATE runs SET finished_utc = ?, status = 'COMPLETED', stats = ? WHERE run_id = ?")
                    .run(nowIso, JSON.stringify(commit.stats), runId);
            })();
        } catch (err) {
            Logger.logError('[StateStore] Run commit failed, rolled back', toError(err), { run_id: runId });
            throw err;
        }
    }

    // --- leads ---

    getLead(identifier: string): Lead | null {
        const row = this.db
            .prepare<[string], LeadRow>('SELECT entity_id, payload, first_seen_utc FROM leads WHERE entity_id = ?')
            .get(identifier);
        return row ? this.parseLead(row) : null;
    }

    /**
     * Backfill pool: leads seen within `days`, not surfaced within the cooldown,
     * not suppressed, never-surfaced first, then score and recency.
     */
    recentLeads(query: RecentLeadQuery): Lead[] {
        const since = new Date(query.now.getTime() - query.days * DAY_MS).toISOString();
        const cooldown = new Date(query.now.getTime() - query.cooldownDays * DAY_MS).toISOString();
        // excluded ids are filtered in SQL so they never take up the LIMIT window
        const rows = this.db.prepare<[string, string, string, number], LeadRow>(`
            SELECT l.entity_id, l.payload, l.first_seen_utc
            FROM leads l
            LEFT JOIN suppressions s ON s.entity_id = l.entity_id
            WHERE s.entity_id IS NULL
              AND l.last_seen_utc >= ?
              AND (l.last_surfaced_utc IS NULL OR l.last_surfaced_utc < ?)
              AND l.entity_id NOT IN (SELECT value FROM json_each(?))
            ORDER BY (l.last_surfaced_utc IS NULL) DESC, l.score DESC, l.last_seen_utc DESC
            LIMIT ?
        `).all(since, cooldown, JSON.stringify([...query.exclude]), query.limit);

        const leads: Lead[] = [];
        for (const row of rows) {
            const lead = this.parseLead(row);
            if (lead) leads.push(lead);
        }
        return leads;
    }

    private parseLead(row: LeadRow): Lead | null {
        const parsed = LeadSchema.safeParse(JSON.parse(row.payload));
        if (!parsed.success) {
            Logger.warn('[StateStore] Skipping malformed stored lead', { company_number: row.entity_id });
            return null;
        }
        return { ...parsed.data, first_seen: row.first_seen_utc };
    }

    getStats(): StoreStats {
        const count = (table: string) =>
            this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;
        const lastRun = this.db
            .prepare<[], { run_id: string; status: string; started_utc: string; finished_utc: string | null }>(
                'SELECT run_id, status, started_utc, finished_utc FROM runs ORDER BY started_utc DESC LIMIT 1'
            )
            .get();
        return {
            seen: count('seen'),
            leads: count('leads'),
            cached_enrichments: count('enrichment_cache'),
            suppressed: count('suppressions'),
            runs: count('runs'),
            last_run: lastRun ?? null,
        };
    }
}
