import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config';
import { StateStore } from '../../src/db/state_store';
import { incorporationSeenKey, LeadRun, sponsorSeenKey } from '../../src/pipeline/lead_run';
import { EnrichStatus, type SponsorRow } from '../../src/types';
import { Logger } from '../../src/utils/logger';
import { FakeFetcher, FakeRegistry, FakeSearch, FakeSponsorRegister, makeEntity } from '../helpers/fakes';

const DAY1 = new Date('2026-10-17T06:00:00Z');
const DAY2 = new Date('2026-10-18T06:00:00Z');
const DAY3 = new Date('2026-10-19T06:00:00Z');

const config = loadConfig({ env: { SEARCH_SLEEP_MS: '0' } });

const row = (name: string, locality: string, route = 'Skilled Worker'): SponsorRow =>
  ({ name, locality, county: '', route, sub_route: '' });

const ACME = row('Acme Robotics Ltd', 'Leeds');
const BETA = row('Beta Widgets Ltd', 'York');
const TAXIS = row('Gamma Taxis', 'Hull', 'Temporary Worker');
const ZETA = row('Zeta Software Ltd', 'Manchester');
const NIMBUS = row('Nimbus Care Services', 'Hull');

function zetaRegistry(): FakeRegistry {
  const registry = new FakeRegistry();
  registry.hits = [
    { title: 'ZETA SOFTWARE LIMITED', identifier: '12345678', status: 'active', address_snippet: '5 Deansgate, Manchester, M3 2BW' },
  ];
  registry.add({
    profile: makeEntity({
      identifier: '12345678',
      display_name: 'ZETA SOFTWARE LIMITED',
      registration_date: '2026-09-01',
      classification_codes: ['62012'],
      address: { street: '5 Deansgate', locality: 'Manchester', postcode: 'M3 2BW', country: 'England' },
    }),
    officers: [{ name: 'ROSSI, Marco', address_country: 'Italy', residence_country: 'Italy', nationality: 'Italian' }],
    owners: [{ name: 'Zeta Software SpA', kind: 'corporate-entity-person-with-significant-control', country: 'Italy' }],
  });
  return registry;
}

describe('LeadRun', () => {
  let store: StateStore;

  beforeAll(() => Logger.silence());
  beforeEach(() => {
    store = new StateStore(':memory:');
  });
  afterEach(() => store.close());

  function runWith(registry: FakeRegistry, rows: SponsorRow[], search = new FakeSearch()): LeadRun {
    return new LeadRun({
      config,
      store,
      registry,
      sponsors: new FakeSponsorRegister(rows),
      search,
      fetcher: new FakeFetcher(),
    });
  }

  it('baselines the register on the first run and surfaces only new rows afterwards', async () => {
    const registry = zetaRegistry();

    const first = await runWith(registry, [ACME, BETA, TAXIS]).execute(DAY1);
    expect(first.baseline).toBe(true);
    expect(first.leads).toEqual([]);
    expect(registry.searches).toEqual([]);
    expect(store.isSeen(sponsorSeenKey(ACME))).toBe(true);
    expect(store.isSeen(sponsorSeenKey(TAXIS))).toBe(false);

    const second = await runWith(registry, [ACME, BETA, TAXIS, ZETA]).execute(DAY2);
    expect(second.baseline).toBe(false);
    expect(second.leads).toHaveLength(1);

    const [lead] = second.leads;
    expect(lead.entity.identifier).toBe('12345678');
    expect(lead.provenance).toEqual(['SPONSOR_REGISTER']);
    expect(lead.score.score).toBe(96);
    expect(lead.score.bucket).toBe('HOT');
    expect(lead.score.rationale).toEqual([
      'Sponsor licence: Skilled Worker (+12)',
      'Foreign beneficial owner (+25)',
      'Corporate beneficial owner (+10)',
      'Officers resident abroad: 1 (+15)',
      'Officers with overseas address: 1 (+8)',
      'Non-UK officer nationality: 1 (+10)',
      'Incorporated 47 days ago (+6)',
    ]);
    expect(lead.enrichment.status).toBe(EnrichStatus.NO_CANDIDATE);
    expect(second.stats.sponsor_new).toBe(1);
    expect(second.stats.sponsor_matched).toBe(1);
    expect(store.getSponsorMapping('NAME::ZETA SOFTWARE::MANCHESTER')).toEqual({ company_number: '12345678', match_score: 100 });

    const third = await runWith(registry, [ACME, BETA, TAXIS, ZETA]).execute(DAY3);
    expect(third.leads).toEqual([]);
    expect(third.stats.sponsor_new).toBe(0);
  });

  it('keeps an unmatched sponsor as a lead on its route weight', async () => {
    store.baselineSponsorRows([], DAY1);
    const report = await runWith(zetaRegistry(), [NIMBUS]).execute(DAY2);

    expect(report.leads).toHaveLength(1);
    const [lead] = report.leads;
    expect(lead.entity.identifier).toBe('NAME::NIMBUS CARE SERVICES::HULL');
    expect(lead.entity.display_name).toBe('Nimbus Care Services');
    expect(lead.score).toEqual({ score: 12, bucket: 'WATCH', rationale: ['Sponsor licence: Skilled Worker (+12)'] });
  });

  it('retries a sponsor row next run when the registry was unreachable', async () => {
    store.baselineSponsorRows([], DAY1);
    const registry = zetaRegistry();
    registry.failSearch = true;

    const failed = await runWith(registry, [ZETA]).execute(DAY2);
    expect(failed.leads).toEqual([]);
    expect(failed.stats.items_failed).toBe(1);
    expect(store.isSeen(sponsorSeenKey(ZETA))).toBe(false);

    registry.failSearch = false;
    const retried = await runWith(registry, [ZETA]).execute(DAY3);
    expect(retried.leads.map((l) => l.entity.identifier)).toEqual(['12345678']);
  });

  it('keeps overseas-linked incorporations and marks the rest seen', async () => {
    const registry = new FakeRegistry();
    registry.add({
      profile: makeEntity({ identifier: '23456789', display_name: 'ORBIT LABS UK LTD', registration_date: '2026-10-10' }),
      officers: [{ name: 'LEE, Min', address_country: 'Singapore', residence_country: 'Singapore', nationality: 'Singaporean' }],
    });
    registry.add({ profile: makeEntity({ identifier: '34567890', display_name: 'LOCAL BAKERY LTD' }) });
    registry.failing.add('45678901');
    registry.incorporations = ['23456789', '34567890', '45678901'].map((company_number) => ({
      company_number,
      company_name: `COMPANY ${company_number}`,
      date_of_creation: '2026-10-10',
      company_status: 'active',
      locality: 'Leeds',
      postcode: 'LS1 4AB',
    }));

    const report = await runWith(registry, []).execute(DAY2);

    expect(report.leads.map((l) => l.entity.identifier)).toEqual(['23456789']);
    expect(report.leads[0].provenance).toEqual(['COMPANIES_HOUSE']);
    expect(report.stats.overseas_candidates).toBe(1);
    expect(report.stats.items_failed).toBe(1);
    expect(store.isSeen(incorporationSeenKey('23456789'))).toBe(true);
    expect(store.isSeen(incorporationSeenKey('34567890'))).toBe(true);
    expect(store.isSeen(incorporationSeenKey('45678901'))).toBe(false);
    expect(store.getLead('23456789')?.lead_id).toBe(report.leads[0].lead_id);
  });

  it('merges a sponsor row and an incorporation of the same company', async () => {
    store.baselineSponsorRows([], DAY1);
    const registry = zetaRegistry();
    registry.incorporations = [{
      company_number: '12345678',
      company_name: 'ZETA SOFTWARE LIMITED',
      date_of_creation: '2026-09-01',
      company_status: 'active',
      locality: 'Manchester',
      postcode: 'M3 2BW',
    }];

    const report = await runWith(registry, [ZETA]).execute(DAY2);

    expect(report.leads).toHaveLength(1);
    expect(report.leads[0].provenance.join('+')).toBe('SPONSOR_REGISTER+COMPANIES_HOUSE');
    expect(report.leads[0].seen_keys).toEqual([sponsorSeenKey(ZETA), 'CH::12345678']);
  });

  it('never surfaces a suppressed company', async () => {
    store.baselineSponsorRows([], DAY1);
    store.suppress('12345678', 'existing customer', DAY1);

    const report = await runWith(zetaRegistry(), [ZETA]).execute(DAY2);

    expect(report.leads).toEqual([]);
    expect(report.stats.suppressed).toBe(1);
    expect(store.isSeen(sponsorSeenKey(ZETA))).toBe(true);
  });

  it('stops searching once the budget is spent', async () => {
    store.baselineSponsorRows([], DAY1);
    const search = new FakeSearch();
    const limited = loadConfig({ env: { SEARCH_SLEEP_MS: '0', SEARCH_MAX_CALLS_PER_RUN: '0' } });
    const report = await new LeadRun({
      config: limited,
      store,
      registry: zetaRegistry(),
      sponsors: new FakeSponsorRegister([ZETA]),
      search,
      fetcher: new FakeFetcher(),
    }).execute(DAY2);

    expect(report.leads[0].enrichment.status).toBe('Skipped (budget cap)');
    expect(search.queries).toEqual([]);
  });

  it('holds the search cap when enrichment runs in parallel', async () => {
    store.baselineSponsorRows([], DAY1);
    const search = new FakeSearch();
    const rows = ['Alder', 'Birch', 'Cedar', 'Damson', 'Elder', 'Fir', 'Gorse', 'Hazel', 'Ivy', 'Juniper']
      .map((tree) => row(`${tree} Care Services`, 'Hull'));
    const report = await new LeadRun({
      config: loadConfig({ env: { SEARCH_SLEEP_MS: '0', SEARCH_MAX_CALLS_PER_RUN: '3', ENRICH_CONCURRENCY: '8' } }),
      store,
      registry: new FakeRegistry(),
      sponsors: new FakeSponsorRegister(rows),
      search,
      fetcher: new FakeFetcher(),
    }).execute(DAY2);

    const statuses = report.leads.map((l) => l.enrichment.status);
    expect(report.leads).toHaveLength(10);
    expect(search.queries).toHaveLength(3);
    expect(report.stats.search_calls).toBe(3);
    expect(statuses.filter((s) => s === EnrichStatus.NO_CANDIDATE)).toHaveLength(3);
    expect(statuses.filter((s) => s === EnrichStatus.SKIPPED_BUDGET)).toHaveLength(7);
  });

  it('backfills from recent history when the fresh yield is short', async () => {
    store.baselineSponsorRows([], DAY1);
    await runWith(zetaRegistry(), [ZETA]).execute(DAY1);

    const report = await runWith(zetaRegistry(), [ZETA]).execute(new Date('2026-10-26T06:00:00Z'));

    expect(report.leads).toHaveLength(1);
    expect(report.leads[0].backfilled).toBe(true);
    expect(report.leads[0].score.rationale[0]).toBe('Backfill: first seen 2026-10-17');
    expect(report.stats.backfilled).toBe(1);
  });
});
