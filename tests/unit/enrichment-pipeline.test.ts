import { afterEach, beforeAll, describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config';
import { EnrichmentPipeline } from '../../src/core/enrichment/enrichment_pipeline';
import { StateStore } from '../../src/db/state_store';
import { EnrichStatus } from '../../src/types';
import { Logger } from '../../src/utils/logger';
import { FakeFetcher, FakeSearch, makeEntity, page } from '../helpers/fakes';

const NOW = new Date('2026-10-18T12:00:00Z');
const HOME = 'https://www.acmerobotics.co.uk/';
const CONTACT = 'https://www.acmerobotics.co.uk/contact';
const entity = makeEntity();

function configWith(env: Record<string, string> = {}) {
  return loadConfig({ env: { SEARCH_SLEEP_MS: '0', ...env } });
}

const officialResult = { title: 'Acme Robotics | Cobots', link: HOME, snippet: 'Acme Robotics builds cobots in Leeds' };

function verifiedSite(): FakeFetcher {
  return new FakeFetcher()
    .add(page(HOME, 'Acme Robotics cobots. Company No 01234567. Email info@acmerobotics.co.uk, j.smith@acmerobotics.co.uk', [
      { url: CONTACT, text: 'Contact us' },
    ]))
    .add(page(CONTACT, 'Acme Robotics, 1 High Street, Leeds LS1 4AB. Tel 0121 234 5678'));
}

describe('EnrichmentPipeline', () => {
  let store: StateStore | null = null;

  beforeAll(() => Logger.silence());
  afterEach(() => {
    store?.close();
    store = null;
  });

  it('skips without searching when the budget is at its cap', async () => {
    const search = new FakeSearch(() => [officialResult]);
    const pipeline = new EnrichmentPipeline(configWith({ SEARCH_MAX_CALLS_PER_RUN: '0' }), search, verifiedSite());
    const result = await pipeline.enrich(entity, NOW);

    expect(result.status).toBe(EnrichStatus.SKIPPED_BUDGET);
    expect(result.status).toBe('Skipped (budget cap)');
    expect(result.level).toBe('NONE');
    expect(result.stage).toBe('NOT_ATTEMPTED');
    expect(search.queries).toEqual([]);
    expect(pipeline.stats.skipped_budget).toBe(1);
  });

  it('never exceeds the search cap across concurrent enrichments', async () => {
    const search = new FakeSearch((q) => (q.startsWith('"Acme Robotics Ltd" official website') ? [officialResult] : []));
    const pipeline = new EnrichmentPipeline(
      configWith({ SEARCH_MAX_CALLS_PER_RUN: '6', HIRING_INTENT_ENABLED: 'true' }),
      search,
      verifiedSite()
    );

    const verified = await pipeline.enrich(entity, NOW);
    expect(verified.hiring_intent).toEqual({ score: 0, evidence: [] });
    expect(search.queries).toHaveLength(3);

    const others = ['11111111', '22222222', '33333333', '44444444', '55555555', '66666666']
      .map((identifier, i) => makeEntity({ identifier, display_name: `Harbour Trading ${i + 1} Ltd` }));
    const results = await Promise.all(others.map((e) => pipeline.enrich(e, NOW)));
    const statuses = results.map((r) => r.status);

    expect(search.queries).toHaveLength(6);
    expect(pipeline.budget.spent).toBe(6);
    expect(statuses.filter((s) => s === EnrichStatus.NO_CANDIDATE)).toHaveLength(3);
    expect(statuses.filter((s) => s === EnrichStatus.SKIPPED_BUDGET)).toHaveLength(3);
    expect(pipeline.stats.skipped_budget).toBe(3);
  });

  it('verifies a site and extracts role contacts only', async () => {
    const search = new FakeSearch(() => [officialResult]);
    const pipeline = new EnrichmentPipeline(configWith(), search, verifiedSite());
    const result = await pipeline.enrich(entity, NOW);

    expect(result).toEqual({
      website: HOME,
      level: 'VERIFIED',
      verification_score: 9,
      evidence: ['Company number 01234567 on page', 'Name match 100', 'Postcode LS1 4AB on page'],
      emails: ['info@acmerobotics.co.uk'],
      phones: ['+441212345678'],
      status: EnrichStatus.VERIFIED_WITH_CONTACTS,
      stage: 'CONTACTS_EXTRACTED',
      hiring_intent: null,
      from_cache: false,
      updated_at: NOW.toISOString(),
    });
    expect(search.queries).toEqual(['"Acme Robotics Ltd" official website Leeds LS1 4AB']);
    expect(pipeline.budget.spent).toBe(1);
  });

  it('runs the hiring-intent probe on verified sites when enabled', async () => {
    const search = new FakeSearch((q) => (q.includes('careers') ? [] : [officialResult]));
    const pipeline = new EnrichmentPipeline(configWith({ HIRING_INTENT_ENABLED: 'true' }), search, verifiedSite());
    const result = await pipeline.enrich(entity, NOW);

    expect(result.hiring_intent).toEqual({ score: 0, evidence: [] });
    expect(search.queries).toHaveLength(3);
  });

  it('marks a partially confirmed site for manual verification without contacts', async () => {
    const fetcher = new FakeFetcher().add(page(HOME, 'Acme Robotics, Leeds LS1 4AB. info@acmerobotics.co.uk'));
    const pipeline = new EnrichmentPipeline(configWith(), new FakeSearch(() => [officialResult]), fetcher);
    const result = await pipeline.enrich(entity, NOW);

    expect(result.status).toBe('Manual verify needed');
    expect(result.level).toBe('PLAUSIBLE');
    expect(result.website).toBe(HOME);
    expect(result.verification_score).toBe(6);
    expect(result.emails).toEqual([]);
  });

  it('reports low confidence when no candidate is confirmed', async () => {
    const fetcher = new FakeFetcher().add(page(HOME, 'Welcome to our blog'));
    const pipeline = new EnrichmentPipeline(configWith(), new FakeSearch(() => [officialResult]), fetcher);
    const result = await pipeline.enrich(entity, NOW);

    expect(result.status).toBe(EnrichStatus.LOW_CONFIDENCE);
    expect(result.level).toBe('NONE');
    expect(result.website).toBe('');
    expect(result.stage).toBe('UNVERIFIED');
  });

  it('reports no website when every result is denied', async () => {
    const search = new FakeSearch(() => [{ title: 'Acme Robotics', link: 'https://www.linkedin.com/company/acme', snippet: '' }]);
    const fetcher = new FakeFetcher();
    const result = await new EnrichmentPipeline(configWith(), search, fetcher).enrich(entity, NOW);

    expect(result.status).toBe('No website found');
    expect(fetcher.fetched).toEqual([]);
  });

  it('reports a failed search without caching it', async () => {
    store = new StateStore(':memory:');
    const search = new FakeSearch(() => {
      throw new Error('503 Service Unavailable');
    });
    const result = await new EnrichmentPipeline(configWith(), search, new FakeFetcher(), store).enrich(entity, NOW);

    expect(result.status).toBe(EnrichStatus.SEARCH_FAILED);
    expect(store.getFreshEnrichment(entity.identifier, NOW, 60)).toBeNull();
  });

  it('reuses a fresh cached result without spending budget', async () => {
    store = new StateStore(':memory:');
    const config = configWith();
    await new EnrichmentPipeline(config, new FakeSearch(() => [officialResult]), verifiedSite(), store).enrich(entity, NOW);

    const search = new FakeSearch(() => [officialResult]);
    const later = new Date('2026-11-01T12:00:00Z');
    const second = new EnrichmentPipeline(config, search, new FakeFetcher(), store);
    const result = await second.enrich(entity, later);

    expect(result.from_cache).toBe(true);
    expect(result.level).toBe('VERIFIED');
    expect(result.updated_at).toBe(NOW.toISOString());
    expect(search.queries).toEqual([]);
    expect(second.stats.cached).toBe(1);
  });
});
