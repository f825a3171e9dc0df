import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config';
import { TextNormalizer } from '../../src/core/normalizer/text_normalizer';
import { daysBetween, parseRegistryDate, SignalExtractor } from '../../src/core/signals/signal_extractor';
import type { RegistryFacts } from '../../src/types';
import { emptySignals, makeEntity } from '../helpers/fakes';

const config = loadConfig({ env: {} });
const extractor = new SignalExtractor(config.signals, new TextNormalizer(config.normalizer));
const NOW = new Date('2026-10-18T12:00:00Z');

const british = { name: 'JONES, Sam', address_country: 'United Kingdom', residence_country: 'England', nationality: 'British' };

describe('SignalExtractor', () => {
  it('fires only the beneficial-owner signal for a domestic company with a German owner', () => {
    const facts: RegistryFacts = {
      profile: makeEntity(),
      officers: [british],
      owners: [{ name: 'Acme Robotik GmbH', kind: 'individual-person-with-significant-control', country: 'Germany' }],
    };

    expect(extractor.extract(facts, 'Acme Robotics Ltd', NOW)).toEqual(emptySignals({ foreign_beneficial_owner: true }));
  });

  it('counts foreign officers and finds the priority country', () => {
    const facts: RegistryFacts = {
      profile: makeEntity(),
      officers: [
        british,
        { name: 'DOE, Alex', address_country: 'USA', residence_country: 'United States', nationality: 'American' },
      ],
      owners: [],
    };
    const signals = extractor.extract(facts, 'Acme Robotics Ltd', NOW);

    expect(signals.foreign_officer_address).toBe(1);
    expect(signals.foreign_officer_residence).toBe(1);
    expect(signals.foreign_officer_nationality).toBe(1);
    expect(signals.priority_country_link).toBe('UNITED STATES');
  });

  it('detects corporate owners and overseas registered offices', () => {
    const facts: RegistryFacts = {
      profile: makeEntity({ address: { street: 'Hauptstrasse 1', locality: 'Berlin', postcode: '10115', country: 'Germany' } }),
      officers: [],
      owners: [{ name: 'Parent Ltd', kind: 'corporate-entity-person-with-significant-control', country: 'United Kingdom' }],
    };
    const signals = extractor.extract(facts, 'Acme Robotics Ltd', NOW);

    expect(signals.corporate_beneficial_owner).toBe(true);
    expect(signals.foreign_beneficial_owner).toBe(false);
    expect(signals.foreign_registered_office).toBe(true);
    expect(signals.priority_country_link).toBe('GERMANY');
  });

  it('treats missing countries and nationalities as domestic', () => {
    const facts: RegistryFacts = {
      profile: null,
      officers: [{ name: 'X', address_country: '', residence_country: '', nationality: '' }],
      owners: [{ name: 'Y', kind: '', country: '' }],
    };
    expect(extractor.extract(facts, 'Acme Robotics Ltd', NOW)).toEqual(emptySignals());
  });

  it('is deterministic for the same input', () => {
    const facts: RegistryFacts = { profile: makeEntity({ registration_date: '2026-10-01' }), officers: [british], owners: [] };
    expect(extractor.extract(facts, 'Acme Robotics Ltd', NOW)).toEqual(extractor.extract(facts, 'Acme Robotics Ltd', NOW));
  });

  it('recognizes subsidiary-style names', () => {
    expect(extractor.looksLikeSubsidiary('Acme Europe Ltd')).toBe(true);
    expect(extractor.looksLikeSubsidiary('Acme Robotics Ltd')).toBe(false);
  });

  it('assigns recency tiers by days since incorporation', () => {
    expect(extractor.recency('2026-09-18', NOW)).toEqual({ days: 30, points: 10 });
    expect(extractor.recency('2026-07-20', NOW)).toEqual({ days: 90, points: 6 });
    expect(extractor.recency('2025-01-01', NOW)).toBeNull();
    expect(extractor.recency('2026-11-01', NOW)).toBeNull();
    expect(extractor.recency(null, NOW)).toBeNull();
  });

  it('matches mailbox phrases on word boundaries, longest first', () => {
    expect(extractor.mailboxHits('Suite 4, Regus House, Virtual Office Park')).toEqual(['REGUS', 'VIRTUAL OFFICE', 'SUITE']);
    expect(extractor.mailboxHits('Unit 2 Suites Road, Officeshire')).toEqual([]);
    expect(extractor.mailboxHits('P.O. Box 12')).toEqual(['P.O. BOX']);
  });

  it('lets the first classification code decide the sector', () => {
    expect(extractor.sector(['99999', '56101', '62012'])).toEqual({ kind: 'PENALTY', match: '56' });
    expect(extractor.sector(['62012'])).toEqual({ kind: 'BOOST', match: '62' });
    expect(extractor.sector(['Software development'])).toEqual({ kind: 'BOOST', match: 'SOFTWARE' });
    expect(extractor.sector([])).toBeNull();
  });

  it('parses registry dates as UTC days', () => {
    const date = parseRegistryDate('2026-10-01T23:59:00');
    expect(date?.toISOString()).toBe('2026-10-01T00:00:00.000Z');
    expect(parseRegistryDate('not a date')).toBeNull();
    expect(daysBetween(new Date('2026-10-01T23:00:00Z'), new Date('2026-10-02T01:00:00Z'))).toBe(1);
  });
});
