import { beforeAll, describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config';
import { SiteVerifier } from '../../src/core/enrichment/site_verifier';
import { Logger } from '../../src/utils/logger';
import { FakeFetcher, makeEntity, page } from '../helpers/fakes';

const settings = loadConfig({ env: {} }).enrichment;
const entity = makeEntity();
const HOME = 'https://www.acmerobotics.co.uk/';
const candidate = { url: HOME, host: 'acmerobotics.co.uk', score: 44, title: 'Acme Robotics' };

describe('SiteVerifier', () => {
  beforeAll(() => Logger.silence());

  it('scores the registration number alone at six', () => {
    const verifier = new SiteVerifier(settings, new FakeFetcher());
    expect(verifier.scorePage(entity, 'Registered in England No. 01234567')).toEqual({
      score: 6,
      evidence: ['Company number 01234567 on page'],
    });
  });

  it('reaches the maximum with number and postcode together', () => {
    const verifier = new SiteVerifier(settings, new FakeFetcher());
    const text = 'Registered in England No. 01234567. Registered office: 1 High Street, Leeds LS1 4AB';
    expect(verifier.scorePage(entity, text)).toEqual({
      score: 10,
      evidence: ['Company number 01234567 on page', 'Postcode LS1 4AB on page'],
    });
  });

  it('does not match the number inside a longer digit run', () => {
    const verifier = new SiteVerifier(settings, new FakeFetcher());
    expect(verifier.scorePage(entity, 'Order ref 101234567')).toEqual({ score: 0, evidence: [] });
  });

  it('picks same-site legal and contact links only', () => {
    const verifier = new SiteVerifier(settings, new FakeFetcher());
    const home = page(HOME, 'Acme', [
      { url: 'https://www.acmerobotics.co.uk/contact#form', text: 'Contact' },
      { url: 'https://other.example.org/contact', text: 'Contact' },
      { url: 'https://www.acmerobotics.co.uk/brochure.pdf', text: 'About us' },
      { url: 'https://www.acmerobotics.co.uk/products', text: 'Products' },
      { url: 'https://www.acmerobotics.co.uk/team', text: 'About the team' },
      { url: 'https://www.acmerobotics.co.uk/', text: 'Home' },
    ]);

    expect(verifier.pickFollowLinks(home, HOME)).toEqual([
      'https://www.acmerobotics.co.uk/contact',
      'https://www.acmerobotics.co.uk/team',
    ]);
  });

  it('follows links from a promising homepage and keeps the best page score', async () => {
    const fetcher = new FakeFetcher()
      .add(page(HOME, 'Acme Robotics cobots. Company No 01234567', [
        { url: 'https://www.acmerobotics.co.uk/contact', text: 'Contact' },
      ]))
      .add(page('https://www.acmerobotics.co.uk/contact', 'Acme Robotics, 1 High Street, Leeds LS1 4AB'));
    const result = await new SiteVerifier(settings, fetcher).verify(entity, [candidate]);

    expect(result?.score).toBe(9);
    expect(result?.evidence).toEqual([
      'Company number 01234567 on page',
      'Name match 100',
      'Postcode LS1 4AB on page',
    ]);
    expect(result?.pages).toHaveLength(2);
    expect(fetcher.fetched).toEqual([HOME, 'https://www.acmerobotics.co.uk/contact']);
  });

  it('does not follow links from a weak homepage', async () => {
    const fetcher = new FakeFetcher().add(page(HOME, 'Welcome to our blog', [
      { url: 'https://www.acmerobotics.co.uk/contact', text: 'Contact' },
    ]));
    const result = await new SiteVerifier(settings, fetcher).verify(entity, [candidate]);

    expect(result?.score).toBe(0);
    expect(fetcher.fetched).toEqual([HOME]);
  });

  it('skips candidates that cannot be fetched', async () => {
    const fetcher = new FakeFetcher();
    expect(await new SiteVerifier(settings, fetcher).verify(entity, [candidate])).toBeNull();
  });

  it('stops at the first verified candidate', async () => {
    const second = { url: 'https://acme-robotics.com/', host: 'acme-robotics.com', score: 10, title: 'Acme' };
    const fetcher = new FakeFetcher()
      .add(page(HOME, 'Company number 01234567, Leeds LS1 4AB'))
      .add(page(second.url, 'Acme Robotics'));
    const result = await new SiteVerifier(settings, fetcher).verify(entity, [candidate, second]);

    expect(result?.candidate.url).toBe(HOME);
    expect(fetcher.fetched).toEqual([HOME]);
  });
});
