import { describe, it, expect, vi, afterEach } from 'vitest';
import { fetchSicCodes, joinIndustry, parseSicTable } from '../src/core/sic-client.js';
import { SchemaMismatchError, SourceUnavailableError } from '../src/core/errors.js';
import type { Submission } from '../src/core/types.js';

const SIC_PAGE = `
<html><body>
<table class="sic">
  <tr><th>SIC Code</th><th>Office</th><th>Industry Title</th></tr>
  <tr><td>100</td><td>Office of Life Sciences</td><td>AGRICULTURAL PRODUCTION-CROPS</td></tr>
  <tr><td>2834</td><td> Office of Life Sciences </td><td>PHARMACEUTICAL PREPARATIONS</td></tr>
  <tr><td>3571</td><td>Office of Technology</td><td>ELECTRONIC COMPUTERS</td></tr>
</table>
</body></html>`;

function submission(name: string, sic: number | null): Submission {
  return {
    adsh: `adsh-${name}`,
    name,
    sic,
    countryba: 'US',
    form: '10-Q',
    fye: '1231',
    period: '20190630',
    fy: 2019,
    fp: 'Q2',
    detail: '0',
    instance: 'test.xml',
  };
}

describe('parseSicTable', () => {
  it('reads code, office and industry title', () => {
    const codes = parseSicTable(SIC_PAGE);
    expect(codes).toEqual([
      { sicCode: 100, office: 'Life Sciences', industryTitle: 'AGRICULTURAL PRODUCTION-CROPS' },
      { sicCode: 2834, office: 'Life Sciences', industryTitle: 'PHARMACEUTICAL PREPARATIONS' },
      { sicCode: 3571, office: 'Technology', industryTitle: 'ELECTRONIC COMPUTERS' },
    ]);
  });

  it('throws SchemaMismatchError on a non-integer SIC code', () => {
    const html = SIC_PAGE.replace('<td>2834</td>', '<td>--</td>');
    expect(() => parseSicTable(html)).toThrow(SchemaMismatchError);
    expect(() => parseSicTable(html)).toThrow('SIC code table has a non-integer SIC Code: "--"');
  });

  it('throws SchemaMismatchError when the table is missing', () => {
    expect(() => parseSicTable('<html><body><p>maintenance</p></body></html>')).toThrow(SchemaMismatchError);
  });

  it('names the missing header columns', () => {
    const html = '<table class="sic"><tr><th>SIC Code</th><th>Title</th></tr></table>';
    expect(() => parseSicTable(html, 'test-page')).toThrow('SIC code table is missing columns: Office, Industry Title');
  });
});

describe('fetchSicCodes', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches and parses the page', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(SIC_PAGE, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const codes = await fetchSicCodes('https://example.test/sic');
    expect(codes).toHaveLength(3);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://example.test/sic');
  });

  it('throws SourceUnavailableError on 403', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('denied', { status: 403 })));
    const err = await fetchSicCodes('https://example.test/sic').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceUnavailableError);
    if (err instanceof SourceUnavailableError) expect(err.statusCode).toBe(403);
  });

  it('throws SourceUnavailableError on other HTTP errors', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('oops', { status: 503 })));
    await expect(fetchSicCodes('https://example.test/sic')).rejects.toThrow(SourceUnavailableError);
  });

  it('throws SourceUnavailableError on network failure', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));
    await expect(fetchSicCodes('https://example.test/sic')).rejects.toThrow('Network error fetching https://example.test/sic: fetch failed');
  });
});

describe('joinIndustry', () => {
  it('describes each company by its submission SIC', () => {
    const industries = joinIndustry(
      ['ALPHA CORP', 'BETA INC', 'GAMMA LLC'],
      [submission('ALPHA CORP', 2834), submission('BETA INC', 9999), submission('GAMMA LLC', null)],
      parseSicTable(SIC_PAGE)
    );
    expect(industries.get('ALPHA CORP')).toEqual({
      company: 'ALPHA CORP', sic: 2834, industryTitle: 'PHARMACEUTICAL PREPARATIONS', office: 'Life Sciences',
    });
    expect(industries.get('BETA INC')).toEqual({ company: 'BETA INC', sic: 9999, industryTitle: null, office: null });
    expect(industries.get('GAMMA LLC')?.sic).toBeNull();
  });
});
