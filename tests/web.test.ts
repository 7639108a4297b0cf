import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildServer } from '../src/web/app.js';
import { errorToHttpStatus } from '../src/web/serialization.js';
import { writeDataset } from './dataset-fixture.js';

const dataDir = writeDataset(
  [{ adsh: '0001', name: 'ALPHA CORP' }, { adsh: '0002', name: 'BETA INC' }],
  [
    { adsh: '0001', tag: 'Assets', value: '200' },
    { adsh: '0001', tag: 'Liabilities', value: '50' },
    { adsh: '0001', tag: 'NetIncomeLoss', value: '30', qtrs: '1' },
    { adsh: '0002', tag: 'Assets', value: '80' },
    { adsh: '0002', tag: 'LiabilitiesAndStockholdersEquity', value: '80' },
  ]
);

describe('errorToHttpStatus', () => {
  it('maps engine error types to status codes', () => {
    expect(errorToHttpStatus('invalid_params')).toBe(400);
    expect(errorToHttpStatus('no_data')).toBe(404);
    expect(errorToHttpStatus('schema_mismatch')).toBe(422);
    expect(errorToHttpStatus('structural_violation')).toBe(500);
    expect(errorToHttpStatus('source_unavailable')).toBe(502);
  });
});

describe('web API', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('GET /api/concepts lists concepts', async () => {
    const server = buildServer({ dataDir });
    const res = await server.inject({ method: 'GET', url: '/api/concepts' });
    expect(res.statusCode).toBe(200);
    const body: unknown = res.json();
    expect(body).toMatchObject({ concepts: expect.arrayContaining([expect.objectContaining({ id: 'revenue', column: 'Revenue_' })]) });
  });

  it('GET /api/ratio-definitions lists formulas', async () => {
    const server = buildServer({ dataDir });
    const res = await server.inject({ method: 'GET', url: '/api/ratio-definitions' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ratios: expect.arrayContaining([{
      id: 'ROE_',
      display_name: 'Return on Equity',
      description: 'Net income relative to shareholders equity',
      formula: 'NetIncome_ / Equity_',
      format: 'percentage',
    }]) });
  });

  it('GET /api/ratios computes the cohort', async () => {
    const server = buildServer({ dataDir });
    const res = await server.inject({ method: 'GET', url: '/api/ratios?year=2019&quarter=q2' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      period: { fiscal_year: 2019, fiscal_period: 'Q2' },
      companies: [
        { name: 'ALPHA CORP', canonical: { Assets_: 200, Liabilities_: 50, Equity_: 150 }, ratios: { ROA_: 0.15, ROE_: 0.2 } },
        { name: 'BETA INC', canonical: { Assets_: 80, Liabilities_: 0, Equity_: 80 } },
      ],
      dropped: [],
    });
  });

  it('GET /api/ratios includes log features when asked', async () => {
    const server = buildServer({ dataDir });
    const res = await server.inject({ method: 'GET', url: '/api/ratios?log=true' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ log_features: [{ name: 'ALPHA CORP' }, { name: 'BETA INC' }] });
  });

  it('GET /api/ratios rejects a bad quarter', async () => {
    const server = buildServer({ dataDir });
    const res = await server.inject({ method: 'GET', url: '/api/ratios?quarter=Q9' });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { type: 'invalid_params', message: 'quarter: quarter must be Q1-Q4' } });
  });

  it('GET /api/ratios returns 404 for an empty cohort', async () => {
    const server = buildServer({ dataDir });
    const res = await server.inject({ method: 'GET', url: '/api/ratios?year=2001' });
    expect(res.statusCode).toBe(404);
  });

  it('GET /api/ratios returns 502 when the dataset is missing', async () => {
    const server = buildServer({ dataDir: '/nonexistent/edgar' });
    const res = await server.inject({ method: 'GET', url: '/api/ratios' });
    expect(res.statusCode).toBe(502);
  });

  it('GET /api/sic-codes returns the parsed table', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(
      '<table class="sic"><tr><th>SIC Code</th><th>Office</th><th>Industry Title</th></tr>' +
      '<tr><td>3571</td><td>Office of Technology</td><td>ELECTRONIC COMPUTERS</td></tr></table>',
      { status: 200 }
    )));
    const server = buildServer({ dataDir, sicCodesUrl: 'https://example.test/sic' });
    const res = await server.inject({ method: 'GET', url: '/api/sic-codes' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      count: 1,
      codes: [{ sic_code: 3571, office: 'Technology', industry_title: 'ELECTRONIC COMPUTERS' }],
    });
  });

  it('GET /api/sic-codes returns 502 when SEC rejects the request', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('denied', { status: 403 })));
    const server = buildServer({ dataDir, sicCodesUrl: 'https://example.test/sic' });
    const res = await server.inject({ method: 'GET', url: '/api/sic-codes' });
    expect(res.statusCode).toBe(502);
    expect(res.json()).toMatchObject({ error: { type: 'source_unavailable' } });
  });
});
