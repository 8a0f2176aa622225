import { beforeEach, describe, expect, test, vi } from 'vitest';
import { fetchCompanySnapshot, fetchNews } from '../src/tools/market/yahoo-client.js';
import { lookupCompanyInfo, lookupCompanyNews } from '../src/tools/market/company-info.js';

vi.mock('../src/tools/market/yahoo-client.js', () => ({
  fetchCompanySnapshot: vi.fn(),
  fetchNews: vi.fn(),
  fetchHistory: vi.fn(),
}));

const snapshotMock = vi.mocked(fetchCompanySnapshot);
const newsMock = vi.mocked(fetchNews);

beforeEach(() => {
  snapshotMock.mockReset();
  newsMock.mockReset();
});

describe('lookupCompanyInfo', () => {
  test('renders the company overview', async () => {
    snapshotMock.mockResolvedValue({
      ticker: 'MSFT',
      longName: 'Microsoft Corporation',
      regularMarketPrice: 400,
      sector: 'Technology',
      industry: 'Software - Infrastructure',
      country: 'United States',
      fullTimeEmployees: 221000,
      longBusinessSummary: 'Microsoft develops and supports software and cloud services.',
      website: 'https://www.microsoft.com',
    });

    const result = await lookupCompanyInfo('msft');

    expect(result).toEqual({
      kind: 'text',
      ticker: 'MSFT',
      title: 'Company overview for MSFT',
      text: [
        'Company Overview for MSFT:',
        '',
        'Name: Microsoft Corporation',
        'Sector: Technology',
        'Industry: Software - Infrastructure',
        'Country: United States',
        'Employees: 221,000',
        '',
        'Business Summary:',
        'Microsoft develops and supports software and cloud services.',
        '',
        'Website: https://www.microsoft.com',
      ].join('\n'),
      attributes: {
        name: 'Microsoft Corporation',
        sector: 'Technology',
        industry: 'Software - Infrastructure',
        country: 'United States',
        employees: '221,000',
        website: 'https://www.microsoft.com',
      },
    });
  });

  test('missing profile fields read N/A', async () => {
    snapshotMock.mockResolvedValue({ ticker: 'XYZ', regularMarketPrice: 5 });

    const result = await lookupCompanyInfo('XYZ');

    expect(result.kind).toBe('text');
    if (result.kind !== 'text') return;
    expect(result.attributes).toEqual({
      name: 'XYZ',
      sector: 'N/A',
      industry: 'N/A',
      country: 'N/A',
      employees: 'N/A',
      website: 'N/A',
    });
    expect(result.text.split('\n')).toContain('No description available');
  });

  test('an unknown ticker yields not_found', async () => {
    snapshotMock.mockResolvedValue(null);

    expect(await lookupCompanyInfo('ZZZZ1')).toEqual({
      kind: 'error',
      code: 'not_found',
      message: 'No data found for ZZZZ1. The ticker symbol may be invalid.',
      ticker: 'ZZZZ1',
    });
  });
});

describe('lookupCompanyNews', () => {
  test('lists articles with dates and sources', async () => {
    newsMock.mockResolvedValue([
      {
        title: 'Tesla ships record deliveries',
        publisher: 'Reuters',
        link: 'https://example.com/deliveries',
        publishedAt: new Date('2026-10-15T13:00:00.000Z'),
      },
      { title: 'Cybertruck update' },
    ]);

    const result = await lookupCompanyNews('tsla');

    expect(newsMock).toHaveBeenCalledWith('TSLA', 5);
    expect(result).toEqual({
      kind: 'text',
      ticker: 'TSLA',
      title: 'Recent news for TSLA',
      text: [
        'Recent News for TSLA:',
        '',
        '1. [2026-10-15] Tesla ships record deliveries',
        '   Source: Reuters',
        '',
        '2. [Unknown date] Cybertruck update',
        '   Source: Unknown',
      ].join('\n'),
      attributes: { count: '2' },
      articles: [
        {
          title: 'Tesla ships record deliveries',
          publisher: 'Reuters',
          published: '2026-10-15',
          link: 'https://example.com/deliveries',
        },
        { title: 'Cybertruck update', publisher: 'Unknown', published: 'Unknown date' },
      ],
    });
  });

  test('no articles yields not_found', async () => {
    newsMock.mockResolvedValue([]);

    expect(await lookupCompanyNews('ZZZZ1')).toEqual({
      kind: 'error',
      code: 'not_found',
      message: 'No recent news found for ZZZZ1',
      ticker: 'ZZZZ1',
    });
  });

  test('a provider failure yields provider_error', async () => {
    newsMock.mockRejectedValue(new Error('timeout'));

    expect(await lookupCompanyNews('TSLA')).toEqual({
      kind: 'error',
      code: 'provider_error',
      message: 'Error fetching news for TSLA: timeout',
      ticker: 'TSLA',
    });
  });
});
