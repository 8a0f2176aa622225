import { tool } from '@langchain/core/tools';
import { z } from 'zod';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { errorResult, serializeToolResult, type NewsArticle, type ToolResult } from '../types.js';
import { formatInteger, orNA } from './format.js';
import { lookupSnapshot } from './lookup.js';
import { normalizeTicker } from './periods.js';
import { fetchNews, type NewsItem } from './yahoo-client.js';

const NEWS_COUNT = 5;

export async function lookupCompanyInfo(rawTicker: string): Promise<ToolResult> {
  const ticker = normalizeTicker(rawTicker);
  const lookup = await lookupSnapshot(ticker, 'company info');
  if (!lookup.ok) return lookup.error;

  const snap = lookup.snapshot;
  const attributes: Record<string, string> = {
    name: snap.longName ?? ticker,
    sector: snap.sector ?? 'N/A',
    industry: snap.industry ?? 'N/A',
    country: snap.country ?? 'N/A',
    employees: orNA(snap.fullTimeEmployees, formatInteger),
    website: snap.website ?? 'N/A',
  };
  const description = snap.longBusinessSummary ?? 'No description available';

  const text = [
    `Company Overview for ${ticker}:`,
    '',
    `Name: ${attributes.name}`,
    `Sector: ${attributes.sector}`,
    `Industry: ${attributes.industry}`,
    `Country: ${attributes.country}`,
    `Employees: ${attributes.employees}`,
    '',
    'Business Summary:',
    description,
    '',
    `Website: ${attributes.website}`,
  ].join('\n');

  return { kind: 'text', ticker, title: `Company overview for ${ticker}`, text, attributes };
}

export async function lookupCompanyNews(rawTicker: string): Promise<ToolResult> {
  const ticker = normalizeTicker(rawTicker);
  let items: NewsItem[];
  try {
    items = await fetchNews(ticker, NEWS_COUNT);
  } catch (error) {
    logger.warn(`[Tools] news failed for ${ticker}`, { error: errorMessage(error) });
    return errorResult('provider_error', `Error fetching news for ${ticker}: ${errorMessage(error)}`, ticker);
  }

  if (items.length === 0) {
    return errorResult('not_found', `No recent news found for ${ticker}`, ticker);
  }

  const articles: NewsArticle[] = items.map((item) => ({
    title: item.title,
    publisher: item.publisher ?? 'Unknown',
    published: item.publishedAt ? item.publishedAt.toISOString().slice(0, 10) : 'Unknown date',
    ...(item.link ? { link: item.link } : {}),
  }));

  const lines = [`Recent News for ${ticker}:`, ''];
  articles.forEach((article, i) => {
    lines.push(`${i + 1}. [${article.published}] ${article.title}`, `   Source: ${article.publisher}`, '');
  });

  return {
    kind: 'text',
    ticker,
    title: `Recent news for ${ticker}`,
    text: lines.join('\n').trimEnd(),
    attributes: { count: String(articles.length) },
    articles,
  };
}

// ============================================================================
// Tool Definitions
// ============================================================================

const TickerInputSchema = z.object({
  ticker: z.string().min(1).describe('Stock ticker symbol (e.g., TSLA)'),
});

export const getCompanyInfo = tool(
  async ({ ticker }) => serializeToolResult(await lookupCompanyInfo(ticker)),
  {
    name: 'get_company_info',
    description: 'Get company description, sector, industry, country, employee count and business overview. Input is a stock ticker.',
    schema: TickerInputSchema,
  }
);

export const getCompanyNews = tool(
  async ({ ticker }) => serializeToolResult(await lookupCompanyNews(ticker)),
  {
    name: 'get_company_news',
    description: 'Get the 5 most recent news articles about a company, with dates and sources. Input is a stock ticker.',
    schema: TickerInputSchema,
  }
);
