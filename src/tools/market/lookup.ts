import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { errorResult, type ErrorResult } from '../types.js';
import { fetchCompanySnapshot, type CompanySnapshot } from './yahoo-client.js';

export type SnapshotLookup = { ok: true; snapshot: CompanySnapshot } | { ok: false; error: ErrorResult };

/** Keys of CompanySnapshot whose values are numbers. */
export type NumericSnapshotKey = {
  [K in keyof CompanySnapshot]-?: CompanySnapshot[K] extends number | undefined ? K : never;
}[keyof CompanySnapshot];

/**
 * Fetch a snapshot and classify failures into tool error results:
 * an unknown symbol is `not_found`, anything else `provider_error`.
 */
export async function lookupSnapshot(ticker: string, action: string): Promise<SnapshotLookup> {
  try {
    const snapshot = await fetchCompanySnapshot(ticker);
    if (!snapshot) {
      return { ok: false, error: errorResult('not_found', `No data found for ${ticker}. The ticker symbol may be invalid.`, ticker) };
    }
    return { ok: true, snapshot };
  } catch (error) {
    logger.warn(`[Tools] ${action} failed for ${ticker}`, { error: errorMessage(error) });
    return { ok: false, error: errorResult('provider_error', `Error fetching ${action} for ${ticker}: ${errorMessage(error)}`, ticker) };
  }
}
