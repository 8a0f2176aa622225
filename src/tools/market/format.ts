// Number formatting for the text summaries handed to the model.

export function formatFixed(value: number, digits = 2): string {
  return value.toFixed(digits);
}

export function formatUsd(value: number): string {
  return `$${value.toFixed(2)}`;
}

/** `+1.25` / `-0.40`; zero is signed positive. */
export function formatSigned(value: number, digits = 2): string {
  const fixed = Math.abs(value).toFixed(digits);
  return value < 0 ? `-${fixed}` : `+${fixed}`;
}

export function formatSignedUsd(value: number): string {
  const sign = value < 0 ? '-' : '+';
  return `${sign}$${Math.abs(value).toFixed(2)}`;
}

export function formatBillions(value: number, digits = 2): string {
  return `$${(value / 1e9).toFixed(digits)}B`;
}

/** Ratio (0.2531) as a percentage string (25.31%). */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

export function formatInteger(value: number): string {
  return Math.round(value).toLocaleString('en-US');
}

export function orNA<T>(value: T | null | undefined, format: (v: T) => string): string {
  return value === null || value === undefined ? 'N/A' : format(value);
}
