/**
 * Error types shared by the data client, the model factory and the session layer.
 */

/** A provider read failed for a reason other than "no data for this symbol". */
export class MarketDataError extends Error {
  readonly ticker: string;

  constructor(ticker: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MarketDataError';
    this.ticker = ticker;
  }
}

/** No API key for the selected chat model provider. */
export class MissingCredentialError extends Error {
  readonly envVar: string;

  constructor(envVar: string, providerName: string) {
    super(`${providerName} API key required: set ${envVar} or supply a key for the session.`);
    this.name = 'MissingCredentialError';
    this.envVar = envVar;
  }
}

export class SessionNotFoundError extends Error {
  constructor(sessionId: string) {
    super(`Session '${sessionId}' not found`);
    this.name = 'SessionNotFoundError';
  }
}

/** A turn was submitted while the previous one is still running. */
export class SessionBusyError extends Error {
  constructor(sessionId: string) {
    super(`Session '${sessionId}' is still processing the previous message`);
    this.name = 'SessionBusyError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
