/**
 * Pipeline Error Classes
 *
 * ProviderError is converted into an error outcome for the single record.
 * UnknownProviderError stops one provider's run only.
 * MalformedExtractionError lands in the parser's failure list.
 */

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }
}

export class UnknownProviderError extends Error {
  constructor(
    public readonly provider: string,
    public readonly clientType: string
  ) {
    super(`Unknown client type "${clientType}" for provider "${provider}"`);
    this.name = 'UnknownProviderError';
  }
}

export class MalformedExtractionError extends Error {
  constructor(
    message: string,
    public readonly file?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MalformedExtractionError';
  }
}

/**
 * Readable message for anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP status carried by SDK errors (openai, anthropic and genai all expose `status`)
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/**
 * Wrap an SDK failure as a ProviderError, leaving existing ProviderErrors alone
 */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const status = statusOf(error);
  const prefix = status === 429 ? 'Rate limited' : status === 401 || status === 403 ? 'Authentication failed' : 'Request failed';

  return new ProviderError(
    `${prefix}${status !== undefined ? ` (${status})` : ''}: ${describeError(error)}`,
    provider,
    status,
    { cause: error }
  );
}
