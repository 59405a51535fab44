export type NbaErrorKind =
  | 'INVALID_PARAMETER'
  | 'PLAYER_NOT_FOUND'
  | 'NOT_FOUND'
  | 'API_KEY_INVALID'
  | 'RATE_LIMITED'
  | 'UPSTREAM_ERROR'
  | 'CALENDAR_NOT_AUTHENTICATED'
  | 'CALENDAR_ERROR'
  | 'CONFIGURATION_ERROR';

/**
 * HTTP status for each error kind. This is the only place a kind is turned
 * into a transport status.
 */
export const STATUS_BY_KIND: Record<NbaErrorKind, number> = {
  INVALID_PARAMETER: 400,
  PLAYER_NOT_FOUND: 404,
  NOT_FOUND: 404,
  API_KEY_INVALID: 401,
  RATE_LIMITED: 429,
  UPSTREAM_ERROR: 500,
  CALENDAR_NOT_AUTHENTICATED: 401,
  CALENDAR_ERROR: 500,
  CONFIGURATION_ERROR: 500,
};

export class NbaApiError extends Error {
  constructor(
    public readonly kind: NbaErrorKind,
    message: string,
    public readonly endpoint?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NbaApiError';
  }

  get statusCode(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

export function isNbaApiError(error: unknown, kind?: NbaErrorKind): error is NbaApiError {
  return error instanceof NbaApiError && (kind === undefined || error.kind === kind);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
