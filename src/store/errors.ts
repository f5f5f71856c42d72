export class PlayerLookupError extends Error {
  constructor(
    message: string,
    public readonly context: { puuid?: string } = {}
  ) {
    super(message);
    this.name = 'PlayerLookupError';
  }
}

export class PlayerConflictError extends Error {
  constructor(
    message: string,
    public readonly puuid: string
  ) {
    super(message);
    this.name = 'PlayerConflictError';
  }
}

export class MatchLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MatchLookupError';
  }
}

/** A write the store refuses to apply because it would break a stored invariant. */
export class DataIntegrityError extends Error {
  constructor(
    message: string,
    public readonly code: 'invalid_match' | 'invalid_record',
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}
