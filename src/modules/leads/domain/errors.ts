export type ErrorKind =
  | 'NotFound'
  | 'ConstraintViolation'
  | 'AmbiguousMerge'
  | 'UnresolvableRow'
  | 'ProviderUnavailable'
  | 'FetchFailed';

export class ScoutError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class LeadNotFoundError extends ScoutError {
  constructor(readonly leadId: string) {
    super('NotFound', `Lead not found: ${leadId}`);
  }
}

export class ConstraintViolationError extends ScoutError {
  constructor(
    readonly domain: string,
    readonly ownerLeadId: string,
  ) {
    super('ConstraintViolation', `Domain ${domain} is already owned by lead ${ownerLeadId}`);
  }
}

export class AmbiguousMergeError extends ScoutError {
  constructor(readonly leadIds: [string, string]) {
    super(
      'AmbiguousMerge',
      `Refusing to merge canonical leads ${leadIds[0]} and ${leadIds[1]}; resolve them manually`,
    );
  }
}

export class UnresolvableRowError extends ScoutError {
  constructor(
    readonly row: number,
    reason: string,
  ) {
    super('UnresolvableRow', `Row ${row}: ${reason}`);
  }
}

export class ProviderUnavailableError extends ScoutError {
  constructor(
    readonly provider: string,
    reason: string,
  ) {
    super('ProviderUnavailable', `Provider ${provider} unavailable: ${reason}`);
  }
}

export class FetchFailedError extends ScoutError {
  constructor(
    readonly url: string,
    reason: string,
  ) {
    super('FetchFailed', `Fetch failed for ${url}: ${reason}`);
  }
}

export function isScoutError(error: unknown): error is ScoutError {
  return error instanceof ScoutError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
