/**
 * Typed error kinds for the outreach core
 *
 * Every failure that crosses a component boundary is an OutreachError with a
 * stable `kind`. `retryable` marks transient upstream failures: the component
 * that issued the call retries those (see services/retry.ts), everything else
 * surfaces immediately.
 */

export type ErrorKind =
  | 'EmbeddingUnavailable'
  | 'EmbeddingRejected'
  | 'VectorStoreUnavailable'
  | 'GenerationUnavailable'
  | 'GenerationRefused'
  | 'InputTooLarge'
  | 'TemplateFieldMissing'
  | 'TenantIsolationViolation'
  | 'IngestionFailed'
  | 'InvalidInput'
  | 'InvalidLead'
  | 'Internal';

export class OutreachError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly retryable: boolean,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// =============================================================================
// TRANSIENT (retried by the caller, bounded)
// =============================================================================

export class EmbeddingUnavailable extends OutreachError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super('EmbeddingUnavailable', message, true, details, { cause });
  }
}

export class GenerationUnavailable extends OutreachError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super('GenerationUnavailable', message, true, details, { cause });
  }
}

export class VectorStoreUnavailable extends OutreachError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super('VectorStoreUnavailable', message, true, details, { cause });
  }
}

// =============================================================================
// NON-TRANSIENT (surface immediately)
// =============================================================================

/** The embedding API answered but will not serve the request (bad key, bad request) */
export class EmbeddingRejected extends OutreachError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super('EmbeddingRejected', message, false, details, { cause });
  }
}

export class GenerationRefused extends OutreachError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super('GenerationRefused', message, false, details, { cause });
  }
}

export class InputTooLarge extends OutreachError {
  constructor(
    message: string,
    public readonly tokens: number,
    public readonly limit: number
  ) {
    super('InputTooLarge', message, false, { tokens, limit });
  }
}

export class TemplateFieldMissing extends OutreachError {
  constructor(public readonly fields: string[]) {
    super(
      'TemplateFieldMissing',
      `Template placeholder(s) without a lead value: ${fields.join(', ')}`,
      false,
      { fields }
    );
  }
}

export class InvalidInput extends OutreachError {
  constructor(message: string, public readonly issues: string[]) {
    super('InvalidInput', message, false, { issues });
  }
}

export class InvalidLead extends OutreachError {
  constructor(public readonly issues: string[]) {
    super('InvalidLead', `Invalid lead: ${issues.join('; ')}`, false, { issues });
  }
}

/**
 * Internal invariant breach: a record of one tenant reached another tenant's
 * request. Never recovered; callers log and abort.
 */
export class TenantIsolationViolation extends OutreachError {
  constructor(expectedTenant: string, actualTenant: string, where: string) {
    super(
      'TenantIsolationViolation',
      `Tenant isolation violated in ${where}: expected tenant "${expectedTenant}", got "${actualTenant}"`,
      false,
      { expected_tenant: expectedTenant, actual_tenant: actualTenant, where }
    );
  }
}

export interface IngestionFailureReason {
  kind: ErrorKind;
  step: string;
  message: string;
}

export class IngestionFailed extends OutreachError {
  constructor(
    public readonly documentId: string,
    public readonly reason: IngestionFailureReason,
    cause?: unknown
  ) {
    super(
      'IngestionFailed',
      `Ingestion of document "${documentId}" failed at ${reason.step}: ${reason.message}`,
      false,
      { document_id: documentId, ...reason },
      { cause }
    );
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function isOutreachError(error: unknown): error is OutreachError {
  return error instanceof OutreachError;
}

export function isTransient(error: unknown): boolean {
  return error instanceof OutreachError && error.retryable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Typed failure shape returned to callers instead of a thrown error
 */
export interface StepFailure<S extends string = string> {
  step: S;
  kind: ErrorKind;
  message: string;
  retryable: boolean;
}

export function toFailure<S extends string>(error: unknown, step: S): StepFailure<S> {
  if (error instanceof OutreachError) {
    return { step, kind: error.kind, message: error.message, retryable: error.retryable };
  }
  return { step, kind: 'Internal', message: errorMessage(error), retryable: false };
}
