export type EntityKind = 'medication' | 'lab_test' | 'procedure' | 'condition';

/** An entity could not be built from the values extracted for it. */
export class EntityValidationError extends Error {
  readonly entity: EntityKind;
  readonly field: string;

  constructor(entity: EntityKind, field: string, message: string) {
    super(message);
    this.name = 'EntityValidationError';
    this.entity = entity;
    this.field = field;
  }
}

/**
 * The generative extractor could not produce a result: not configured,
 * input too long, model call failed or timed out, or the response did not
 * match the clinical structure schema.
 */
export class GenerativeExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerativeExtractionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
