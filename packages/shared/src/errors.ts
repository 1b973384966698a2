/**
 * Structured error values returned by the assessment core.
 *
 * Components inside the core throw `LegalEngineError`; the orchestrator catches it and
 * hands the carried `AssessmentError` back to the caller as a value.
 */

export type AssessmentErrorKind =
  | 'UnknownDocumentType'
  | 'UnknownArea'
  | 'MissingRequiredField'
  | 'EmptyFactSet'
  | 'InvalidInput'
  | 'Cancelled';

export type AssessmentError =
  | { kind: 'UnknownDocumentType'; message: string; documentType: string }
  | { kind: 'UnknownArea'; message: string; area: string }
  | { kind: 'MissingRequiredField'; message: string; fields: string[] }
  | { kind: 'EmptyFactSet'; message: string }
  | { kind: 'InvalidInput'; message: string; fields: string[] }
  | { kind: 'Cancelled'; message: string };

export type Result<T> = { ok: true; value: T } | { ok: false; error: AssessmentError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: AssessmentError): Result<T> {
  return { ok: false, error };
}

export class LegalEngineError extends Error {
  constructor(public readonly detail: AssessmentError) {
    super(detail.message);
    this.name = 'LegalEngineError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get kind(): AssessmentErrorKind {
    return this.detail.kind;
  }
}

export const errors = {
  unknownDocumentType(documentType: string): LegalEngineError {
    return new LegalEngineError({
      kind: 'UnknownDocumentType',
      message: `Document type ${documentType} is not registered`,
      documentType
    });
  },

  unknownArea(area: string): LegalEngineError {
    return new LegalEngineError({
      kind: 'UnknownArea',
      message: `Area of law ${area} is not registered`,
      area
    });
  },

  missingRequiredFields(fields: string[]): LegalEngineError {
    return new LegalEngineError({
      kind: 'MissingRequiredField',
      message: `Missing required fields: ${fields.join(', ')}`,
      fields
    });
  },

  emptyFactSet(): LegalEngineError {
    return new LegalEngineError({
      kind: 'EmptyFactSet',
      message: 'No facts remain after removing blank entries'
    });
  },

  invalidInput(fields: string[]): LegalEngineError {
    return new LegalEngineError({
      kind: 'InvalidInput',
      message: `Invalid input for: ${fields.join(', ')}`,
      fields
    });
  },

  cancelled(): LegalEngineError {
    return new LegalEngineError({ kind: 'Cancelled', message: 'Request was cancelled before processing' });
  }
};
