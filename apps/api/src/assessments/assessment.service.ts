import { HttpException, Injectable } from '@nestjs/common';
import type { IncomingMessage } from 'http';

import { AssessmentOrchestrator, type CallOptions } from '@juridico/assessment';
import type { AssessmentError, AssessmentErrorKind, Result } from '@juridico/shared';

export const STATUS_BY_KIND: Record<AssessmentErrorKind, number> = {
  InvalidInput: 400,
  UnknownDocumentType: 404,
  UnknownArea: 404,
  MissingRequiredField: 422,
  EmptyFactSet: 422,
  Cancelled: 499
};

export type ErrorBody = {
  error: AssessmentErrorKind;
  message: string;
  fields?: string[];
};

export function toErrorBody(error: AssessmentError): ErrorBody {
  return {
    error: error.kind,
    message: error.message,
    ...('fields' in error ? { fields: error.fields } : {})
  };
}

/** A client that hung up before the handler ran gets an aborted signal. */
export function callOptionsFor(request: IncomingMessage): CallOptions {
  return request.socket?.destroyed ? { signal: AbortSignal.abort() } : {};
}

@Injectable()
export class AssessmentService {
  constructor(private readonly orchestrator: AssessmentOrchestrator) {}

  private unwrap<T>(result: Result<T>): T {
    if (result.ok) {
      return result.value;
    }
    throw new HttpException(toErrorBody(result.error), STATUS_BY_KIND[result.error.kind]);
  }

  listDocumentTypes() {
    return this.orchestrator.listDocumentTypes();
  }

  generateDocument(body: unknown, options?: CallOptions) {
    return this.unwrap(this.orchestrator.generateDocument(body, options));
  }

  analyzeCase(body: unknown, options?: CallOptions) {
    return this.unwrap(this.orchestrator.analyzeCase(body, options));
  }

  classifyCase(body: unknown, options?: CallOptions) {
    return this.unwrap(this.orchestrator.classifyCase(body, options));
  }

  checkConstitutionalRights(body: unknown, options?: CallOptions) {
    return this.unwrap(this.orchestrator.checkConstitutionalRights(body, options));
  }

  analyzeContractValidity(body: unknown, options?: CallOptions) {
    return this.unwrap(this.orchestrator.analyzeContractValidity(body, options));
  }

  assessCriminalLiability(body: unknown, options?: CallOptions) {
    return this.unwrap(this.orchestrator.assessCriminalLiability(body, options));
  }
}
