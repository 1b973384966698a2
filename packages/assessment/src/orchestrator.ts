import type { z } from 'zod';

import {
  CaseFactsInputSchema,
  ClassificationInputSchema,
  ConstitutionalRightsInputSchema,
  ContractValidityInputSchema,
  CriminalLiabilityInputSchema,
  DocumentRequestInputSchema,
  LegalEngineError,
  describeIssues,
  errors,
  fail,
  ok,
  type AreaClassification,
  type AssessmentResult,
  type ConstitutionalRightsCheck,
  type ContractValidityCheck,
  type CriminalLiabilityAssessment,
  type DocumentTypeDescriptor,
  type GeneratedDocument,
  type Result
} from '@juridico/shared';
import { AreaClassifier, LegalContentLibrary, LegalRuleEvaluator, ScenarioScreener } from '@juridico/rules';
import { DocumentTemplateEngine, type Clock } from '@juridico/documents';

export type CallOptions = {
  signal?: AbortSignal;
};

export type AssessmentOrchestratorOptions = {
  library?: LegalContentLibrary;
  clock?: Clock;
};

type InputSchema<I> = z.ZodType<I, z.ZodTypeDef, unknown>;

/**
 * Single entry point of the engine. Raw caller input is validated here, handed to the
 * component that owns the operation, and every failure comes back as a `Result` value.
 * Only programming faults escape as exceptions.
 */
export class AssessmentOrchestrator {
  readonly library: LegalContentLibrary;

  private readonly engine: DocumentTemplateEngine;
  private readonly evaluator: LegalRuleEvaluator;
  private readonly classifier: AreaClassifier;
  private readonly screener: ScenarioScreener;

  constructor(options: AssessmentOrchestratorOptions = {}) {
    this.library = options.library ?? new LegalContentLibrary();
    this.engine = new DocumentTemplateEngine(this.library, options.clock);
    this.evaluator = new LegalRuleEvaluator(this.library);
    this.classifier = new AreaClassifier(this.library);
    this.screener = new ScenarioScreener(this.library);
  }

  private run<I, T>(
    schema: InputSchema<I>,
    raw: unknown,
    options: CallOptions | undefined,
    handler: (input: I) => T
  ): Result<T> {
    if (options?.signal?.aborted) {
      return fail(errors.cancelled().detail);
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      return fail(errors.invalidInput(describeIssues(parsed.error)).detail);
    }

    try {
      return ok(handler(parsed.data));
    } catch (error) {
      if (error instanceof LegalEngineError) {
        return fail(error.detail);
      }
      throw error;
    }
  }

  listDocumentTypes(): DocumentTypeDescriptor[] {
    return this.engine.listDocumentTypes();
  }

  generateDocument(raw: unknown, options?: CallOptions): Result<GeneratedDocument> {
    return this.run(DocumentRequestInputSchema, raw, options, (input) =>
      this.engine.render(input.documentType, input.fields)
    );
  }

  analyzeCase(raw: unknown, options?: CallOptions): Result<AssessmentResult> {
    return this.run(CaseFactsInputSchema, raw, options, (input) =>
      this.evaluator.evaluate(input.facts, input.legalQuestion, input.area)
    );
  }

  classifyCase(raw: unknown, options?: CallOptions): Result<AreaClassification> {
    return this.run(ClassificationInputSchema, raw, options, (input) =>
      this.classifier.classify(input.facts, input.legalQuestion)
    );
  }

  checkConstitutionalRights(raw: unknown, options?: CallOptions): Result<ConstitutionalRightsCheck> {
    return this.run(ConstitutionalRightsInputSchema, raw, options, (input) =>
      this.screener.checkConstitutionalRights(input.situation)
    );
  }

  analyzeContractValidity(raw: unknown, options?: CallOptions): Result<ContractValidityCheck> {
    return this.run(ContractValidityInputSchema, raw, options, (input) =>
      this.screener.analyzeContractValidity(input.contractTerms)
    );
  }

  assessCriminalLiability(raw: unknown, options?: CallOptions): Result<CriminalLiabilityAssessment> {
    return this.run(CriminalLiabilityInputSchema, raw, options, (input) =>
      this.screener.assessCriminalLiability(input.facts)
    );
  }
}
