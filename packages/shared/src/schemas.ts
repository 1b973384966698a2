import { z, ZodError } from 'zod';

export const DOCUMENT_TYPES = ['amparo', 'contract', 'lawsuit', 'power_of_attorney', 'will'] as const;
export const LEGAL_AREAS = [
  'constitucional',
  'civil',
  'penal',
  'laboral',
  'mercantil',
  'administrativo',
  'fiscal',
  'familiar'
] as const;
export const RISK_LEVELS = ['low', 'medium', 'high'] as const;

export const DocumentTypeSchema = z.enum(DOCUMENT_TYPES);
export const LegalAreaSchema = z.enum(LEGAL_AREAS);
export const RiskLevelSchema = z.enum(RISK_LEVELS);

export type DocumentType = z.infer<typeof DocumentTypeSchema>;
export type LegalArea = z.infer<typeof LegalAreaSchema>;
export type RiskLevel = z.infer<typeof RiskLevelSchema>;

// documentType and area stay plain strings here: a well-formed value outside the
// registered set is reported as UnknownDocumentType / UnknownArea, not InvalidInput.
export const DocumentRequestInputSchema = z
  .object({
    documentType: z.string(),
    fields: z.record(z.string(), z.unknown())
  })
  .strict();

export const CaseFactsInputSchema = z
  .object({
    facts: z.array(z.string()),
    legalQuestion: z.string(),
    area: z.string()
  })
  .strict();

export const ClassificationInputSchema = z
  .object({
    facts: z.array(z.string()),
    legalQuestion: z.string().default('')
  })
  .strict();

export const ConstitutionalRightsInputSchema = z
  .object({
    situation: z.string()
  })
  .strict();

export const ContractValidityInputSchema = z
  .object({
    contractTerms: z.array(z.string())
  })
  .strict();

export const CriminalLiabilityInputSchema = z
  .object({
    facts: z.array(z.string())
  })
  .strict();

export type DocumentRequestInput = z.infer<typeof DocumentRequestInputSchema>;
export type CaseFactsInput = z.infer<typeof CaseFactsInputSchema>;
export type ClassificationInput = z.infer<typeof ClassificationInputSchema>;
export type ConstitutionalRightsInput = z.infer<typeof ConstitutionalRightsInputSchema>;
export type ContractValidityInput = z.infer<typeof ContractValidityInputSchema>;
export type CriminalLiabilityInput = z.infer<typeof CriminalLiabilityInputSchema>;

export function formatFieldPath(path: (string | number)[]): string {
  if (path.length === 0) return 'request';

  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

/**
 * Flattens zod issues into the list of offending field names, in issue order and
 * without duplicates. Unknown keys are reported by their own name.
 */
export function describeIssues(error: ZodError): string[] {
  const fields = new Set<string>();

  error.issues.forEach((issue) => {
    if (issue.code === 'unrecognized_keys') {
      issue.keys.forEach((key) => fields.add(formatFieldPath([...issue.path, key])));
      return;
    }
    fields.add(formatFieldPath(issue.path));
  });

  return Array.from(fields);
}
