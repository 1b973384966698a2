import path from 'path';
import { z } from 'zod';

import { DocumentTypeSchema, LegalAreaSchema, RiskLevelSchema } from '@juridico/shared';

import { listPlaceholders } from './template-syntax';

const KeywordListSchema = z.array(z.string().min(1)).min(1);
const IdentifierSchema = z.string().regex(/^[a-z][a-z0-9_]*$/, 'must be snake_case');

export const KeywordPredicateSchema = z
  .object({
    all: KeywordListSchema.optional(),
    any: KeywordListSchema.optional(),
    none: KeywordListSchema.optional()
  })
  .strict()
  .refine((value) => value.all !== undefined || value.any !== undefined, {
    message: 'predicate needs an all or any keyword list'
  });

export const FindingContentSchema = z
  .object({
    cited_provisions: z.array(z.string().min(1)).min(1),
    conclusion: z.string().min(1),
    risk_level: RiskLevelSchema,
    recommended_actions: z.array(z.string().min(1)).min(1)
  })
  .strict();

export const RuleSchema = z
  .object({
    id: IdentifierSchema,
    description: z.string().optional(),
    when: KeywordPredicateSchema,
    finding: FindingContentSchema
  })
  .strict();

export const FallbackFindingSchema = z
  .object({
    conclusion: z.string().min(1),
    cited_provisions: z.array(z.string().min(1)).default([]),
    recommended_actions: z.array(z.string().min(1)).min(1)
  })
  .strict();

export const RuleTableSchema = z
  .object({
    area: LegalAreaSchema,
    name: z.string().min(1),
    rules: z.array(RuleSchema).min(1),
    fallback: FallbackFindingSchema
  })
  .strict()
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    table.rules.forEach((rule, index) => {
      if (seen.has(rule.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rules', index, 'id'],
          message: `duplicate rule id ${rule.id}`
        });
      }
      seen.add(rule.id);
    });
  });

export const TemplateFieldSchema = z
  .object({
    name: IdentifierSchema,
    label: z.string().optional(),
    kind: z.enum(['text', 'list', 'records']).default('text'),
    required: z.boolean().default(true),
    default: z.string().optional(),
    default_generation_date: z.boolean().default(false),
    item_fields: z.array(IdentifierSchema).min(1).optional(),
    item_format: z.string().min(1).optional()
  })
  .strict()
  .superRefine((field, ctx) => {
    if (field.required && (field.default !== undefined || field.default_generation_date)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `required field ${field.name} cannot declare a default` });
    }

    if (field.kind !== 'records') return;

    if (!field.item_fields || !field.item_format) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `records field ${field.name} needs item_fields and item_format`
      });
      return;
    }

    const itemFields = new Set(field.item_fields);
    listPlaceholders(field.item_format)
      .filter((name) => !itemFields.has(name))
      .forEach((name) => {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['item_format'],
          message: `item_format references undeclared item field ${name}`
        });
      });
  });

export const TemplateSectionSchema = z
  .object({
    title: z.string().min(1),
    body: z.string().min(1),
    when: IdentifierSchema.optional()
  })
  .strict();

export const TemplateSkeletonSchema = z
  .object({
    document_type: DocumentTypeSchema,
    title: z.string().min(1),
    heading_style: z.enum(['upper', 'as_written']).default('upper'),
    fields: z.array(TemplateFieldSchema).min(1),
    sections: z.array(TemplateSectionSchema).min(1)
  })
  .strict()
  .superRefine((skeleton, ctx) => {
    const fields = new Map<string, TemplateField>();
    skeleton.fields.forEach((field, index) => {
      if (fields.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['fields', index, 'name'],
          message: `duplicate field ${field.name}`
        });
      }
      fields.set(field.name, field);
    });

    skeleton.sections.forEach((section, index) => {
      if (!section.when) return;
      const field = fields.get(section.when);
      if (!field || field.required) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sections', index, 'when'],
          message: `section condition must name an optional field, got ${section.when}`
        });
      }
    });
  });

export const ClauseFileSchema = z
  .object({
    clauses: z
      .array(
        z
          .object({
            id: IdentifierSchema,
            text: z.string().min(1)
          })
          .strict()
      )
      .min(1)
  })
  .strict();

export const ClassificationTableSchema = z
  .object({
    default_area: LegalAreaSchema,
    areas: z
      .array(
        z
          .object({
            area: LegalAreaSchema,
            keywords: KeywordListSchema
          })
          .strict()
      )
      .min(1)
  })
  .strict();

export const ConstitutionalRightsTableSchema = z
  .object({
    rights: z
      .array(
        z
          .object({
            id: IdentifierSchema,
            right: z.string().min(1),
            article: z.string().min(1),
            description: z.string().min(1),
            keywords: KeywordListSchema
          })
          .strict()
      )
      .min(1),
    recommendations: z
      .object({
        implicated: z.string().min(1),
        none: z.string().min(1)
      })
      .strict()
  })
  .strict();

export const ContractValidityTableSchema = z
  .object({
    cited_provisions: z.array(z.string().min(1)).min(1),
    elements: z
      .array(
        z
          .object({
            id: IdentifierSchema,
            keywords: KeywordListSchema,
            issue: z.string().min(1),
            recommendation: z.string().min(1)
          })
          .strict()
      )
      .min(1)
  })
  .strict();

export const CriminalOffenseTableSchema = z
  .object({
    offenses: z
      .array(
        z
          .object({
            id: IdentifierSchema,
            offense: z.string().min(1),
            keywords: KeywordListSchema,
            elements: z.array(z.string().min(1)).min(1),
            penalty: z.string().min(1),
            cited_provisions: z.array(z.string().min(1)).min(1)
          })
          .strict()
      )
      .min(1),
    defenses: z.array(z.string().min(1)).min(1),
    recommendations: z
      .object({
        detected: z.string().min(1),
        none: z.string().min(1)
      })
      .strict()
  })
  .strict();

export type FindingContent = z.infer<typeof FindingContentSchema>;
export type Rule = z.infer<typeof RuleSchema>;
export type RuleTable = z.infer<typeof RuleTableSchema>;
export type TemplateField = z.infer<typeof TemplateFieldSchema>;
export type TemplateSection = z.infer<typeof TemplateSectionSchema>;
export type TemplateSkeleton = z.infer<typeof TemplateSkeletonSchema>;
export type ClassificationTable = z.infer<typeof ClassificationTableSchema>;
export type ConstitutionalRightsTable = z.infer<typeof ConstitutionalRightsTableSchema>;
export type ContractValidityTable = z.infer<typeof ContractValidityTableSchema>;
export type CriminalOffenseTable = z.infer<typeof CriminalOffenseTableSchema>;

export type ScreeningTables = {
  constitutionalRights: ConstitutionalRightsTable;
  contractValidity: ContractValidityTable;
  criminalOffenses: CriminalOffenseTable;
};

export function getDefaultContentDirectory(currentDir: string) {
  return path.resolve(currentDir, '..', 'content');
}
