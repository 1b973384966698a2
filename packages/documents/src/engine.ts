import {
  DOCUMENT_NOTICE,
  errors,
  type DocumentSection,
  type DocumentTypeDescriptor,
  type GeneratedDocument
} from '@juridico/shared';
import {
  GENERATION_DATE_PLACEHOLDER,
  expandPartials,
  interpolate,
  type LegalContentLibrary,
  type TemplateField,
  type TemplateSkeleton
} from '@juridico/rules';

import { formatSpanishLongDate } from './format';

export type Clock = () => Date;

type FieldValues = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isText(value: unknown): value is string | number {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

export function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) {
    return value.every((entry) => typeof entry === 'string' && entry.trim() === '');
  }
  return false;
}

function invalidPaths(field: TemplateField, value: unknown): string[] {
  switch (field.kind) {
    case 'text':
      return isText(value) ? [] : [field.name];

    case 'list':
      if (!Array.isArray(value)) return [field.name];
      return value.flatMap((entry, index) => (typeof entry === 'string' ? [] : [`${field.name}[${index}]`]));

    case 'records': {
      if (!Array.isArray(value)) return [field.name];
      const itemFields = field.item_fields ?? [];
      return value.flatMap((item, index) => {
        const itemPath = `${field.name}[${index}]`;
        if (!isRecord(item)) return [itemPath];
        const missingOrWrong = itemFields
          .filter((name) => !isText(item[name]) || isEmptyValue(item[name]))
          .map((name) => `${itemPath}.${name}`);
        const undeclared = Object.keys(item)
          .filter((name) => !itemFields.includes(name))
          .map((name) => `${itemPath}.${name}`);
        return [...missingOrWrong, ...undeclared];
      });
    }
  }
}

function renderValue(field: TemplateField, value: unknown): string {
  if (field.kind === 'list' && Array.isArray(value)) {
    return value.map((entry, index) => `${index + 1}.- ${String(entry)}`).join('\n');
  }

  if (field.kind === 'records' && Array.isArray(value)) {
    const format = field.item_format ?? '';
    return value
      .filter(isRecord)
      .map((item) => {
        const itemValues: Record<string, string> = {};
        Object.entries(item).forEach(([key, entry]) => {
          itemValues[key] = String(entry);
        });
        return interpolate(format, itemValues);
      })
      .join('\n');
  }

  return String(value);
}

/**
 * Turns a document skeleton plus caller-supplied fields into a finished document.
 *
 * Required fields are checked first and all missing ones are reported together. Values
 * are then checked against the kind each field declares, and fields the skeleton does
 * not know are rejected. Rendering never alters caller text.
 */
export class DocumentTemplateEngine {
  constructor(
    private library: LegalContentLibrary,
    private clock: Clock = () => new Date()
  ) {}

  listDocumentTypes(): DocumentTypeDescriptor[] {
    return this.library.listDocumentTypes().map((documentType) => {
      const skeleton = this.library.getTemplate(documentType);
      return {
        documentType,
        title: skeleton.title,
        requiredFields: skeleton.fields.filter((field) => field.required).map((field) => field.name),
        optionalFields: skeleton.fields.filter((field) => !field.required).map((field) => field.name)
      };
    });
  }

  validateFields(skeleton: TemplateSkeleton, fields: FieldValues) {
    const missing = skeleton.fields
      .filter((field) => field.required && isEmptyValue(fields[field.name]))
      .map((field) => field.name);
    if (missing.length > 0) {
      throw errors.missingRequiredFields(missing);
    }

    const declared = new Set(skeleton.fields.map((field) => field.name));
    const invalid = [
      ...skeleton.fields.flatMap((field) =>
        isEmptyValue(fields[field.name]) ? [] : invalidPaths(field, fields[field.name])
      ),
      ...Object.keys(fields).filter((name) => !declared.has(name))
    ];
    if (invalid.length > 0) {
      throw errors.invalidInput(invalid);
    }
  }

  render(documentType: string, fields: FieldValues): GeneratedDocument {
    const skeleton = this.library.getTemplate(documentType);
    this.validateFields(skeleton, fields);

    const generatedAt = this.clock();
    const generationDate = formatSpanishLongDate(generatedAt);

    const values: Record<string, string> = { [GENERATION_DATE_PLACEHOLDER]: generationDate };
    skeleton.fields.forEach((field) => {
      const value = fields[field.name];
      if (!isEmptyValue(value)) {
        values[field.name] = renderValue(field, value);
      } else if (field.default !== undefined) {
        values[field.name] = field.default;
      } else {
        values[field.name] = field.default_generation_date ? generationDate : '';
      }
    });

    const sections: DocumentSection[] = skeleton.sections
      .filter((section) => !section.when || !isEmptyValue(fields[section.when]))
      .map((section) =>
        Object.freeze({
          title: skeleton.heading_style === 'upper' ? section.title.toUpperCase() : section.title,
          body: interpolate(
            expandPartials(section.body, (id) => this.library.getClause(id)),
            values
          )
        })
      );

    return Object.freeze({
      documentType: skeleton.document_type,
      title: skeleton.title,
      renderedText: sections.map((section) => `${section.title}\n${section.body}`).join('\n\n'),
      sections: Object.freeze(sections),
      generatedAt: generatedAt.toISOString(),
      notice: DOCUMENT_NOTICE
    });
  }
}
