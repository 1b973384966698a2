import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';

import {
  DocumentTypeSchema,
  LegalAreaSchema,
  errors,
  type DocumentType,
  type LegalArea
} from '@juridico/shared';

import {
  ClassificationTableSchema,
  ClauseFileSchema,
  ConstitutionalRightsTableSchema,
  ContractValidityTableSchema,
  CriminalOffenseTableSchema,
  RuleTableSchema,
  TemplateSkeletonSchema,
  getDefaultContentDirectory,
  type ClassificationTable,
  type RuleTable,
  type ScreeningTables,
  type TemplateSkeleton
} from './schemas';
import { GENERATION_DATE_PLACEHOLDER, expandPartials, listPartials, listPlaceholders } from './template-syntax';

type LegalContentLibraryOptions = {
  basePath?: string;
  disabledAreas?: string[];
  disabledDocumentTypes?: string[];
};

function parseList(value?: string) {
  if (!value) return new Set<string>();
  return new Set(
    value
      .split(',')
      .map((item) => item.trim().toLowerCase())
      .filter(Boolean)
  );
}

function resolveDisabled(explicit: string[] | undefined, envValue: string | undefined) {
  return explicit?.length ? new Set(explicit.map((item) => item.toLowerCase())) : parseList(envValue);
}

function readYaml<T>(filePath: string, schema: { parse(data: unknown): T }): T {
  const parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  return schema.parse(parsed);
}

function listYamlFiles(directory: string) {
  if (!fs.existsSync(directory)) return [];
  return fs
    .readdirSync(directory, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith('.yaml'))
    .map((entry) => path.join(directory, entry.name))
    .sort();
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach((item) => deepFreeze(item));
    Object.freeze(value);
  }
  return value;
}

function assertSkeletonResolvable(skeleton: TemplateSkeleton, clauses: Map<string, string>, filePath: string) {
  const declared = new Set(skeleton.fields.map((field) => field.name));
  declared.add(GENERATION_DATE_PLACEHOLDER);

  skeleton.sections.forEach((section) => {
    const unknownClauses = listPartials(section.body).filter((id) => !clauses.has(id));
    if (unknownClauses.length > 0) {
      throw new Error(`${filePath}: section "${section.title}" references unknown clauses ${unknownClauses.join(', ')}`);
    }

    const body = expandPartials(section.body, (id) => clauses.get(id) ?? '');
    const undeclared = listPlaceholders(body).filter((name) => !declared.has(name));
    if (undeclared.length > 0) {
      throw new Error(`${filePath}: section "${section.title}" uses undeclared fields ${undeclared.join(', ')}`);
    }
  });
}

/**
 * Read-only store of template skeletons, boilerplate clauses, rule tables and screening
 * tables. Everything is parsed and validated once, in the constructor, then frozen.
 */
export class LegalContentLibrary {
  readonly basePath: string;

  private readonly templates = new Map<DocumentType, TemplateSkeleton>();
  private readonly ruleTables = new Map<LegalArea, RuleTable>();
  private readonly clauses = new Map<string, string>();
  private readonly classification: ClassificationTable;
  private readonly screening: ScreeningTables;

  private readonly disabledAreas: Set<string>;
  private readonly disabledDocumentTypes: Set<string>;

  constructor(options?: LegalContentLibraryOptions) {
    const configured = options?.basePath ?? process.env.LEGAL_CONTENT_DIR ?? getDefaultContentDirectory(__dirname);
    this.basePath = fs.existsSync(configured)
      ? configured
      : path.resolve(process.cwd(), 'packages', 'rules', 'content');
    this.disabledAreas = resolveDisabled(options?.disabledAreas, process.env.DISABLED_LEGAL_AREAS);
    this.disabledDocumentTypes = resolveDisabled(
      options?.disabledDocumentTypes,
      process.env.DISABLED_DOCUMENT_TYPES
    );

    this.loadClauses();
    this.loadTemplates();
    this.loadRuleTables();
    this.classification = deepFreeze(
      readYaml(path.join(this.basePath, 'classification.yaml'), ClassificationTableSchema)
    );
    this.screening = deepFreeze({
      constitutionalRights: readYaml(
        path.join(this.basePath, 'screening', 'constitutional-rights.yaml'),
        ConstitutionalRightsTableSchema
      ),
      contractValidity: readYaml(
        path.join(this.basePath, 'screening', 'contract-validity.yaml'),
        ContractValidityTableSchema
      ),
      criminalOffenses: readYaml(
        path.join(this.basePath, 'screening', 'criminal-offenses.yaml'),
        CriminalOffenseTableSchema
      )
    });
  }

  private loadClauses() {
    const file = readYaml(path.join(this.basePath, 'clauses.yaml'), ClauseFileSchema);
    file.clauses.forEach((clause) => {
      if (this.clauses.has(clause.id)) {
        throw new Error(`Duplicate clause ${clause.id}`);
      }
      this.clauses.set(clause.id, clause.text);
    });
  }

  private loadTemplates() {
    listYamlFiles(path.join(this.basePath, 'documents')).forEach((filePath) => {
      const skeleton = readYaml(filePath, TemplateSkeletonSchema);
      if (this.templates.has(skeleton.document_type)) {
        throw new Error(`Duplicate template for ${skeleton.document_type} in ${filePath}`);
      }
      assertSkeletonResolvable(skeleton, this.clauses, filePath);
      this.templates.set(skeleton.document_type, deepFreeze(skeleton));
    });
  }

  private loadRuleTables() {
    listYamlFiles(path.join(this.basePath, 'areas')).forEach((filePath) => {
      const table = readYaml(filePath, RuleTableSchema);
      if (this.ruleTables.has(table.area)) {
        throw new Error(`Duplicate rule table for ${table.area} in ${filePath}`);
      }
      this.ruleTables.set(table.area, deepFreeze(table));
    });
  }

  private isDocumentTypeEnabled(documentType: string) {
    return !this.disabledDocumentTypes.has(documentType.toLowerCase());
  }

  private isAreaEnabled(area: string) {
    return !this.disabledAreas.has(area.toLowerCase());
  }

  listDocumentTypes(): DocumentType[] {
    return Array.from(this.templates.keys()).filter((documentType) => this.isDocumentTypeEnabled(documentType));
  }

  listAreas(): LegalArea[] {
    return Array.from(this.ruleTables.keys()).filter((area) => this.isAreaEnabled(area));
  }

  getTemplate(documentType: string): TemplateSkeleton {
    const parsed = DocumentTypeSchema.safeParse(documentType);
    const skeleton = parsed.success ? this.templates.get(parsed.data) : undefined;
    if (!skeleton || !this.isDocumentTypeEnabled(skeleton.document_type)) {
      throw errors.unknownDocumentType(documentType);
    }
    return skeleton;
  }

  getRequiredFields(documentType: string): string[] {
    return this.getTemplate(documentType)
      .fields.filter((field) => field.required)
      .map((field) => field.name);
  }

  getRuleTable(area: string): RuleTable {
    const parsed = LegalAreaSchema.safeParse(area);
    const table = parsed.success ? this.ruleTables.get(parsed.data) : undefined;
    if (!table || !this.isAreaEnabled(table.area)) {
      throw errors.unknownArea(area);
    }
    return table;
  }

  getClause(id: string): string {
    const clause = this.clauses.get(id);
    if (clause === undefined) {
      throw new Error(`Clause ${id} is not registered`);
    }
    return clause;
  }

  getClassificationTable(): ClassificationTable {
    return this.classification;
  }

  getScreeningTables(): ScreeningTables {
    return this.screening;
  }
}
