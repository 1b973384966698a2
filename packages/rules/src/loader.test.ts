import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';

import { LEGAL_AREAS, LegalEngineError } from '@juridico/shared';

import { LegalContentLibrary } from './loader';
import { RuleTableSchema, TemplateSkeletonSchema } from './schemas';

const CONTENT_DIR = path.resolve(__dirname, '..', 'content');

function captureEngineError(fn: () => unknown): LegalEngineError {
  try {
    fn();
  } catch (error) {
    if (error instanceof LegalEngineError) return error;
    throw error;
  }
  throw new Error('expected a LegalEngineError');
}

describe('LegalContentLibrary', () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    tempDirs.splice(0).forEach((dir) => fs.rmSync(dir, { recursive: true, force: true }));
  });

  function copyContent() {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'legal-content-'));
    tempDirs.push(dir);
    fs.cpSync(CONTENT_DIR, dir, { recursive: true });
    return dir;
  }

  it('loads every document type and area from YAML', () => {
    const library = new LegalContentLibrary({ basePath: CONTENT_DIR });

    expect(library.listDocumentTypes()).toEqual(['amparo', 'contract', 'lawsuit', 'power_of_attorney', 'will']);
    expect([...library.listAreas()].sort()).toEqual([...LEGAL_AREAS].sort());
  });

  it('returns required fields in declaration order', () => {
    const library = new LegalContentLibrary({ basePath: CONTENT_DIR });

    expect(library.getRequiredFields('contract')).toEqual([
      'tipo_contrato',
      'parte_1_nombre',
      'parte_1_datos',
      'parte_2_nombre',
      'parte_2_datos',
      'objeto_contrato'
    ]);
    expect(library.getRequiredFields('will')).toEqual(['testador', 'herederos', 'bienes']);
  });

  it('reports unregistered document types and areas as structured errors', () => {
    const library = new LegalContentLibrary({ basePath: CONTENT_DIR });

    const documentError = captureEngineError(() => library.getTemplate('petition'));
    expect(documentError.detail).toEqual({
      kind: 'UnknownDocumentType',
      message: 'Document type petition is not registered',
      documentType: 'petition'
    });

    const areaError = captureEngineError(() => library.getRuleTable('amparo'));
    expect(areaError.kind).toBe('UnknownArea');
  });

  it('respects kill-switch options', () => {
    const library = new LegalContentLibrary({
      basePath: CONTENT_DIR,
      disabledAreas: ['fiscal'],
      disabledDocumentTypes: ['will']
    });

    expect(library.listAreas()).not.toContain('fiscal');
    expect(library.listDocumentTypes()).not.toContain('will');
    expect(captureEngineError(() => library.getRuleTable('fiscal')).kind).toBe('UnknownArea');
    expect(captureEngineError(() => library.getTemplate('will')).kind).toBe('UnknownDocumentType');
  });

  it('freezes loaded content', () => {
    const library = new LegalContentLibrary({ basePath: CONTENT_DIR });
    const table = library.getRuleTable('laboral');

    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.rules[0].when)).toBe(true);
    expect(Object.isFrozen(library.getTemplate('amparo').sections)).toBe(true);
  });

  it('rejects a skeleton that uses an undeclared placeholder', () => {
    const dir = copyContent();
    const file = path.join(dir, 'documents', 'power_of_attorney.yaml');
    fs.writeFileSync(file, fs.readFileSync(file, 'utf-8').replace('{{apoderado}}', '{{representante}}'));

    expect(() => new LegalContentLibrary({ basePath: dir })).toThrow(/undeclared fields representante/);
  });

  it('rejects a skeleton that references an unknown clause', () => {
    const dir = copyContent();
    const file = path.join(dir, 'documents', 'will.yaml');
    fs.writeFileSync(file, fs.readFileSync(file, 'utf-8').replace('{{> testamento_revocacion}}', '{{> clausula_inexistente}}'));

    expect(() => new LegalContentLibrary({ basePath: dir })).toThrow(/unknown clauses clausula_inexistente/);
  });
});

describe('content schemas', () => {
  it('requires item_fields and item_format on records fields', () => {
    const result = TemplateSkeletonSchema.safeParse({
      document_type: 'will',
      title: 'Testamento',
      fields: [{ name: 'herederos', kind: 'records' }],
      sections: [{ title: 'Herederos', body: '{{herederos}}' }]
    });

    expect(result.success).toBe(false);
  });

  it('only lets a section depend on an optional field', () => {
    const result = TemplateSkeletonSchema.safeParse({
      document_type: 'contract',
      title: 'Contrato',
      fields: [{ name: 'objeto_contrato' }],
      sections: [{ title: 'Objeto', body: '{{objeto_contrato}}', when: 'objeto_contrato' }]
    });

    expect(result.success).toBe(false);
  });

  it('rejects duplicate rule ids', () => {
    const rule = {
      id: 'despido',
      when: { any: ['despedido'] },
      finding: {
        cited_provisions: ['Ley Federal del Trabajo, artículo 48'],
        conclusion: 'Despido',
        risk_level: 'high',
        recommended_actions: ['Acudir a conciliación']
      }
    };

    expect(() =>
      RuleTableSchema.parse({
        area: 'laboral',
        name: 'Laboral',
        rules: [rule, rule],
        fallback: { conclusion: 'Sin coincidencias', recommended_actions: ['Ampliar hechos'] }
      })
    ).toThrow(/duplicate rule id despido/);
  });
});
