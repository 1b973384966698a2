import path from 'path';
import { describe, expect, it } from 'vitest';

import { LEGAL_DISCLAIMER, LegalEngineError } from '@juridico/shared';

import { AreaClassifier } from './classifier';
import { LegalContentLibrary } from './loader';

const CONTENT_DIR = path.resolve(__dirname, '..', 'content');
const classifier = new AreaClassifier(new LegalContentLibrary({ basePath: CONTENT_DIR }));

describe('AreaClassifier', () => {
  it('picks the area with the most keyword hits', () => {
    const result = classifier.classify(['El empleado fue despedido y no le pagaron su salario']);

    expect(result).toEqual({
      area: 'laboral',
      matchedKeywords: ['empleado', 'salario', 'despedido'],
      defaulted: false,
      disclaimer: LEGAL_DISCLAIMER
    });
  });

  it('breaks ties in table order', () => {
    const result = classifier.classify(['Hay un contrato y un delito']);

    expect(result.area).toBe('civil');
    expect(result.matchedKeywords).toEqual(['contrato']);
  });

  it('defaults to civil when nothing matches', () => {
    const result = classifier.classify(['El cielo es azul'], '¿?');

    expect(result.area).toBe('civil');
    expect(result.defaulted).toBe(true);
    expect(result.matchedKeywords).toEqual([]);
  });

  it('skips disabled areas', () => {
    const restricted = new AreaClassifier(
      new LegalContentLibrary({ basePath: CONTENT_DIR, disabledAreas: ['laboral'] })
    );

    const result = restricted.classify(['El empleado fue despedido y no le pagaron su salario']);
    expect(result.area).toBe('civil');
    expect(result.defaulted).toBe(true);
  });

  it('fails with EmptyFactSet on blank input', () => {
    expect(() => classifier.classify(['  '], ' ')).toThrow(LegalEngineError);
  });
});
