import { describe, expect, it } from 'vitest';

import { expandPartials, interpolate, listPartials, listPlaceholders } from './template-syntax';

describe('template syntax', () => {
  it('lists placeholders and partials separately', () => {
    const text = '{{> encabezado}}\n{{ nombre }} y {{fecha_generacion}}';

    expect(listPlaceholders(text)).toEqual(['nombre', 'fecha_generacion']);
    expect(listPartials(text)).toEqual(['encabezado']);
  });

  it('expands partials before placeholders are filled', () => {
    const expanded = expandPartials('{{> firma}}', () => 'Firma: {{nombre}}');

    expect(interpolate(expanded, { nombre: 'Ana López' })).toBe('Firma: Ana López');
  });

  it('substitutes in a single pass and blanks unknown keys', () => {
    expect(interpolate('{{a}}|{{b}}|{{c}}', { a: '{{b}}', b: '$1' })).toBe('{{b}}|$1|');
  });
});
