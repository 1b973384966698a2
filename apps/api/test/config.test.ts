import { describe, expect, it } from 'vitest';

import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      logLevel: 'info',
      legalContentDir: undefined,
      disabledAreas: [],
      disabledDocumentTypes: []
    });
  });

  it('reads overrides and splits kill-switch lists', () => {
    const config = loadConfig({
      PORT: '8080',
      LOG_LEVEL: 'debug',
      LEGAL_CONTENT_DIR: '/srv/contenido',
      DISABLED_LEGAL_AREAS: 'fiscal, penal ,',
      DISABLED_DOCUMENT_TYPES: 'will'
    });

    expect(config).toEqual({
      port: 8080,
      logLevel: 'debug',
      legalContentDir: '/srv/contenido',
      disabledAreas: ['fiscal', 'penal'],
      disabledDocumentTypes: ['will']
    });
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow();
  });
});
