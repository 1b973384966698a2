import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const csv = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean)
  );

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LEGAL_CONTENT_DIR: z.string().min(1).optional(),
  DISABLED_LEGAL_AREAS: csv,
  DISABLED_DOCUMENT_TYPES: csv
});

export type AppConfig = {
  port: number;
  logLevel: LogLevel;
  legalContentDir?: string;
  disabledAreas: string[];
  disabledDocumentTypes: string[];
};

export const APP_CONFIG = Symbol('APP_CONFIG');

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    legalContentDir: parsed.LEGAL_CONTENT_DIR,
    disabledAreas: parsed.DISABLED_LEGAL_AREAS,
    disabledDocumentTypes: parsed.DISABLED_DOCUMENT_TYPES
  };
}
