const PII_KEYS = new Set([
  'password',
  'token',
  'email',
  'phone',
  'telefono',
  'curp',
  'rfc',
  'nombre',
  'domicilio',
  'poderdante',
  'apoderado',
  'testador',
  'renderedText',
  'sections',
  // Case narratives.
  'facts',
  'legalQuestion',
  'situation',
  'contractTerms',
  'hechos',
  'prestaciones'
]);

// Party names, addresses and personal details in document fields: quejoso_nombre,
// demandado_domicilio, parte_2_datos and so on.
const PII_KEY_SUFFIX = /_(nombre|domicilio|datos)$/;

const EMAIL_REGEX = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i;
const PHONE_REGEX = /\+?\d{1,3}?[\s.-]?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}/;
const CURP_REGEX = /\b[A-Z]{4}\d{6}[HM][A-Z]{5}[A-Z0-9]\d\b/i;
const RFC_REGEX = /\b[A-ZÑ&]{3,4}\d{6}[A-Z0-9]{3}\b/i;

export const REDACTED = '[REDACTED]';

function isSensitiveKey(key: string) {
  return PII_KEYS.has(key) || PII_KEY_SUFFIX.test(key);
}

export function redactPII(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactPII(item));
  }

  if (typeof value === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      redacted[key] = isSensitiveKey(key) ? REDACTED : redactPII(val);
    }
    return redacted;
  }

  if (typeof value === 'string') {
    if ([EMAIL_REGEX, PHONE_REGEX, CURP_REGEX, RFC_REGEX].some((pattern) => pattern.test(value))) {
      return REDACTED;
    }
  }

  return value;
}
