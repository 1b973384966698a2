export const LEGAL_DISCLAIMER =
  'Este resultado es orientativo y se obtiene por coincidencia de palabras clave contra una base de conocimiento fija. ' +
  'No constituye asesoría jurídica, no garantiza la vigencia de las disposiciones citadas y no sustituye la opinión de un abogado con cédula profesional.';

export const DOCUMENT_NOTICE =
  'Documento generado a partir de un formato estructural. Debe ser revisado por un profesional del derecho antes de su presentación o firma.';

export function withDisclaimer<T extends object>(value: T): T & { disclaimer: string } {
  return { ...value, disclaimer: LEGAL_DISCLAIMER };
}
