export const DOCUMENT_TIME_ZONE = 'America/Mexico_City';

const longDate = new Intl.DateTimeFormat('es-MX', {
  timeZone: DOCUMENT_TIME_ZONE,
  day: 'numeric',
  month: 'long',
  year: 'numeric'
});

/** "15 de enero de 2024", as the date falls in Mexico City. */
export function formatSpanishLongDate(date: Date): string {
  const parts = longDate.formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((item) => item.type === type)?.value ?? '';
  return `${part('day')} de ${part('month')} de ${part('year')}`;
}
