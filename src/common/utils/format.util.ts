const pad = (value: number, length = 2): string =>
  String(value).padStart(length, '0');

/**
 * Formatea un instante en UTC como `YYYY-MM-DD HH:MM:SS`
 */
export const formatUtcDateTime = (date: Date): string =>
  `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
  `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;

/**
 * Igual que formatUtcDateTime pero sin segundos (`YYYY-MM-DD HH:MM`)
 */
export const formatUtcDateTimeShort = (date: Date): string =>
  formatUtcDateTime(date).slice(0, 16);

/**
 * Hora local con milisegundos: `YYYY-MM-DD HH:MM:SS.mmm`
 * Usado para las entradas del action log.
 */
export const formatLocalTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.` +
  pad(date.getMilliseconds(), 3);
