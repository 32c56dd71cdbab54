export type CsvValue = string | number;

const NEEDS_QUOTING = /[",\r\n]/;

const escapeCsvValue = (value: CsvValue): string => {
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

/**
 * Arma un CSV (RFC 4180, fin de línea CRLF) con encabezado
 */
export const toCsv = (
  header: readonly string[],
  rows: readonly (readonly CsvValue[])[],
): string =>
  [header, ...rows].map((row) => row.map(escapeCsvValue).join(',') + '\r\n').join('');
