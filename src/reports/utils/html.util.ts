const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (text: string): string =>
  text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

/**
 * JSON seguro para incrustar dentro de un <script>
 */
export const toScriptJson = (value: unknown): string =>
  JSON.stringify(value).replace(/</g, '\\u003c');
