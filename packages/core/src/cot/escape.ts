const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
  '\t': '&#9;',
  '\n': '&#10;',
  '\r': '&#13;',
};

/**
 * Escape the five XML special characters, plus tab, CR and LF as character
 * references so they survive attribute-value normalization. Applied to every
 * attribute value and text node the codec writes.
 */
export function escapeXml(value: string): string {
  return value.replace(/[&<>"'\t\n\r]/g, (ch) => XML_ESCAPES[ch] ?? ch);
}
