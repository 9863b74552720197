/**
 * Text escaping for iCalendar (RFC 5545 §3.3.11)
 *
 * In TEXT values these characters are escaped on output:
 *   \ → \\
 *   ; → \;
 *   , → \,
 *   newline (CRLF, LF or CR) → \n
 *
 * A colon is not escaped.
 */

/** Escape a value for use as a TEXT property value */
export function escapeText(s: string): string {
  return s
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n');
}

/**
 * Check whether a parameter value needs quoting (RFC 5545 §3.2).
 * Values containing `:`, `;` or `,` must be DQUOTE-wrapped.
 */
export function needsParamQuoting(value: string): boolean {
  return /[;:,]/.test(value);
}

/**
 * Quote a parameter value if necessary.
 * DQUOTE itself cannot appear in a parameter value; callers reject it first.
 */
export function quoteParamValue(value: string): string {
  if (!needsParamQuoting(value)) return value;
  return `"${value}"`;
}
