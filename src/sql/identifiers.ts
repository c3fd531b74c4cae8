const BARE_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Turn one raw header fragment into an identifier usable in generated SQL.
 *
 * Surrounding whitespace is stripped. A value that is already a bare
 * identifier is returned as is; anything else is wrapped in double quotes,
 * with embedded double quotes doubled.
 */
export function sanitizeIdentifier(raw: string): string {
  const trimmed = raw.trim();
  if (BARE_IDENTIFIER.test(trimmed)) {
    return trimmed;
  }
  return `"${trimmed.replace(/"/g, '""')}"`;
}

/**
 * `namespace.table`, each part passed through {@link sanitizeIdentifier}.
 */
export function qualifiedName(namespace: string, table: string): string {
  return `${sanitizeIdentifier(namespace)}.${sanitizeIdentifier(table)}`;
}
