const HEX_32 = /^[0-9a-fA-F]{32}$/;

/**
 * Tells a canonical identifier apart from a human-readable name.
 * A canonical identifier is 32 hex digits once dashes are removed, so both
 * "01234567-89ab-cdef-0123-456789abcdef" and "0123456789abcdef0123456789abcdef" qualify.
 * Purely lexical: no lookup is made.
 */
export function isCanonicalId(value: string | null | undefined): boolean {
  if (!value) {
    return false;
  }
  const cleaned = value.replace(/-/g, '');
  return cleaned.length === 32 && HEX_32.test(cleaned);
}

