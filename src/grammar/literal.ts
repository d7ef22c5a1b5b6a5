const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  r: '\r',
  n: '\n',
  t: '\t',
  '0': '\0',
  "'": "'",
};

const HEX = /^[0-9a-fA-F]+$/;

function isScalarValue(value: number): boolean {
  return value <= 0x10ffff && (value < 0xd800 || value > 0xdfff);
}

/**
 * Decode the escape syntax of a grammar literal into the runtime text it denotes.
 * Returns `null` for anything the grammar syntax does not allow.
 */
export function unescape(raw: string): string | null {
  const chars = Array.from(raw);
  let result = '';
  let i = 0;

  while (i < chars.length) {
    const c = chars[i++];
    if (c !== '\\') {
      result += c;
      continue;
    }

    if (i >= chars.length) return null;
    const escape = chars[i++];

    if (escape in SIMPLE_ESCAPES) {
      result += SIMPLE_ESCAPES[escape];
      continue;
    }

    if (escape === 'x') {
      const digits = chars.slice(i, i + 2).join('');
      if (digits.length !== 2 || !HEX.test(digits)) return null;
      i += 2;
      result += String.fromCharCode(parseInt(digits, 16));
      continue;
    }

    if (escape === 'u') {
      if (chars[i] !== '{') return null;
      i++;

      let digits = '';
      while (i < chars.length && chars[i] !== '}') {
        digits += chars[i++];
      }
      if (i >= chars.length) return null; // no closing brace
      if (digits.length < 2 || digits.length > 6 || !HEX.test(digits)) return null;
      i++;

      const value = parseInt(digits, 16);
      if (!isScalarValue(value)) return null;
      result += String.fromCodePoint(value);
      continue;
    }

    return null;
  }

  return result;
}

/** Decode a range bound. Only the first code point of the decoded text is used. */
export function unescapeChar(raw: string): string | null {
  const decoded = unescape(raw);
  if (decoded === null) return null;
  const codePoints = Array.from(decoded);
  return codePoints.length > 0 ? codePoints[0] : null;
}
