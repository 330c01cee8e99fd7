/**
 * String literal escape decoding
 */

/**
 * Decode the escape sequences of a raw string literal body.
 *
 * Recognized: `\n`, `\t`, `\r`, `\0`, `\\`, `\"` and `\u{hex}`. Any other
 * escaped character stands for itself. Returns null when a `\u{...}`
 * sequence is malformed.
 */
export function unescape(raw: string): string | null {
  let str = '';

  for (let i = 0; i < raw.length; i++) {
    const c = raw[i];
    if (c !== '\\') {
      str += c;
      continue;
    }

    i++;
    if (i >= raw.length) {
      return null;
    }

    const e = raw[i];
    switch (e) {
      case 'n': str += '\n'; break;
      case 't': str += '\t'; break;
      case 'r': str += '\r'; break;
      case '0': str += '\0'; break;
      case 'u': {
        const close = raw.indexOf('}', i);
        if (raw[i + 1] !== '{' || close < 0) {
          return null;
        }
        const hex = raw.substring(i + 2, close);
        const code = parseInt(hex, 16);
        if (!/^[0-9a-fA-F]{1,6}$/.test(hex) || code > 0x10ffff) {
          return null;
        }
        str += String.fromCodePoint(code);
        i = close;
        break;
      }
      default: str += e; break;
    }
  }

  return str;
}

/**
 * Inverse of {@link unescape}: quote a decoded string for printing
 */
export function escape(value: string): string {
  let str = '"';

  for (const c of value) {
    switch (c) {
      case '\n': str += '\\n'; break;
      case '\t': str += '\\t'; break;
      case '\r': str += '\\r'; break;
      case '\0': str += '\\0'; break;
      case '\\': str += '\\\\'; break;
      case '"': str += '\\"'; break;
      default: str += c; break;
    }
  }

  return str + '"';
}
