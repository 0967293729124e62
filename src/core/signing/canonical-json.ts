import { JsonValue } from '../interfaces/common.types';

const NON_ASCII = /[\u007f-\uffff]/g;

function escapeNonAscii(serialized: string): string {
  return serialized.replace(
    NON_ASCII,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`,
  );
}

/**
 * Serialize a JSON value with sorted keys and no whitespace, the form AdCP
 * agents sign. DEL and non-ASCII characters are emitted as lowercase
 * `\uXXXX` escapes. Numbers are written as JSON.stringify writes them, so `1.0`
 * becomes `1`.
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== 'object') {
    return escapeNonAscii(JSON.stringify(value));
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }

  // Keys holding undefined are dropped, as JSON.stringify does
  const members = Object.keys(value)
    .filter((key) => value[key] !== undefined)
    .sort()
    .map((key) => `${escapeNonAscii(JSON.stringify(key))}:${canonicalJson(value[key])}`);
  return `{${members.join(',')}}`;
}
