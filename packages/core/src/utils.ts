// Utility functions for JSON Pointer paths and value helpers

import { Numeric } from './numeric.js';
import { Ref } from './reference.js';

/**
 * Encode a JSON Pointer segment (escape ~ and /)
 * @param segment Segment to encode
 * @returns Encoded segment
 */
function encodePointerSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Append a segment to a JSON Pointer path
 * @param path Current path
 * @param segment Segment to append
 * @returns New path with segment appended
 */
export function appendPath(path: string, segment: string | number): string {
  return path + '/' + encodePointerSegment(String(segment));
}

/**
 * Short printable form of a value for mismatch records
 */
export function preview(value: unknown, maxLength = 60): string {
  let text: string;
  if (typeof value === 'string') {
    text = JSON.stringify(value);
  } else if (typeof value === 'bigint') {
    text = `${value}n`;
  } else if (typeof value === 'symbol' || typeof value === 'function') {
    text = value.toString();
  } else if (value instanceof Numeric || value instanceof Ref) {
    text = value.toString();
  } else if (value instanceof Uint8Array) {
    text = `bytes[${Array.from(value).join(' ')}]`;
  } else {
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      // Cycles and bigints nested in objects
      text = String(value);
    }
  }
  return text.length > maxLength ? text.slice(0, maxLength - 3) + '...' : text;
}
