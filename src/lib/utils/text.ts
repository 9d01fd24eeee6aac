/**
 * @fileoverview Byte-aware text helpers.
 * @module lib/utils/text
 */

/** UTF-8 continuation bytes look like 10xxxxxx. */
function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/**
 * Clamp a string to at most `maxBytes` bytes of UTF-8.
 * A code point that would be cut in half is dropped entirely,
 * so the result can be shorter than `maxBytes`.
 *
 * @example truncateUtf8('a'.repeat(500), 470).length → 470
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  const encoded = Buffer.from(text, 'utf8');
  if (encoded.length <= maxBytes) return text;

  let end = Math.max(0, maxBytes);
  // encoded[end] is the first byte left out; if it continues a sequence,
  // back off to that sequence's lead byte and leave it out too.
  while (end > 0 && isContinuationByte(encoded[end])) {
    end -= 1;
  }

  return encoded.subarray(0, end).toString('utf8');
}
