/**
 * Lenient text decoding shared by the `encoding` strategies of the read tools.
 */

export type TextEncodingName = 'utf-8' | 'latin1';

// A leading byte-order mark is kept; callers that parse decide what to do with it
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Decode as UTF-8, falling back to latin1 for bytes that are not valid UTF-8. */
export function decodeLenient(bytes: Uint8Array): {
  text: string;
  encoding: TextEncodingName;
} {
  try {
    return { text: utf8.decode(bytes), encoding: 'utf-8' };
  } catch {
    return { text: Buffer.from(bytes).toString('latin1'), encoding: 'latin1' };
  }
}
