/**
 * Response body decoding
 */

import { detect } from "chardet";

const FALLBACK_ENCODING = "utf-8";

export interface DecodedBody {
  text: string;
  encoding: string;
}

/**
 * Extract the charset parameter from a Content-Type header value
 */
export function charsetFromContentType(contentType: string | null): string | null {
  if (!contentType) return null;
  const match = contentType.match(/;\s*charset\s*=\s*("?)([^";\s]+)\1/i);
  return match ? match[2].toLowerCase() : null;
}

/**
 * Decode raw bytes to text.
 * Uses the charset the server declared; otherwise guesses it from the bytes.
 */
export function decodeBody(bytes: Uint8Array, contentType: string | null): DecodedBody {
  const declared = charsetFromContentType(contentType);
  const encoding = declared ?? detect(bytes)?.toLowerCase() ?? FALLBACK_ENCODING;

  try {
    return { text: new TextDecoder(encoding).decode(bytes), encoding };
  } catch {
    // Label TextDecoder does not know (e.g. "x-user-defined-foo")
    return {
      text: new TextDecoder(FALLBACK_ENCODING).decode(bytes),
      encoding: FALLBACK_ENCODING,
    };
  }
}
