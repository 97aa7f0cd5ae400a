import { PapercastError } from "../errors.js";

export const KEYWORD_MARKER = "[query]";

/**
 * Parse a keyword-derivation reply of the form `[query]: k1, k2, k3`.
 *
 * The marker may be preceded by other text and followed by spaces before the
 * colon; only the remainder of the marker's line is read.
 * @throws PapercastError MALFORMED_MODEL_OUTPUT
 */
export function parseKeywords(reply: string): string[] {
  const markerAt = reply.indexOf(KEYWORD_MARKER);
  if (markerAt === -1) {
    throw new PapercastError("MALFORMED_MODEL_OUTPUT", `Keyword reply is missing the ${KEYWORD_MARKER} marker`, {
      reply
    });
  }

  const afterMarker = reply.slice(markerAt + KEYWORD_MARKER.length);
  const lineEnd = afterMarker.search(/\r?\n/);
  const line = (lineEnd === -1 ? afterMarker : afterMarker.slice(0, lineEnd)).trimStart();
  if (!line.startsWith(":")) {
    throw new PapercastError("MALFORMED_MODEL_OUTPUT", `Expected ':' after ${KEYWORD_MARKER}`, { reply });
  }

  const keywords = line
    .slice(1)
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0);

  if (keywords.length === 0) {
    throw new PapercastError("MALFORMED_MODEL_OUTPUT", "Keyword reply lists no keywords", { reply });
  }
  return keywords;
}
