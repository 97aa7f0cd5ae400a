import { PapercastError } from "../errors.js";

export type Reference = {
  title: string;
  url: string;
};

const LINE = /^\[(\d+)\]\s*(.+)\);$/;

function malformed(message: string, line: string, lineNumber: number): PapercastError {
  return new PapercastError("MALFORMED_MODEL_OUTPUT", message, { line, lineNumber });
}

/**
 * Strict parser for the synthesis layout, one reference per line:
 *
 *     [1] Attention Is All You Need(http://arxiv.org/abs/1706.03762v7);
 *
 * The title may also be written as `[title]` (markdown-link form). Blank lines
 * are skipped; any other line that does not match fails the whole reply.
 * @throws PapercastError MALFORMED_MODEL_OUTPUT
 */
export function parseReferences(reply: string): Reference[] {
  const references: Reference[] = [];
  const lines = reply.split(/\r?\n/);

  lines.forEach((raw, i) => {
    const line = raw.trim();
    if (!line) return;

    const match = LINE.exec(line);
    const body = match?.[2];
    if (!body) {
      throw malformed(`Reference line ${i + 1} does not match "[i] title(url);"`, line, i + 1);
    }

    const open = body.lastIndexOf("(");
    if (open === -1) {
      throw malformed(`Reference line ${i + 1} has no "(url)"`, line, i + 1);
    }
    let title = body.slice(0, open).trim();
    const url = body.slice(open + 1).trim();

    if (title.startsWith("[") && title.endsWith("]")) {
      title = title.slice(1, -1).trim();
    }
    if (!title) {
      throw malformed(`Reference line ${i + 1} has an empty title`, line, i + 1);
    }
    if (!/^https?:\/\/\S+$/.test(url)) {
      throw malformed(`Reference line ${i + 1} has an invalid url "${url}"`, line, i + 1);
    }

    references.push({ title, url });
  });

  if (references.length === 0) {
    throw new PapercastError("MALFORMED_MODEL_OUTPUT", "Reference reply lists no references", { reply });
  }
  return references;
}

export function formatReferences(references: Reference[]): string {
  return references.map((r, i) => `[${i + 1}] ${r.title}(${r.url});`).join("\n");
}
