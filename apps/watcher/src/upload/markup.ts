import { isUtf8 } from "node:buffer";

import { XMLValidator } from "fast-xml-parser";

export const MIN_CONTENT_BYTES = 50;

const ACCEPTED_ENCODINGS = new Set(["utf-8", "utf8", "us-ascii", "ascii"]);
const DECLARED_ENCODING = /^(?:\xEF\xBB\xBF)?<\?xml\s[^>]*?\bencoding\s*=\s*["']([^"']+)["']/;
const XML_WHITESPACE = /^[ \t\r\n]*$/;

export type MarkupVerdict =
  | { ok: true }
  | { ok: false; reason: "too_small" | "malformed"; detail?: string };

// Only the head is inspected, decoded as latin1 so every byte (BOM included) maps to one char.
function declaredEncoding(content: Buffer): string | undefined {
  const head = content.subarray(0, 256).toString("latin1");
  const match = DECLARED_ENCODING.exec(head);
  return match?.[1];
}

export function validateMarkup(content: Buffer): MarkupVerdict {
  if (content.length < MIN_CONTENT_BYTES) {
    return { ok: false, reason: "too_small" };
  }

  const encoding = declaredEncoding(content);
  if (encoding !== undefined && !ACCEPTED_ENCODINGS.has(encoding.toLowerCase())) {
    return { ok: false, reason: "malformed", detail: `unsupported_encoding:${encoding}` };
  }
  if (!isUtf8(content)) {
    return { ok: false, reason: "malformed", detail: "invalid_utf8" };
  }

  const result = XMLValidator.validate(content.toString("utf8"), { allowBooleanAttributes: true });
  if (result === true) return { ok: true };
  return {
    ok: false,
    reason: "malformed",
    detail: `${result.err.msg} (line ${result.err.line}, col ${result.err.col})`,
  };
}

function indexAfter(content: string, marker: string, from: number): number {
  const idx = content.indexOf(marker, from);
  if (idx === -1) throw new Error(`markup_minify_failed:unterminated:${marker}`);
  return idx + marker.length;
}

// End of a start/end tag, skipping `>` inside quoted attribute values.
function tagEnd(content: string, start: number): number {
  let quote = "";
  for (let i = start + 1; i < content.length; i += 1) {
    const ch = content[i];
    if (quote) {
      if (ch === quote) quote = "";
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === ">") {
      return i + 1;
    }
  }
  throw new Error("markup_minify_failed:unterminated:tag");
}

// `<!DOCTYPE ...>` may carry an internal subset in brackets.
function declarationEnd(content: string, start: number): number {
  let quote = "";
  let depth = 0;
  for (let i = start + 2; i < content.length; i += 1) {
    const ch = content[i];
    if (quote) {
      if (ch === quote) quote = "";
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "[") {
      depth += 1;
    } else if (ch === "]") {
      depth -= 1;
    } else if (ch === ">" && depth <= 0) {
      return i + 1;
    }
  }
  throw new Error("markup_minify_failed:unterminated:declaration");
}

/**
 * Drops comments and whitespace-only text between markup. Tags, text, CDATA
 * and processing instructions are copied exactly as written.
 */
export function minifyMarkup(content: string): string {
  const validation = XMLValidator.validate(content, { allowBooleanAttributes: true });
  if (validation !== true) {
    throw new Error(`markup_minify_failed:${validation.err.msg}`);
  }

  let out = "";
  let i = 0;
  while (i < content.length) {
    if (content[i] !== "<") {
      const next = content.indexOf("<", i);
      const end = next === -1 ? content.length : next;
      const text = content.slice(i, end);
      if (!XML_WHITESPACE.test(text)) out += text;
      i = end;
      continue;
    }

    if (content.startsWith("<!--", i)) {
      i = indexAfter(content, "-->", i + 4);
      continue;
    }

    let end: number;
    if (content.startsWith("<![CDATA[", i)) end = indexAfter(content, "]]>", i + 9);
    else if (content.startsWith("<?", i)) end = indexAfter(content, "?>", i + 2);
    else if (content.startsWith("<!", i)) end = declarationEnd(content, i);
    else end = tagEnd(content, i);

    out += content.slice(i, end);
    i = end;
  }
  return out;
}
