import { extractText, getDocumentProxy } from "unpdf";

export type ContentKind = "html" | "pdf" | "text";

export interface ExtractedContent {
  kind: ContentKind;
  text: string;
  title: string | null;
}

export interface ExtractedLink {
  url: string;
  text: string;
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  ndash: "-",
  mdash: "-",
  rsquo: "'",
  lsquo: "'",
  rdquo: '"',
  ldquo: '"',
  copy: "(c)",
  reg: "(R)",
  trade: "(TM)",
  hellip: "...",
};

const BLOCK_TAGS =
  /<\/?(p|div|section|article|header|footer|main|nav|aside|li|ul|ol|tr|table|h[1-6]|br|hr|blockquote|pre|dd|dt)\b[^>]*>/gi;

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-

const MAX_CODE_POINT = 0x10ffff;

// Out-of-range references decode to U+FFFD, as browsers do
function fromCodePoint(code: number): string {
  return Number.isFinite(code) && code <= MAX_CODE_POINT ? String.fromCodePoint(code) : "\uFFFD";
}

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#x") || entity.startsWith("#X")) {
      return fromCodePoint(parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith("#")) {
      return fromCodePoint(parseInt(entity.slice(1), 10));
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function collapseWhitespace(text: string): string {
  return text
    .split("\n")
    .map((line) => line.replace(/[ \t\f\v\r]+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

/**
 * Strips markup from an HTML fragment and returns readable text.
 */
export function htmlToText(html: string): string {
  const withoutNoise = html
    .replace(/<!--[\s\S]*?-->/g, " ")
    .replace(/<(script|style|noscript|svg|head|template)\b[\s\S]*?<\/\1\s*>/gi, " ");

  const withBreaks = withoutNoise.replace(BLOCK_TAGS, "\n");
  const stripped = withBreaks.replace(/<[^>]+>/g, " ");
  return collapseWhitespace(decodeEntities(stripped));
}

/**
 * Page title from `<title>`, falling back to the first `<h1>`.
 */
export function extractHtmlTitle(html: string): string | null {
  for (const pattern of [/<title[^>]*>([\s\S]*?)<\/title>/i, /<h1[^>]*>([\s\S]*?)<\/h1>/i]) {
    const match = html.match(pattern);
    const raw = match?.[1];
    if (raw) {
      const title = collapseWhitespace(decodeEntities(raw.replace(/<[^>]+>/g, " "))).replace(/\n/g, " ");
      if (title) return title;
    }
  }
  return null;
}

/**
 * Absolute http(s) links from `<a href>` tags, with tag-stripped link text.
 * Fragments are dropped; mailto:, tel: and javascript: links are skipped.
 */
export function extractLinks(html: string, baseUrl: string): ExtractedLink[] {
  const links: ExtractedLink[] = [];
  const anchorRegex = /<a\b[^>]*?\bhref\s*=\s*["']([^"']+)["'][^>]*>([\s\S]*?)<\/a>/gi;
  let match: RegExpExecArray | null = null;

  while ((match = anchorRegex.exec(html)) !== null) {
    const href = (match[1] ?? "").trim();
    if (!href || /^(mailto|tel|javascript):/i.test(href)) continue;

    let resolved: URL;
    try {
      resolved = new URL(decodeEntities(href), baseUrl);
    } catch {
      continue;
    }
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") continue;
    resolved.hash = "";

    const text = htmlToText(match[2] ?? "").replace(/\n/g, " ");
    links.push({ url: resolved.toString(), text });
  }

  return links;
}

function hasPdfMagic(body: Uint8Array): boolean {
  return PDF_MAGIC.every((byte, i) => body[i] === byte);
}

/**
 * Decides how a body should be read from its content-type header, the URL
 * extension and, as a last resort, the PDF magic bytes.
 * Returns null for binary types the extractor cannot read.
 */
export function detectContentKind(
  body: Uint8Array,
  contentType: string | undefined,
  url: string
): ContentKind | null {
  const type = (contentType ?? "").toLowerCase();
  if (type.includes("pdf")) return "pdf";
  if (type.includes("html") || type.includes("xml")) return "html";
  if (type.startsWith("text/")) return "text";

  const path = (() => {
    try {
      return new URL(url).pathname.toLowerCase();
    } catch {
      return "";
    }
  })();
  if (path.endsWith(".pdf") || hasPdfMagic(body)) return "pdf";
  if (path.endsWith(".html") || path.endsWith(".htm")) return "html";
  if (path.endsWith(".txt") || path.endsWith(".md")) return "text";

  if (!type) {
    // No header at all: sniff for markup
    const head = new TextDecoder("utf-8").decode(body.subarray(0, 512)).trimStart().toLowerCase();
    if (head.startsWith("<!doctype html") || head.startsWith("<html")) return "html";
  }
  return null;
}

async function pdfToText(body: Uint8Array): Promise<string> {
  const pdf = await getDocumentProxy(new Uint8Array(body));
  const { text } = await extractText(pdf, { mergePages: true });
  return collapseWhitespace(text);
}

/**
 * Converts a fetched body to plain text plus a title. Returns null when the
 * content type is not supported; PDF parse failures propagate to the caller.
 */
export async function extractContent(
  body: Uint8Array,
  contentType: string | undefined,
  url: string
): Promise<ExtractedContent | null> {
  const kind = detectContentKind(body, contentType, url);
  if (!kind) return null;

  if (kind === "pdf") {
    const text = await pdfToText(body);
    const firstLine = text.split("\n").find((line) => line.trim().length > 0) ?? null;
    return { kind, text, title: firstLine ? firstLine.slice(0, 200) : null };
  }

  const raw = new TextDecoder("utf-8").decode(body);
  if (kind === "html") {
    return { kind, text: htmlToText(raw), title: extractHtmlTitle(raw) };
  }
  return { kind, text: collapseWhitespace(raw), title: null };
}
