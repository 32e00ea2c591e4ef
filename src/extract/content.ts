import * as cheerio from "cheerio";
import { getDocumentProxy, getMeta } from "unpdf";
import { ExtractionFailure, errorMessage } from "../errors.js";

export const MAX_SNIPPET_LENGTH = 5000;
export const MAX_PDF_PAGES = 3;
const MAX_HTML_WORDS = 1000;
const TEXT_ELEMENTS = "p, h1, h2, h3, article, div";

export interface ExtractedContent {
  title: string;
  snippet: string;
}

export type ContentKind = "pdf" | "html" | "unsupported";

export function detectContentKind(url: string, contentType: string): ContentKind {
  const type = contentType.toLowerCase();
  if (type.includes("pdf") || url.toLowerCase().split(/[?#]/)[0].endsWith(".pdf")) {
    return "pdf";
  }
  if (type.includes("html")) return "html";
  return "unsupported";
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Title plus the text of paragraph, heading, article and div elements, in
 * document order. Nested elements contribute their text once per match.
 */
export function extractHtml(html: string): ExtractedContent {
  const $ = cheerio.load(html);
  const title = normalizeWhitespace($("title").first().text()) || "No Title";

  $("script, style, noscript, nav, footer, svg").remove();
  // keep words in adjacent inline elements apart
  $("body *").prepend(" ").append(" ");

  const text = $(TEXT_ELEMENTS)
    .map((_, el) => normalizeWhitespace($(el).text()))
    .get()
    .filter((chunk) => chunk.length > 0)
    .join(" ");
  const words = text ? text.split(" ") : [];

  return {
    title,
    snippet: words.slice(0, MAX_HTML_WORDS).join(" ").slice(0, MAX_SNIPPET_LENGTH),
  };
}

/** Reads only the first MAX_PDF_PAGES pages, however long the document is. */
export async function extractPdf(bytes: Uint8Array): Promise<ExtractedContent> {
  const pdf = await getDocumentProxy(bytes);
  const pageCount = Math.min(MAX_PDF_PAGES, pdf.numPages);

  const pages: string[] = [];
  for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
    const page = await pdf.getPage(pageNumber);
    const { items } = await page.getTextContent();
    pages.push(
      items
        .map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : "") : ""))
        .join("")
    );
  }

  const snippet = pages.filter((page) => page.trim().length > 0).join("\n");

  const { info } = await getMeta(pdf);
  const rawTitle: unknown = info?.Title;

  return {
    title: typeof rawTitle === "string" ? rawTitle.trim() : "",
    snippet: (
      snippet || "PDF content extracted (text might be image-based or empty)."
    ).slice(0, MAX_SNIPPET_LENGTH),
  };
}

/** Title and a bounded text snippet. Throws ExtractionFailure on unparseable input. */
export async function extractContent(
  url: string,
  bytes: Uint8Array,
  contentType: string
): Promise<ExtractedContent> {
  const kind = detectContentKind(url, contentType);
  try {
    switch (kind) {
      case "pdf":
        return await extractPdf(bytes);
      case "html":
        return extractHtml(new TextDecoder().decode(bytes));
      case "unsupported":
        return { title: "Unknown Title", snippet: "Content type not HTML or PDF." };
    }
  } catch (error) {
    throw new ExtractionFailure(
      `Could not extract ${kind} content from ${url}: ${errorMessage(error)}`,
      error
    );
  }
}
