import { parse, HTMLElement } from "node-html-parser";

/** Tried in order; the first match is the article body. */
const CONTENT_SELECTORS = [
  ".entry-content",
  ".post-content",
  ".article-content",
  "article",
  ".content",
  "#content",
];

const BLOCK_SELECTOR = "p, ul, ol, h2, h3, h4, h5, h6";

/** Paragraphs this short are captions, bylines and buttons. */
const MIN_PARAGRAPH_LENGTH = 20;

function cleanText(el: HTMLElement): string {
  return el.text.replace(/\s+/g, " ").trim();
}

function listItems(list: HTMLElement): string[] {
  const items: string[] = [];
  for (const child of list.childNodes) {
    if (child instanceof HTMLElement && child.tagName === "LI") {
      const text = cleanText(child);
      if (text) items.push(`• ${text}`);
    }
  }
  return items;
}

/**
 * Reduces a news page to plain text: the first h1, then headings, list items
 * and paragraphs of the article container in document order.
 */
export function extractArticleText(html: string): string {
  const root = parse(html);

  const container =
    CONTENT_SELECTORS.map((selector) => root.querySelector(selector)).find(
      (el): el is HTMLElement => el !== null,
    ) ??
    root.querySelector("body") ??
    root;

  const blocks: string[] = [];

  const title = root.querySelector("h1");
  if (title) {
    const text = cleanText(title);
    if (text) blocks.push(text);
  }

  for (const el of container.querySelectorAll(BLOCK_SELECTOR)) {
    switch (el.tagName) {
      case "UL":
      case "OL": {
        const items = listItems(el);
        if (items.length > 0) blocks.push(items.join("\n"));
        break;
      }
      case "P": {
        const text = cleanText(el);
        if (text.length > MIN_PARAGRAPH_LENGTH) blocks.push(text);
        break;
      }
      default: {
        const text = cleanText(el);
        if (text) blocks.push(text);
      }
    }
  }

  return blocks.join("\n\n");
}
