import MarkdownIt from "markdown-it";
import sanitizeHtml from "sanitize-html";

const markdown = new MarkdownIt({
  html: false,
  linkify: true,
  breaks: true,
  typographer: true,
});

const SANITIZE_OPTIONS: sanitizeHtml.IOptions = {
  allowedTags: [
    "h1",
    "h2",
    "h3",
    "h4",
    "p",
    "br",
    "hr",
    "blockquote",
    "ul",
    "ol",
    "li",
    "strong",
    "em",
    "a",
  ],
  allowedAttributes: {
    a: ["href", "title", "target", "rel"],
  },
  allowedSchemes: ["http", "https", "mailto"],
  transformTags: {
    a: sanitizeHtml.simpleTransform("a", {
      target: "_blank",
      rel: "noopener noreferrer nofollow",
    }),
  },
};

const HTML_HINT = /<(h[1-6]|p|ul|ol|li|strong|em|br)\b[^>]*>/i;

function normalizeHeadingTitle(value: string): string {
  return value
    .trim()
    .replace(/\s+/g, " ")
    .replace(/\s+#+\s*$/, "")
    .toLowerCase();
}

export function escapeHtml(value: string): string {
  return markdown.utils.escapeHtml(value);
}

export function looksLikeHtml(value: string): boolean {
  return HTML_HINT.test(value);
}

export function stripLeadingTitleHeading(markdownSource: string, title: string): string {
  const match = markdownSource.match(/^(\s*#\s+(.+?)\s*)\n+/);
  if (!match) {
    return markdownSource;
  }

  const headingText = match[2] ?? "";
  if (normalizeHeadingTitle(headingText) !== normalizeHeadingTitle(title)) {
    return markdownSource;
  }

  return markdownSource.slice(match[0].length);
}

export function renderMarkdownToSafeHtml(markdownSource: string): string {
  const rendered = markdown.render(markdownSource);
  return sanitizeHtml(rendered, SANITIZE_OPTIONS);
}

export function sanitizeFragment(html: string): string {
  return sanitizeHtml(html, SANITIZE_OPTIONS).trim();
}

/** Plain text with tags removed and whitespace collapsed. */
export function toPlainText(value: string): string {
  const spaced = value.replace(/<\/(?:p|h[1-6]|li|div)>|<br\s*\/?>/gi, (tag) => `${tag} `);
  return sanitizeHtml(spaced, { allowedTags: [], allowedAttributes: {} })
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, "&")
    .replace(/\s+/g, " ")
    .trim();
}
