import { Marked } from 'marked';
import { markedHighlight } from 'marked-highlight';
import markedFootnote from 'marked-footnote';
import hljs from 'highlight.js';

const HTML_MARKER = /<(html|head|body)[\s>]/i;

const markdown = new Marked(
  markedHighlight({
    langPrefix: 'hljs language-',
    highlight(code, lang) {
      const language = hljs.getLanguage(lang) ? lang : 'plaintext';
      return hljs.highlight(code, { language }).value;
    },
  }),
  markedFootnote(),
);

/**
 * True when the body already carries an `<html>`, `<head>` or `<body>` tag and
 * must be sent unmodified.
 */
export function isHtmlDocument(body: string): boolean {
  return HTML_MARKER.test(body);
}

/**
 * Renders markdown to HTML with GFM tables, footnotes and highlighted code blocks.
 */
export function renderMarkdown(source: string): string {
  const html = markdown.parse(source, { async: false });
  if (typeof html !== 'string') {
    throw new Error('Markdown renderer unexpectedly returned a promise');
  }
  return html;
}

export interface RenderedBody {
  html: string;
  renderedFromMarkdown: boolean;
}

export function toHtml(body: string): RenderedBody {
  if (isHtmlDocument(body)) {
    return { html: body, renderedFromMarkdown: false };
  }
  return { html: renderMarkdown(body), renderedFromMarkdown: true };
}
