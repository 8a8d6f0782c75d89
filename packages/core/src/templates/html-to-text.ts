const SCRIPT_OR_STYLE = /<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const LINE_BREAK = /<br\s*\/?>/gi;
const PARAGRAPH_END = /<\/p\s*>/gi;
const DIV_END = /<\/div\s*>/gi;
const ANY_TAG = /<[^>]+>/g;

/**
 * Plain-text fallback for an HTML body. Entities are left as written.
 */
export const htmlToText = (html: string): string =>
  html
    .replace(SCRIPT_OR_STYLE, '')
    .replace(LINE_BREAK, '\n')
    .replace(PARAGRAPH_END, '\n\n')
    .replace(DIV_END, '\n')
    .replace(ANY_TAG, '')
    .replace(/\n\s*\n/g, '\n\n')
    .replace(/[ \t]+/g, ' ')
    .trim();
