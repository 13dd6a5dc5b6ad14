import sanitizeHtml from "sanitize-html";

/**
 * Trims and strips unsafe markup (scripts, event handlers, javascript: links)
 * from free text. Formatting tags such as <b> or <p> survive.
 */
export function cleanText(value: string): string {
  return sanitizeHtml(value.trim()).trim();
}
