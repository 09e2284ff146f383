/**
 * HTML Utilities
 * Helpers for rendering values into the page templates.
 */

/** Shown wherever a metadata field is missing. */
export const PLACEHOLDER = "—";

/**
 * Escapes special HTML characters for text and attribute positions.
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Escaped value, or the placeholder when empty.
 */
export function textOrPlaceholder(value: string | undefined): string {
  return value ? escapeHtml(value) : PLACEHOLDER;
}
