/**
 * Per-entry encoders for `toText`.
 */

import type { EntryEncoder } from "./types.js";

/** One line per record; emphasized records are wrapped in `**`. */
export const textEncoder: EntryEncoder = (record, emphasized) =>
  emphasized ? `**${record.renderedForm}**\n` : `${record.renderedForm}\n`;

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** HTML fragment per record; emphasized records are bold. */
export const htmlEncoder: EntryEncoder = (record, emphasized) => {
  const body = escapeHtml(record.renderedForm);
  return emphasized ? `<b>${body}</b><br>\n` : `${body}<br>\n`;
};
