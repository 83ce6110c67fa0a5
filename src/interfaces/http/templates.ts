import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * JSON literal safe to embed inside a <script> element.
 */
export function toScriptLiteral(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

/**
 * Substitutes `{{name}}` placeholders. Values are inserted verbatim;
 * callers escape for the context they land in. Unknown placeholders are
 * left as they are.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{\s*([a-z_]+)\s*\}\}/g, (match, name: string) => values[name] ?? match);
}

/** Reads a template from disk on every call, so edits show up without a restart. */
export function loadTemplate(staticDir: string, name: string): string {
  return readFileSync(resolve(staticDir, name), 'utf-8');
}

export function renderDashboardShell(staticDir: string, initialLocation: string): string {
  return renderTemplate(loadTemplate(staticDir, 'index.html'), {
    initial_location: toScriptLiteral(initialLocation),
  });
}

export interface ErrorPageDetails {
  message: string;
  trace: string;
  method: string;
  url: string;
}

export function renderErrorPage(staticDir: string, details: ErrorPageDetails): string {
  return renderTemplate(loadTemplate(staticDir, 'error.html'), {
    message: escapeHtml(details.message),
    trace: escapeHtml(details.trace),
    method: escapeHtml(details.method),
    url: escapeHtml(details.url),
  });
}
