/**
 * Markdown escape utilities for the attendance report.
 *
 * Attendee labels and meeting topics are typed by meeting participants and
 * may contain anything: terminal codes, HTML, pipes, emphasis markers.
 * They are escaped before interpolation into rendered markdown.
 */

// ── ANSI Escape Codes ────────────────────────────────────────────────────────

// eslint-disable-next-line no-control-regex
const ANSI_RE = /\x1B(?:\[[0-9;]*[A-Za-z]|\][^\x07\x1B]*(?:\x07|\x1B\\)|\([A-B0-2]|[>=N~])/g;

/** Strip ANSI terminal formatting codes (bold, color, cursor, etc.) */
export function stripAnsi(text: string): string {
	return text.replace(ANSI_RE, "");
}

// ── HTML Tag Escaping ────────────────────────────────────────────────────────

export function escapeHtml(text: string): string {
	return text.replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

// ── Composite Escape Functions ───────────────────────────────────────────────

/**
 * Escape text for a markdown bullet item or paragraph: ANSI codes, HTML
 * tags, emphasis and code markers. Line breaks collapse to spaces.
 */
export function escapeForMarkdown(text: string): string {
	let s = stripAnsi(text);
	s = escapeHtml(s);
	s = s.replace(/([\\`*_[\]])/g, "\\$1");
	return s.replace(/\s*[\r\n]+\s*/g, " ");
}

/** escapeForMarkdown plus `|`, which would split a table column. */
export function escapeForTableCell(text: string): string {
	return escapeForMarkdown(text).replace(/\|/g, "\\|");
}
