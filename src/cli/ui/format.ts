import type { ChangeSet } from '../../core/changeset.js';
import { theme, INDENT, RULE_WIDTH, ROLE_LABEL_WIDTH } from './theme.js';

// ── Time Formatting ─────────────────────────────────────────────────────────

/**
 * Format milliseconds into a compact human-readable string.
 * Examples: "124ms", "3.2s", "1m 42s", "2h 15m"
 */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const m = Math.floor(totalSeconds / 60);
  const s = Math.round(totalSeconds % 60);
  if (m < 60) return s > 0 ? `${m}m ${s}s` : `${m}m`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return rm > 0 ? `${h}h ${rm}m` : `${h}h`;
}

/** "2026-10-18 14:03:22" from an ISO timestamp; the input unchanged when it does not parse. */
export function formatTimestamp(iso: string): string {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return iso;
  return d.toISOString().replace('T', ' ').slice(0, 19);
}

// ── Table Alignment ─────────────────────────────────────────────────────────

export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

/**
 * Format a role label at a fixed width for the activity stream.
 */
export function roleLabel(role: string, width: number = ROLE_LABEL_WIDTH): string {
  const color = theme.role(role);
  return color(theme.bold(padRight(role, width)));
}

// ── Horizontal Rules ────────────────────────────────────────────────────────

/**
 * A phase banner:  ── Run ────────────────────────
 */
export function phaseBanner(phaseName: string, width: number = RULE_WIDTH): string {
  const prefix = '── ';
  const label = phaseName.charAt(0).toUpperCase() + phaseName.slice(1);
  const suffixLen = Math.max(4, width - prefix.length - label.length - 1);
  const suffix = '─'.repeat(suffixLen);
  return theme.dim(prefix) + theme.bold(label) + theme.dim(' ' + suffix);
}

// ── Box Drawing ─────────────────────────────────────────────────────────────

/**
 * Draw a box with rounded corners around content lines.
 *
 * ```
 * ╭─── Title ─────────────────────────╮
 * │                                    │
 * │  content line 1                    │
 * │                                    │
 * ╰────────────────────────────────────╯
 * ```
 */
export function drawBox(title: string, lines: string[], width: number = RULE_WIDTH): string {
  const style = theme.gate.border;

  const titleText = ` ${title} `;
  const topFillLen = Math.max(0, width - 2 - 3 - titleText.length);
  const topLine = style('╭───') + theme.gate.title(titleText) + style('─'.repeat(topFillLen) + '╮');
  const bottomLine = style('╰' + '─'.repeat(width - 2) + '╯');
  const emptyLine = style('│') + ' '.repeat(width - 2) + style('│');

  const contentLines = lines.map((line) => {
    const padLen = Math.max(0, width - 4 - stripAnsi(line).length);
    return style('│') + '  ' + line + ' '.repeat(padLen) + style(' │');
  });

  return [topLine, emptyLine, ...contentLines, emptyLine, bottomLine].join('\n');
}

// ── Key-Value Formatting ────────────────────────────────────────────────────

/**
 * Format a label-value pair with alignment:
 * "  State       Committed"
 */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

// ── Verification Result Formatting ──────────────────────────────────────────

export interface VerificationLine {
  name: string;
  passed: boolean;
  detail?: string;
}

/**
 * Format a verification result line:
 *   ✔ lint                12ms
 *   ✖ test                exit 1
 */
export function verificationLine(item: VerificationLine, nameWidth: number = 20): string {
  const icon = item.passed ? theme.check : theme.cross;
  const name = padRight(item.name, nameWidth);
  const detail = item.detail ? theme.dim(item.detail) : '';
  return `${INDENT}${icon} ${name}${detail}`;
}

/** One line per changed path: "+12 -3  src/app.ts". */
export function changeSetLines(changeSet: ChangeSet, max: number = 12): string[] {
  const lines = changeSet.slice(0, max).map((e) => `${padRight(`+${e.additions} -${e.deletions}`, 10)}${e.path}`);
  if (changeSet.length > max) lines.push(theme.dim(`+${changeSet.length - max} more`));
  return lines;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Strip ANSI escape codes from a string (for width calculations).
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

export function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v, null, 2);
  } catch {
    return '"[unserializable]"';
  }
}
