import chalk, { type ChalkInstance } from 'chalk';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,

  // Symbols
  check: chalk.green('✔'),
  cross: chalk.red('✖'),
  bullet: chalk.dim('•'),
  arrow: chalk.dim('→'),

  // Each role gets its own color in the activity stream.
  role: (name: string): ChalkInstance => {
    const map: Record<string, ChalkInstance> = {
      tester: chalk.cyan,
      developer: chalk.yellow,
      reviewer: chalk.magenta,
      architect: chalk.blue,
      engine: chalk.white
    };
    return map[name.toLowerCase()] ?? chalk.white;
  },

  // Task states, for status tables.
  state: (state: string): ChalkInstance => {
    if (state === 'Committed') return chalk.green;
    if (state === 'Aborted' || state === 'ChecksFailed') return chalk.red;
    if (state === 'Queued') return chalk.dim;
    return chalk.yellow;
  },

  // Gate chrome
  gate: {
    border: chalk.cyan,
    title: chalk.bold.cyan,
    label: chalk.bold
  }
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules and box drawing. */
export const RULE_WIDTH = 64;

/** Minimum column width for role labels in the activity stream. */
export const ROLE_LABEL_WIDTH = 12;
