/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI wrappers for styling command output, plus the small formatters the
 * commands share. Colour is dropped when NO_COLOR is set (https://no-color.org),
 * checked on every call so tests and pipes can switch it off.
 *
 * ```typescript
 * import { bold, green } from './terminal';
 *
 * io.out(bold('Student Profile'));
 * io.out(green('Recorded review session'));
 * ```
 */

/**
 * Where command output goes. The default writes to stdout and stderr.
 */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function colorEnabled(): boolean {
  return process.env.NO_COLOR === undefined || process.env.NO_COLOR === '';
}

function style(open: string): (s: string) => string {
  return (s) => (colorEnabled() ? `\x1b[${open}m${s}\x1b[0m` : s);
}

// =============================================================================
// Text Style Modifiers
// =============================================================================

/** Headings and key values. */
export const bold = style('1');

/** Secondary information such as ids and hints. */
export const dim = style('2');

// =============================================================================
// Color Functions
// =============================================================================

/** Success messages and new topics. */
export const green = style('32');

/** Warnings and overdue counts. */
export const yellow = style('33');

/** Errors. */
export const red = style('31');

/** Section titles. */
export const cyan = style('36');

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * A horizontal rule, e.g. `──────────`.
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * `label: value` indented under a heading.
 */
export function formatField(label: string, value: string): string {
  return `  ${label}: ${value}`;
}

/**
 * "1 day" / "3 days".
 */
export function plural(count: number, singular: string, pluralForm: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/**
 * Formats an easiness factor to two decimals.
 */
export function formatEasiness(value: number): string {
  return value.toFixed(2);
}

export function printHeading(io: CliIO, title: string, width: number = 50): void {
  io.out(bold(cyan(title)));
  io.out(formatSeparator(width));
}
