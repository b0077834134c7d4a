import type { Step, ToolResult } from '../../core/job/types.js';
import { theme, INDENT, RULE_WIDTH } from './theme.js';

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

/** "2025-01-31T12:00:05.123Z" → "2025-01-31 12:00:05" */
export function formatTimestamp(iso: string): string {
  const m = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})/.exec(iso);
  return m ? `${m[1]} ${m[2]}` : iso;
}

export function padRight(str: string, width: number): string {
  const visible = stripAnsi(str).length;
  return visible >= width ? str : str + ' '.repeat(width - visible);
}

/** Cut to `max` visible characters, marking the cut with "...". */
export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return max <= 3 ? str.slice(0, max) : `${str.slice(0, max - 3)}...`;
}

/** A section banner:  ── Planning ──────────────────────── */
export function sectionBanner(name: string, width: number = RULE_WIDTH): string {
  const prefix = '── ';
  const suffixLen = Math.max(4, width - prefix.length - name.length - 1);
  return theme.dim(prefix) + theme.bold(name) + theme.dim(' ' + '─'.repeat(suffixLen));
}

/**
 * Draw a box with rounded corners around content lines.
 *
 * ```
 * ╭─── Title ─────────────────────────╮
 * │                                    │
 * │  content line                      │
 * │                                    │
 * ╰────────────────────────────────────╯
 * ```
 */
export function drawBox(title: string, lines: string[], width: number = RULE_WIDTH): string {
  const style = theme.box.border;
  const titleText = ` ${title} `;
  const topFillLen = Math.max(0, width - 2 - 3 - titleText.length);
  const topLine = style('╭───') + theme.box.title(titleText) + style('─'.repeat(topFillLen) + '╮');
  const bottomLine = style('╰' + '─'.repeat(width - 2) + '╯');
  const emptyLine = style('│') + ' '.repeat(width - 2) + style('│');

  const contentLines = lines.map((line) => {
    const padLen = Math.max(0, width - 4 - stripAnsi(line).length);
    return style('│') + '  ' + line + ' '.repeat(padLen) + style(' │');
  });

  return [topLine, emptyLine, ...contentLines, emptyLine, bottomLine].join('\n');
}

/** "  Status        running" */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

/** One line per step: "  ✔ 1. write_file  (12ms)" */
export function stepLine(step: Step): string {
  const retries = step.retryCount > 0 ? theme.dim(` [retry ${step.retryCount}]`) : '';
  const timing = step.result ? theme.dim(` (${formatMs(step.result.durationMs)})`) : '';
  return `${INDENT}${theme.stepIcon(step.status)} ${step.index + 1}. ${theme.bold(step.toolName)}${timing}${retries}`;
}

/** Short human summary of a tool result. */
export function resultSummary(result: ToolResult, max = 200): string {
  if (!result.ok) return `${result.error.kind}: ${truncate(result.error.message, max)}`;
  const payload = safeJson(result.payload, 0);
  return truncate(payload, max);
}

/** Strip ANSI escape codes (for width calculations). */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

export function safeJson(v: unknown, indent = 2): string {
  try {
    return JSON.stringify(v, null, indent) ?? 'null';
  } catch {
    return '"[unserializable]"';
  }
}
