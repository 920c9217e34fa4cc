/**
 * Plain-text formatting helpers shared by the commands.
 */

import chalk from 'chalk';
import type { Smell } from 'tokentrail-shared';

// Thresholds sit where one-decimal rounding reaches the next unit.
export function formatNumber(n: number): string {
  if (n >= 999_950) return (n / 1_000_000).toFixed(1) + 'M';
  if (n >= 999.5) return (n / 1_000).toFixed(1) + 'K';
  return Math.round(n).toLocaleString('en-US');
}

/** Signed variant of formatNumber: `+1.5K`, `-300`, `0`. */
export function formatDelta(n: number): string {
  if (n === 0) return '0';
  return (n > 0 ? '+' : '-') + formatNumber(Math.abs(n));
}

export function formatCost(n: number): string {
  return '$' + n.toFixed(2);
}

/** `0.8333` -> `83.3%` */
export function formatRatio(ratio: number): string {
  return (ratio * 100).toFixed(1) + '%';
}

/** `1h 02m`, `4m 05s`, `12s` */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.round(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  if (h > 0) return `${h}h ${String(m).padStart(2, '0')}m`;
  if (m > 0) return `${m}m ${String(s).padStart(2, '0')}s`;
  return `${s}s`;
}

/** Horizontal bar scaled to `max`; at least one cell for any non-zero value. */
export function bar(value: number, max: number, width = 30): string {
  if (max <= 0 || value <= 0) return '';
  return '█'.repeat(Math.max(1, Math.round((value / max) * width)));
}

export function severityColor(severity: Smell['severity']): (text: string) => string {
  switch (severity) {
    case 'high': return chalk.red;
    case 'warning': return chalk.yellow;
    case 'info': return chalk.cyan;
  }
}

/** Bold title followed by a dim rule. */
export function sectionHeader(title: string, width = 50): string {
  return chalk.bold(title) + '\n' + chalk.dim('─'.repeat(width)) + '\n';
}
