/**
 * CLI output formatter with picocolors
 */

import pc from 'picocolors';
import type { GlobalOptions } from '../utils/global-options.js';

let colors: ReturnType<typeof pc.createColors> = pc;

/** Force colors on or off for every formatter below. */
export function configureColors(enabled: boolean): void {
  colors = pc.createColors(enabled);
}

export function formatSuccess(message: string): string {
  return colors.green(`OK ${message}`);
}

export function formatWarning(message: string): string {
  return colors.yellow(`WARN ${message}`);
}

export function formatError(message: string): string {
  return colors.red(`Error: ${message}`);
}

export function formatHint(message: string): string {
  return colors.cyan(`Hint: ${message}`);
}

export function formatDim(text: string): string {
  return colors.dim(text);
}

export function formatBold(text: string): string {
  return colors.bold(text);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

export function shouldUseColor(globals: GlobalOptions): boolean {
  if (globals.noColor) return false;
  if (process.env['NO_COLOR']) return false;
  if (!process.stdout.isTTY) return false;
  return true;
}
