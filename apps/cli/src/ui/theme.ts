/**
 * Color semantics and formatting helpers
 */

import chalk from 'chalk';

export interface Colors {
  success: (text: string) => string;
  error: (text: string) => string;
  warning: (text: string) => string;
  muted: (text: string) => string;
  highlight: (text: string) => string;
}

const noOp = (text: string): string => text;

/**
 * Create color functions, falling back to plain text when colors are off
 */
export function createColors(useColors: boolean): Colors {
  if (!useColors) {
    return {
      success: noOp,
      error: noOp,
      warning: noOp,
      muted: noOp,
      highlight: noOp,
    };
  }

  return {
    success: chalk.green,
    error: chalk.red,
    warning: chalk.yellow,
    muted: chalk.dim,
    highlight: chalk.bold.white,
  };
}

/**
 * Colors are used when stdout supports them and NO_COLOR is unset
 */
export function shouldUseColors(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env['NO_COLOR'] !== undefined) {
    return false;
  }
  return chalk.level > 0;
}

export const symbols = {
  success: '✔',
  error: '✖',
  warning: '⚠',
  bullet: '•',
} as const;

/**
 * Format count with singular/plural
 */
export function formatCount(count: number, singular: string, plural?: string): string {
  const p = plural ?? `${singular}s`;
  return `${count} ${count === 1 ? singular : p}`;
}
