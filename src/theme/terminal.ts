// ANSI styles for the drill output. Disabled when colour is off so output
// can be compared as plain text.

export interface TerminalStyle {
  success: (text: string) => string;
  failure: (text: string) => string;
  warning: (text: string) => string;
  heading: (text: string) => string;
}

const RESET = '\x1b[0m';

const COLORS = {
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  bold: '\x1b[1m',
} as const;

const paint =
  (code: string) =>
  (text: string): string =>
    `${code}${text}${RESET}`;

const plain = (text: string): string => text;

export function createTerminalStyle(enabled: boolean): TerminalStyle {
  if (!enabled) {
    return { success: plain, failure: plain, warning: plain, heading: plain };
  }
  return {
    success: paint(COLORS.green),
    failure: paint(COLORS.red),
    warning: paint(COLORS.yellow),
    heading: paint(COLORS.bold),
  };
}
