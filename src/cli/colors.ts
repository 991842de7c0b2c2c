/**
 * ANSI color helpers for CLI output
 */

const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  underline: '\x1b[4m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
  bgRed: '\x1b[41m',
};

// NO_COLOR (https://no-color.org) and non-TTY output get plain text
const enabled = process.stdout.isTTY === true && !process.env.NO_COLOR;

function paint(...codes: string[]): (s: string) => string {
  return (s) => (enabled ? `${codes.join('')}${s}${colors.reset}` : s);
}

export const c = {
  title: paint(colors.bold, colors.cyan),
  header: paint(colors.bold, colors.cyan),
  success: paint(colors.green),
  warning: paint(colors.yellow),
  error: (s: string) => (enabled ? `${colors.bgRed}${colors.white} ${s} ${colors.reset}` : s),
  dim: paint(colors.dim),
  file: paint(colors.magenta),
  path: paint(colors.gray),
  link: paint(colors.underline, colors.blue),
};
