import chalk from 'chalk';

export type Palette = {
  gradient: [string, string];
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  bold: (s: string) => string;
};

export function colorDisabled(argv: readonly string[] = process.argv): boolean {
  return !!process.env.NO_COLOR || argv.includes('--no-color');
}

const base = (noColor: boolean) => new chalk.Instance({ level: noColor ? 0 : 3 });

export function getPalette(opts: { color?: boolean; theme?: string } = {}): Palette {
  const noColor = opts.color === undefined ? colorDisabled() : !opts.color;
  const c = base(noColor);
  const theme = (opts.theme ?? process.env.CLI_THEME ?? 'neo').toLowerCase();
  if (theme === 'mono') {
    return {
      gradient: ['#777777', '#bbbbbb'],
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
      bold: c.bold,
    };
  }
  if (theme === 'solarized') {
    return {
      gradient: ['#268bd2', '#2aa198'],
      info: c.cyan,
      success: c.green,
      warn: c.yellow,
      error: c.red,
      dim: c.gray,
      bold: c.bold,
    };
  }
  // neo (default): felt green into gold
  return {
    gradient: ['#1b9e4b', '#f5c542'],
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    bold: c.bold,
  };
}
