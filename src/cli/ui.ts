import fs from 'node:fs';
import path from 'node:path';
import boxen from 'boxen';
import gradient from 'gradient-string';
import figlet from 'figlet';
import logSymbols from 'log-symbols';
import { getPalette } from './theme.js';
import { isQuiet, isTestEnv } from '../util/env.js';

export type Style = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title';

function isInteractive() {
  return !!process.stdout.isTTY && !process.env.CI && !isQuiet();
}

let bannerPrinted = false;

function banner() {
  if (bannerPrinted || !isInteractive()) return;
  bannerPrinted = true;
  const palette = getPalette();
  const text = figlet.textSync('Blackjack', { font: 'Standard' });
  const title = gradient(palette.gradient).multiline(text);
  const body = `${title}\n\n${palette.dim('v' + safeReadPkgVersion())}  ${palette.dim(process.version)}`;
  console.log(boxen(body, { padding: 1, borderColor: 'green' }));
}

function safeReadPkgVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.resolve('package.json'), 'utf8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
    return '0.0.0';
  } catch { return '0.0.0'; }
}

function format(msg: string, style: Style): string {
  const palette = getPalette();
  switch (style) {
    case 'success': return `${logSymbols.success} ${palette.success(msg)}`;
    case 'warn': return `${logSymbols.warning} ${palette.warn(msg)}`;
    case 'error': return `${logSymbols.error} ${palette.error(msg)}`;
    case 'dim': return palette.dim(msg);
    case 'title': return palette.bold(palette.info(msg));
    default: return `${logSymbols.info} ${palette.info(msg)}`;
  }
}

function say(msg: string, style: Style = 'info') {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  if (isQuiet() && style !== 'error') return;
  console.log(format(msg, style));
}

export function formatTable(rows: Array<Record<string, string | number>>, headerStyle: (s: string) => string = getPalette().bold): string[] {
  if (rows.length === 0) return ['(none)'];
  const headers = Object.keys(rows[0]);
  const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
  const lines = [headers.map((h, i) => headerStyle(h.padEnd(widths[i]))).join('  ').trimEnd()];
  for (const r of rows) {
    lines.push(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])).join('  ').trimEnd());
  }
  return lines;
}

function table(rows: Array<Record<string, string | number>>) {
  if (isTestEnv() || isQuiet()) return;
  for (const line of formatTable(rows)) console.log(line);
}

export const ui = { banner, say, table };
export default ui;
