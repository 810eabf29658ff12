import fs from 'fs';
import path from 'path';
import { logger } from './logger';

export const DEFAULT_UNIVERSE = ['AAPL', 'MSFT', 'NVDA', 'AMZN', 'TSLA'];

/** Тикеры через запятую и/или перевод строки; пустые и дубли отбрасываются */
export function parseUniverse(raw: string): string[] {
  const seen = new Set<string>();
  for (const cell of raw.split(/[,\r\n]+/)) {
    const sym = cell.trim().toUpperCase();
    if (sym && !sym.startsWith('#')) seen.add(sym);
  }
  return Array.from(seen);
}

export function loadUniverse(filePath: string): string[] {
  const p = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
  if (!fs.existsSync(p)) {
    logger.info('Universe', `${filePath} not found, using default universe`);
    return [...DEFAULT_UNIVERSE];
  }
  const tickers = parseUniverse(fs.readFileSync(p, 'utf8'));
  return tickers.length ? tickers : [...DEFAULT_UNIVERSE];
}
