/**
 * SQLite DB: хранилище детекций (таблица patterns).
 * При ошибке загрузки better-sqlite3 используется in-memory хранилище
 * с той же семантикой upsert и порядка выдачи.
 */

import path from 'path';
import fs from 'fs';
import type Database from 'better-sqlite3';
import type { VcpDetection, VcpMeta, PatternName } from '../types/detection';
import { VCP_PATTERN } from '../types/detection';
import type { CursorPosition } from '../lib/cursor';
import { StoreError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { config } from '../config';

export interface ListQuery {
  pattern: string;
  /** Exclusive position in (asOf DESC, ticker ASC) order */
  after?: CursorPosition;
  limit: number;
}

export interface StoreStatus {
  lastAsOf: string | null;
  firstAsOf: string | null;
  total: number;
}

export interface DetectionStore {
  readonly mode: 'sqlite' | 'memory';
  /** Idempotent by (ticker, pattern, asOf): replaces every other field */
  upsert(detection: VcpDetection): Promise<void>;
  list(query: ListQuery): Promise<VcpDetection[]>;
  listByTicker(ticker: string, limit: number): Promise<VcpDetection[]>;
  status(): Promise<StoreStatus>;
  /** Delete rows with asOf before the given ISO timestamp; returns deleted count */
  prune(beforeIso: string): Promise<number>;
  ping(): Promise<boolean>;
  close(): void;
}

interface PatternRow {
  ticker: string;
  pattern: string;
  as_of: string;
  confidence: number;
  rs: number | null;
  price: number;
  pivot_price: number;
  base_depth_pct: number;
  meta: string;
}

interface UpsertParams {
  ticker: string;
  pattern: string;
  asOf: string;
  confidence: number;
  rs: number | null;
  price: number;
  pivotPrice: number;
  baseDepthPct: number;
  meta: string;
}

interface ListParams {
  pattern: string;
  limit: number;
  afterAsOf?: string;
  afterTicker?: string;
}

function getSchemaPath(): string {
  const candidates = [
    path.join(process.cwd(), 'backend', 'src', 'db', 'schema.sql'),
    path.join(process.cwd(), 'src', 'db', 'schema.sql'),
    path.join(__dirname, 'schema.sql')
  ];
  for (const p of candidates) {
    if (fs.existsSync(p)) return p;
  }
  return candidates[0];
}

function isPattern(value: string): value is PatternName {
  return value === VCP_PATTERN;
}

function isVcpMeta(value: unknown): value is VcpMeta {
  if (typeof value !== 'object' || value === null) return false;
  const o: Record<string, unknown> = { ...value };
  return typeof o.triggered === 'boolean' && Array.isArray(o.contractions) && typeof o.scores === 'object';
}

function rowToDetection(row: PatternRow): VcpDetection {
  let meta: unknown;
  try {
    meta = JSON.parse(row.meta);
  } catch (e) {
    throw new StoreError('unavailable', `Corrupt meta for ${row.ticker}@${row.as_of}`, { cause: e });
  }
  if (!isVcpMeta(meta) || !isPattern(row.pattern)) {
    throw new StoreError('unavailable', `Unexpected row shape for ${row.ticker}@${row.as_of}`);
  }
  return {
    ticker: row.ticker,
    pattern: row.pattern,
    asOf: row.as_of,
    contractions: meta.contractions,
    pivotPrice: row.pivot_price,
    confidence: row.confidence,
    baseDepthPct: row.base_depth_pct,
    rs: row.rs,
    price: row.price,
    meta
  };
}

function toParams(d: VcpDetection): UpsertParams {
  return {
    ticker: d.ticker,
    pattern: d.pattern,
    asOf: d.asOf,
    confidence: d.confidence,
    rs: d.rs,
    price: d.price,
    pivotPrice: d.pivotPrice,
    baseDepthPct: d.baseDepthPct,
    meta: JSON.stringify(d.meta)
  };
}

/** Порядок выдачи: asOf DESC, ticker ASC */
export function compareDetections(a: { asOf: string; ticker: string }, b: { asOf: string; ticker: string }): number {
  if (a.asOf !== b.asOf) return a.asOf < b.asOf ? 1 : -1;
  if (a.ticker === b.ticker) return 0;
  return a.ticker < b.ticker ? -1 : 1;
}

export class SqliteDetectionStore implements DetectionStore {
  readonly mode = 'sqlite' as const;
  private readonly db: Database.Database;
  private readonly upsertStmt: Database.Statement<[UpsertParams], void>;
  private readonly pageStmt: Database.Statement<[ListParams], PatternRow>;
  private readonly pageAfterStmt: Database.Statement<[ListParams], PatternRow>;
  private readonly byTickerStmt: Database.Statement<[{ ticker: string; limit: number }], PatternRow>;
  private readonly statusStmt: Database.Statement<[], { last_as_of: string | null; first_as_of: string | null; total: number }>;
  private readonly pruneStmt: Database.Statement<[{ before: string }], void>;

  constructor(db: Database.Database) {
    this.db = db;
    const columns = 'ticker, pattern, as_of, confidence, rs, price, pivot_price, base_depth_pct, meta';
    this.upsertStmt = db.prepare<[UpsertParams], void>(`
      INSERT INTO patterns (${columns})
      VALUES (@ticker, @pattern, @asOf, @confidence, @rs, @price, @pivotPrice, @baseDepthPct, @meta)
      ON CONFLICT (ticker, pattern, as_of) DO UPDATE SET
        confidence = excluded.confidence,
        rs = excluded.rs,
        price = excluded.price,
        pivot_price = excluded.pivot_price,
        base_depth_pct = excluded.base_depth_pct,
        meta = excluded.meta,
        updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
    `);
    this.pageStmt = db.prepare<[ListParams], PatternRow>(`
      SELECT ${columns} FROM patterns
      WHERE pattern = @pattern
      ORDER BY as_of DESC, ticker ASC
      LIMIT @limit
    `);
    // Следующая страница: (as_of < last) OR (as_of = last AND ticker > last_ticker)
    this.pageAfterStmt = db.prepare<[ListParams], PatternRow>(`
      SELECT ${columns} FROM patterns
      WHERE pattern = @pattern
        AND (as_of < @afterAsOf OR (as_of = @afterAsOf AND ticker > @afterTicker))
      ORDER BY as_of DESC, ticker ASC
      LIMIT @limit
    `);
    this.byTickerStmt = db.prepare<[{ ticker: string; limit: number }], PatternRow>(`
      SELECT ${columns} FROM patterns
      WHERE ticker = @ticker
      ORDER BY as_of DESC
      LIMIT @limit
    `);
    this.statusStmt = db.prepare<[], { last_as_of: string | null; first_as_of: string | null; total: number }>(`
      SELECT MAX(as_of) AS last_as_of, MIN(as_of) AS first_as_of, COUNT(*) AS total FROM patterns
    `);
    this.pruneStmt = db.prepare<[{ before: string }], void>('DELETE FROM patterns WHERE as_of < @before');
  }

  async upsert(detection: VcpDetection): Promise<void> {
    this.run('upsert', () => this.upsertStmt.run(toParams(detection)));
  }

  async list(query: ListQuery): Promise<VcpDetection[]> {
    const rows = this.run('list', () =>
      query.after
        ? this.pageAfterStmt.all({
            pattern: query.pattern,
            limit: query.limit,
            afterAsOf: query.after.asOf,
            afterTicker: query.after.ticker
          })
        : this.pageStmt.all({ pattern: query.pattern, limit: query.limit })
    );
    return rows.map(rowToDetection);
  }

  async listByTicker(ticker: string, limit: number): Promise<VcpDetection[]> {
    const rows = this.run('listByTicker', () => this.byTickerStmt.all({ ticker, limit }));
    return rows.map(rowToDetection);
  }

  async status(): Promise<StoreStatus> {
    const row = this.run('status', () => this.statusStmt.get());
    return {
      lastAsOf: row?.last_as_of ?? null,
      firstAsOf: row?.first_as_of ?? null,
      total: row?.total ?? 0
    };
  }

  async prune(beforeIso: string): Promise<number> {
    const info = this.run('prune', () => this.pruneStmt.run({ before: beforeIso }));
    return info.changes;
  }

  async ping(): Promise<boolean> {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (e) {
      logger.warn('DB', 'Ping failed', { error: errorMessage(e) });
      return false;
    }
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private run<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof StoreError) throw e;
      throw new StoreError('unavailable', `SQLite ${op} failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}

/**
 * In-memory режим: тот же ключ (ticker, pattern, asOf), тот же порядок.
 * Данные теряются при перезапуске.
 */
export class MemoryDetectionStore implements DetectionStore {
  readonly mode = 'memory' as const;
  private readonly rows = new Map<string, VcpDetection>();

  async upsert(detection: VcpDetection): Promise<void> {
    this.rows.set(keyOf(detection), structuredClone(detection));
  }

  async list(query: ListQuery): Promise<VcpDetection[]> {
    const after = query.after;
    return this.sorted()
      .filter((d) => d.pattern === query.pattern)
      .filter((d) => !after || compareDetections(d, after) > 0)
      .slice(0, query.limit)
      .map((d) => structuredClone(d));
  }

  async listByTicker(ticker: string, limit: number): Promise<VcpDetection[]> {
    return this.sorted()
      .filter((d) => d.ticker === ticker)
      .slice(0, limit)
      .map((d) => structuredClone(d));
  }

  async status(): Promise<StoreStatus> {
    const all = this.sorted();
    return {
      lastAsOf: all[0]?.asOf ?? null,
      firstAsOf: all[all.length - 1]?.asOf ?? null,
      total: all.length
    };
  }

  async prune(beforeIso: string): Promise<number> {
    let deleted = 0;
    for (const [key, d] of this.rows) {
      if (d.asOf < beforeIso) {
        this.rows.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  close(): void {
    this.rows.clear();
  }

  private sorted(): VcpDetection[] {
    return Array.from(this.rows.values()).sort(compareDetections);
  }
}

function keyOf(d: { ticker: string; pattern: string; asOf: string }): string {
  return `${d.ticker}\u0000${d.pattern}\u0000${d.asOf}`;
}

export type NativeLoader = () => typeof Database;

function requireNative(): typeof Database {
  return require('better-sqlite3');
}

/** Нативный модуль грузится лениво: без него работает in-memory режим */
function loadNative(loader: NativeLoader): typeof Database | null {
  try {
    return loader();
  } catch (e) {
    logger.warn('DB', 'better-sqlite3 failed to load', { error: errorMessage(e) });
    return null;
  }
}

/** Открыть SQLite и применить schema.sql. Бросает StoreError при неудаче. */
export function openSqliteStore(dbPath: string, loader: NativeLoader = requireNative): SqliteDetectionStore {
  const Native = loadNative(loader);
  if (!Native) {
    throw new StoreError('unavailable', 'Native SQLite module is not available');
  }
  try {
    if (dbPath !== ':memory:') fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    const db = new Native(dbPath);
    if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
    db.exec(fs.readFileSync(getSchemaPath(), 'utf8'));
    return new SqliteDetectionStore(db);
  } catch (e) {
    throw new StoreError('unavailable', `Cannot open SQLite at ${dbPath}: ${errorMessage(e)}`, { cause: e });
  }
}

let store: DetectionStore | null = null;

function defaultDbPath(): string {
  return config.database.path || path.join(process.cwd(), 'data', 'patterns.db');
}

/** Инициализация хранилища. Не бросает исключений: при ошибке включается in-memory режим. */
export function initDb(dbPath: string = defaultDbPath(), loader: NativeLoader = requireNative): DetectionStore {
  if (store) return store;
  try {
    store = openSqliteStore(dbPath, loader);
  } catch (e) {
    logger.warn('DB', 'SQLite unavailable, using in-memory store', { error: errorMessage(e) });
    store = new MemoryDetectionStore();
  }
  return store;
}

export function getStore(): DetectionStore {
  return store ?? initDb();
}

export function isMemoryStore(): boolean {
  return getStore().mode === 'memory';
}

export function closeDb(): void {
  store?.close();
  store = null;
}
