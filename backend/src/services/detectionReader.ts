/**
 * Paginated Reader — постраничная выдача детекций по непрозрачному курсору.
 * Порядок: asOf DESC, ticker ASC (внутри одного паттерна порядок полный).
 */

import type { DetectionStore } from '../db';
import { VCP_PATTERN, type VcpDetection } from '../types/detection';
import { decodeCursor, encodeCursor } from '../lib/cursor';
import { InvalidCursor } from '../lib/errors';
import { config } from '../config';

export interface DetectionPage {
  items: VcpDetection[];
  next: string | null;
  hasMore: boolean;
}

export interface DetectionReaderOptions {
  secret: string;
  maxPageSize: number;
  pattern: string;
}

export class DetectionReader {
  private readonly store: DetectionStore;
  private readonly options: DetectionReaderOptions;

  constructor(store: DetectionStore, options: Partial<DetectionReaderOptions> = {}) {
    this.store = store;
    this.options = {
      secret: config.pagination.cursorSecret,
      maxPageSize: config.pagination.maxLimit,
      pattern: VCP_PATTERN,
      ...options
    };
  }

  /**
   * Throws InvalidCursor for a bad token; `next` is null at the end of the set.
   */
  async page(cursor: string | null | undefined, limit: number): Promise<DetectionPage> {
    const size = this.clampLimit(limit);
    const after = cursor ? decodeCursor(cursor, this.options.secret) : undefined;
    if (after && after.pattern !== this.options.pattern) {
      throw new InvalidCursor(`cursor belongs to pattern ${after.pattern}`);
    }

    // limit + 1: лишняя строка только сигнализирует, что есть следующая страница
    const rows = await this.store.list({ pattern: this.options.pattern, after, limit: size + 1 });
    const hasMore = rows.length > size;
    const items = hasMore ? rows.slice(0, size) : rows;
    const last = items[items.length - 1];
    const next =
      hasMore && last
        ? encodeCursor({ asOf: last.asOf, ticker: last.ticker, pattern: last.pattern }, this.options.secret)
        : null;

    return { items, next, hasMore };
  }

  private clampLimit(limit: number): number {
    if (!Number.isFinite(limit)) return 1;
    return Math.min(this.options.maxPageSize, Math.max(1, Math.floor(limit)));
  }
}
