/**
 * Дневная свеча от провайдера котировок.
 */
export interface Candle {
  /** Calendar day, YYYY-MM-DD */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  /** Provider-flagged event gap (earnings etc.) */
  gapFlag?: boolean;
}

export type CandleSeries = readonly Candle[];
