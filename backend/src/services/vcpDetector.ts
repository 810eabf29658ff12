/**
 * VCP Detector — конвейер для одного тикера: Scanner → Volume → Classifier.
 * Без общего изменяемого состояния: безопасно вызывать параллельно для разных тикеров.
 */

import type { CandleSeries } from '../types/candle';
import type { ExternalSignals, VcpDetection } from '../types/detection';
import { ContractionScanner, type ContractionScannerOptions } from './contractionScanner';
import { VolumeProfileAnalyzer, type VolumeProfileOptions } from './volumeProfile';
import { VcpClassifier, type VcpClassifierOptions, type VcpEvaluation } from './vcpClassifier';
import { logger } from '../lib/logger';

export interface VcpDetectorOptions {
  scanner?: Partial<ContractionScannerOptions>;
  volume?: Partial<VolumeProfileOptions>;
  classifier?: Partial<VcpClassifierOptions>;
}

export class VcpDetector {
  private readonly scanner: ContractionScanner;
  private readonly classifier: VcpClassifier;

  constructor(options: VcpDetectorOptions = {}) {
    this.scanner = new ContractionScanner(options.scanner);
    this.classifier = new VcpClassifier(options.classifier, new VolumeProfileAnalyzer(options.volume));
  }

  detect(ticker: string, candles: CandleSeries, signals?: ExternalSignals): VcpDetection | null {
    const result = this.evaluate(ticker, candles, signals);
    return result.detected ? result.detection : null;
  }

  /**
   * Evaluate the latest bar of the series. Throws DataAnomaly on bad input;
   * "no pattern" is a normal negative result.
   */
  evaluate(ticker: string, candles: CandleSeries, signals?: ExternalSignals): VcpEvaluation {
    const contractions = this.scanner.scan(candles, ticker);
    if (candles.length < this.scanner.options.minBars) {
      return {
        detected: false,
        reason: 'insufficient_data',
        detail: `${candles.length} bars, need ${this.scanner.options.minBars}`
      };
    }
    const result = this.classifier.evaluate({ ticker, candles, contractions, signals });
    if (result.detected) {
      logger.info('VcpDetector', `VCP ${ticker}`, {
        contractions: result.detection.contractions.length,
        pivot: result.detection.pivotPrice,
        confidence: Number(result.detection.confidence.toFixed(3)),
        triggered: result.detection.meta.triggered
      });
    } else {
      logger.debug('VcpDetector', `No VCP ${ticker}: ${result.reason}`, { detail: result.detail });
    }
    return result;
  }
}
