import type { Decimal } from 'decimal.js';

/**
 * A named window of calendar years, both ends inclusive.
 */
export interface RatePeriod {
  label: string;
  startYear: number;
  endYear: number;
}

/** Minimal row shape the calculator reads */
export interface RateSample {
  date: string;
  value: Decimal;
  country: string;
}

/**
 * country -> period label -> annualized rate, or null when it cannot be computed.
 */
export type RateOfChangeMatrix = Record<string, Record<string, Decimal | null>>;

export type RateOfChangeWarning =
  | {
      type: 'InsufficientData';
      message: string;
      country: string;
      period: string;
      samples: number;
    }
  | { type: 'ZeroBase'; message: string; country: string; period: string };

export interface RateOfChangeResult {
  matrix: RateOfChangeMatrix;
  warnings: RateOfChangeWarning[];
}
