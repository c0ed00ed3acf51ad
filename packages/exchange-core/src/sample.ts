import type { Clock } from './clock.js';
import { Exchange } from './exchange.js';
import type { StockDefinition } from './types.js';

/**
 * 샘플 종목 데이터 (금액 단위: 페니)
 */
export const SAMPLE_STOCKS: readonly StockDefinition[] = [
  { type: 'COMMON', symbol: 'TEA', lastDividendPennies: 0, parValuePennies: 10000 },
  { type: 'COMMON', symbol: 'POP', lastDividendPennies: 8, parValuePennies: 10000 },
  { type: 'COMMON', symbol: 'ALE', lastDividendPennies: 23, parValuePennies: 6000 },
  {
    type: 'PREFERRED',
    symbol: 'GIN',
    lastDividendPennies: 8,
    fixedDividendRate: 0.02,
    parValuePennies: 10000,
  },
  { type: 'COMMON', symbol: 'JOE', lastDividendPennies: 13, parValuePennies: 25000 },
];

export function createSampleExchange(clock?: Clock): Exchange {
  const exchange = new Exchange(clock);
  for (const definition of SAMPLE_STOCKS) {
    exchange.addStock(definition);
  }
  return exchange;
}
