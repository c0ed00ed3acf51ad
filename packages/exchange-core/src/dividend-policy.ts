import Big from 'big.js';
import type { StockType } from './types.js';

/**
 * 배당 정책
 *
 * 보통주와 우선주는 주당 배당금을 구하는 방식만 다르다.
 * - 보통주: 최근 배당금
 * - 우선주: 고정 배당률 × 액면가
 */
export interface DividendPolicy {
  readonly type: StockType;
  /** 주당 배당금 (페니, 반올림 없음) */
  dividendPerShare(parValuePennies: number): Big;
}

export function commonDividend(lastDividendPennies: number): DividendPolicy {
  return {
    type: 'COMMON',
    dividendPerShare: () => new Big(lastDividendPennies),
  };
}

export function preferredDividend(fixedDividendRate: number): DividendPolicy {
  const rate = new Big(fixedDividendRate);
  return {
    type: 'PREFERRED',
    dividendPerShare: (parValuePennies) => rate.times(parValuePennies),
  };
}
