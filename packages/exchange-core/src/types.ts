import type { DateTime } from 'luxon';

// =============================================================================
// Trades
// =============================================================================

export const TRADE_INDICATORS = ['BUY', 'SELL'] as const;

/**
 * 매수/매도 구분 (계산에는 영향 없음)
 */
export type TradeIndicator = (typeof TRADE_INDICATORS)[number];

/**
 * 체결된 거래 기록 (불변)
 */
export type Trade = Readonly<{
  timestamp: DateTime;
  quantity: number;
  indicator: TradeIndicator;
  pricePennies: number;
}>;

// =============================================================================
// Stocks
// =============================================================================

export const STOCK_TYPES = ['COMMON', 'PREFERRED'] as const;
export type StockType = (typeof STOCK_TYPES)[number];

/**
 * 보통주 생성 파라미터 (금액은 모두 페니 단위 정수)
 */
export interface CommonStockParams {
  symbol: string;
  lastDividendPennies: number;
  parValuePennies: number;
}

/**
 * 우선주 생성 파라미터
 */
export interface PreferredStockParams extends CommonStockParams {
  fixedDividendRate: number; // (0, 1]
}

export type StockDefinition =
  | ({ type: 'COMMON' } & CommonStockParams)
  | ({ type: 'PREFERRED' } & PreferredStockParams);
