// Main exports for @exchange/core

// Types
export type {
  Trade,
  TradeIndicator,
  StockType,
  CommonStockParams,
  PreferredStockParams,
  StockDefinition,
} from './types.js';
export { TRADE_INDICATORS, STOCK_TYPES } from './types.js';

// Errors
export {
  ExchangeError,
  InvalidStockError,
  InvalidTradeError,
  DuplicateSymbolError,
  StockNotFoundError,
} from './errors.js';

// Money
export { roundMoney, ratio, penniesToMajor, isPennies, MONEY_DECIMALS } from './money.js';

// Clock
export type { Clock } from './clock.js';
export { systemClock, ManualClock } from './clock.js';

// Trades / Stocks
export { TradeLedger } from './trade-ledger.js';
export type { DividendPolicy } from './dividend-policy.js';
export { commonDividend, preferredDividend } from './dividend-policy.js';
export {
  Stock,
  createCommonStock,
  createPreferredStock,
  DEFAULT_VWSP_WINDOW,
  MAX_SYMBOL_LENGTH,
} from './stock.js';

// Exchange
export { Exchange } from './exchange.js';
export { SAMPLE_STOCKS, createSampleExchange } from './sample.js';
