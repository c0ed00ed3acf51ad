/**
 * 거래소 코어 에러 클래스
 */

export class ExchangeError extends Error {
  constructor(message: string) {
    super(`[exchange] ${message}`);
    this.name = 'ExchangeError';
  }
}

/**
 * 종목 생성 파라미터 오류 (심볼, 액면가, 배당 등)
 */
export class InvalidStockError extends ExchangeError {
  field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'InvalidStockError';
    this.field = field;
  }
}

export class InvalidTradeError extends ExchangeError {
  symbol: string;

  constructor(symbol: string, message: string) {
    super(`${symbol}: ${message}`);
    this.name = 'InvalidTradeError';
    this.symbol = symbol;
  }
}

export class DuplicateSymbolError extends ExchangeError {
  symbol: string;

  constructor(symbol: string) {
    super(`이미 등록된 심볼입니다: ${symbol}`);
    this.name = 'DuplicateSymbolError';
    this.symbol = symbol;
  }
}

export class StockNotFoundError extends ExchangeError {
  symbol: string;

  constructor(symbol: string) {
    super(`종목을 찾을 수 없습니다: ${symbol}`);
    this.name = 'StockNotFoundError';
    this.symbol = symbol;
  }
}
