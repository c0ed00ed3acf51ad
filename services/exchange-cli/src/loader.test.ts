import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { StockNotFoundError } from '@exchange/core';
import { buildExchange, parsePriceOption, parseStockFile, parseTradeFile } from './loader.js';

const AS_OF = DateTime.fromISO('2024-03-04T10:00:00.000Z');

const stocks = parseStockFile([
  { type: 'COMMON', symbol: 'TEA', lastDividendPennies: 0, parValuePennies: 10000 },
  { type: 'COMMON', symbol: 'POP', lastDividendPennies: 8, parValuePennies: 10000 },
  {
    type: 'PREFERRED',
    symbol: 'GIN',
    lastDividendPennies: 8,
    fixedDividendRate: 0.02,
    parValuePennies: 10000,
  },
]);

describe('parseStockFile', () => {
  it('종목 정의를 파싱해야 함', () => {
    expect(stocks).toHaveLength(3);
    expect(stocks[2]).toEqual({
      type: 'PREFERRED',
      symbol: 'GIN',
      lastDividendPennies: 8,
      fixedDividendRate: 0.02,
      parValuePennies: 10000,
    });
  });

  it('고정 배당률이 범위를 벗어나면 에러', () => {
    expect(() =>
      parseStockFile([
        { type: 'PREFERRED', symbol: 'BAD', lastDividendPennies: 0, fixedDividendRate: 2, parValuePennies: 100 },
      ])
    ).toThrow();
  });

  it('알 수 없는 종목 유형이면 에러', () => {
    expect(() =>
      parseStockFile([{ type: 'BOND', symbol: 'BAD', lastDividendPennies: 0, parValuePennies: 100 }])
    ).toThrow();
  });

  it('배열이 아니면 에러', () => {
    expect(() => parseStockFile({ symbol: 'TEA' })).toThrow();
  });
});

describe('parseTradeFile', () => {
  it('secondsAgo 기본값은 0', () => {
    const trades = parseTradeFile([{ symbol: 'TEA', quantity: 10, indicator: 'BUY', pricePennies: 100 }]);

    expect(trades[0].secondsAgo).toBe(0);
  });

  it('수량이 정수가 아니면 에러', () => {
    expect(() =>
      parseTradeFile([{ symbol: 'TEA', quantity: 1.5, indicator: 'BUY', pricePennies: 100 }])
    ).toThrow();
  });

  it('거래 구분은 BUY/SELL만 허용', () => {
    expect(() =>
      parseTradeFile([{ symbol: 'TEA', quantity: 1, indicator: 'HOLD', pricePennies: 100 }])
    ).toThrow();
  });
});

describe('buildExchange', () => {
  it('거래를 오래된 순으로 재생하고 기준 시각으로 돌아와야 함', () => {
    const trades = parseTradeFile([
      { symbol: 'TEA', quantity: 2000, indicator: 'SELL', pricePennies: 10230, secondsAgo: 30 },
      { symbol: 'TEA', quantity: 1000, indicator: 'BUY', pricePennies: 9550, secondsAgo: 120 },
      { symbol: 'POP', quantity: 500, indicator: 'BUY', pricePennies: 400, secondsAgo: 900 },
      { symbol: 'POP', quantity: 100, indicator: 'BUY', pricePennies: 400, secondsAgo: 60 },
      { symbol: 'GIN', quantity: 100, indicator: 'SELL', pricePennies: 900, secondsAgo: 10 },
    ]);

    const { exchange, clock } = buildExchange({ stocks, trades, asOf: AS_OF });

    expect(clock.now().toMillis()).toBe(AS_OF.toMillis());

    const teaTrades = exchange.getStock('TEA').trades();
    expect(teaTrades.map((t) => t.quantity)).toEqual([1000, 2000]);
    expect(teaTrades[0].timestamp.toMillis()).toBe(AS_OF.minus({ seconds: 120 }).toMillis());

    expect(exchange.getStock('TEA').volumeWeightedStockPrice()?.toFixed(2)).toBe('100.03');
    // 900초 전 거래는 5분 윈도우 밖
    expect(exchange.getStock('POP').volumeWeightedStockPrice()?.toFixed(2)).toBe('4.00');
    expect(exchange.getStock('GIN').volumeWeightedStockPrice()?.toFixed(2)).toBe('9.00');

    // (100.03 × 4 × 9)^(1/3) = 15.3277...
    expect(exchange.allShareIndex()?.toFixed(2)).toBe('15.33');
  });

  it('거래가 없으면 지수는 null', () => {
    const { exchange } = buildExchange({ stocks, asOf: AS_OF });

    expect(exchange.size).toBe(3);
    expect(exchange.allShareIndex()).toBeNull();
  });

  it('등록되지 않은 심볼의 거래는 에러', () => {
    const trades = parseTradeFile([{ symbol: 'NOPE', quantity: 1, indicator: 'BUY', pricePennies: 100 }]);

    expect(() => buildExchange({ stocks, trades, asOf: AS_OF })).toThrow(StockNotFoundError);
  });
});

describe('parsePriceOption', () => {
  it('미지정이면 undefined', () => {
    expect(parsePriceOption(undefined)).toBeUndefined();
  });

  it('양의 정수 페니', () => {
    expect(parsePriceOption('10000')).toBe(10000);
  });

  it('소수나 숫자 뒤 문자는 거부', () => {
    expect(() => parsePriceOption('12.5')).toThrow('--price는 양의 정수(페니)여야 합니다: 12.5');
    expect(() => parsePriceOption('100abc')).toThrow('--price는 양의 정수(페니)여야 합니다');
  });

  it('0, 음수, 빈 값은 거부', () => {
    expect(() => parsePriceOption('0')).toThrow();
    expect(() => parsePriceOption('-5')).toThrow();
    expect(() => parsePriceOption('')).toThrow();
  });
});
