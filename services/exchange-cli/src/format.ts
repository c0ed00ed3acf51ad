import type Big from 'big.js';
import type { DurationLike } from 'luxon';
import type { Exchange, Stock, StockType } from '@exchange/core';

export type StockReport = {
  symbol: string;
  type: StockType;
  pricePennies: number | null;
  dividendYield: Big | null;
  peRatio: Big | null;
  vwsp: Big | null;
  tradeCount: number;
};

/**
 * 종목 지표 계산
 *
 * 가격을 지정하지 않으면 VWSP(통화 단위)를 페니로 환산해 사용한다.
 */
export function buildStockReport(
  stock: Stock,
  window: DurationLike,
  pricePennies?: number
): StockReport {
  const vwsp = stock.volumeWeightedStockPrice(window);
  const price = pricePennies ?? (vwsp ? vwsp.times(100).toNumber() : null);

  return {
    symbol: stock.symbol,
    type: stock.type,
    pricePennies: price,
    dividendYield: price === null ? null : stock.dividendYield(price),
    peRatio: price === null ? null : stock.peRatio(price),
    vwsp,
    tradeCount: stock.tradeCount,
  };
}

function cell(value: Big | null, dp: number, suffix = ''): string {
  return value === null ? '-' : `${value.toFixed(dp)}${suffix}`;
}

export function formatStockLine(report: StockReport): string {
  const price = report.pricePennies === null ? '-' : (report.pricePennies / 100).toFixed(2);
  return [
    report.symbol.padEnd(10),
    report.type.padEnd(9),
    `가격 ${price}`,
    `수익률 ${cell(report.dividendYield, 2, '%')}`,
    `P/E ${cell(report.peRatio, 4)}`,
    `VWSP ${cell(report.vwsp, 2)}`,
    `거래 ${report.tradeCount}건`,
  ].join(' | ');
}

/**
 * 거래소 리포트 생성
 */
export function generateExchangeReport(
  exchange: Exchange,
  window: DurationLike,
  pricePennies?: number
): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('='.repeat(60));
  lines.push('거래소 지표 리포트');
  lines.push('='.repeat(60));
  lines.push('');

  lines.push('## 종목');
  for (const symbol of exchange.stockSymbols) {
    const report = buildStockReport(exchange.getStock(symbol), window, pricePennies);
    lines.push(formatStockLine(report));
  }
  lines.push('');

  lines.push('## 지수');
  lines.push(`All-Share Index: ${cell(exchange.allShareIndex(window), 2)}`);
  lines.push('');

  lines.push('='.repeat(60));
  lines.push('');

  return lines.join('\n');
}
