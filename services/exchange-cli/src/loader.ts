import { readFileSync } from 'node:fs';
import { DateTime } from 'luxon';
import { Exchange, isPennies, ManualClock } from '@exchange/core';
import type { StockDefinition } from '@exchange/core';
import { StockFileSchema, TradeFileSchema } from './schemas.js';
import type { TradeInput } from './schemas.js';

export function readJsonFile(filePath: string): unknown {
  const raw = readFileSync(filePath, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`JSON 파싱 실패: ${filePath} (${error instanceof Error ? error.message : String(error)})`);
  }
}

export function parseStockFile(raw: unknown): StockDefinition[] {
  return StockFileSchema.parse(raw);
}

export function parseTradeFile(raw: unknown): TradeInput[] {
  return TradeFileSchema.parse(raw);
}

/**
 * --price 옵션 (페니, 양의 정수)
 */
export function parsePriceOption(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;

  const value = raw.trim() === '' ? NaN : Number(raw);
  if (!isPennies(value)) {
    throw new Error(`--price는 양의 정수(페니)여야 합니다: ${raw}`);
  }
  return value;
}

/**
 * 종목/거래 정의로 거래소 구성
 *
 * 거래는 secondsAgo 기준 오래된 순으로 재생되며, 재생이 끝나면
 * 시계는 asOf로 돌아온다.
 *
 * @param asOf - 기준 시각 (VWSP 윈도우의 끝)
 */
export function buildExchange(params: {
  stocks: StockDefinition[];
  trades?: TradeInput[];
  asOf?: DateTime;
}): { exchange: Exchange; clock: ManualClock } {
  const asOf = params.asOf ?? DateTime.utc();
  const clock = new ManualClock(asOf);
  const exchange = new Exchange(clock);

  for (const definition of params.stocks) {
    exchange.addStock(definition);
  }

  const ordered = [...(params.trades ?? [])].sort((a, b) => b.secondsAgo - a.secondsAgo);
  for (const trade of ordered) {
    clock.set(asOf.minus({ seconds: trade.secondsAgo }));
    exchange.getStock(trade.symbol).recordTrade(trade.quantity, trade.indicator, trade.pricePennies);
  }
  clock.set(asOf);

  return { exchange, clock };
}
