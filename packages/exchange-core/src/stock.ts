import Big from 'big.js';
import type { DurationLike } from 'luxon';
import { createLogger } from '@exchange/shared-utils';
import { systemClock } from './clock.js';
import type { Clock } from './clock.js';
import { commonDividend, preferredDividend } from './dividend-policy.js';
import type { DividendPolicy } from './dividend-policy.js';
import { InvalidStockError } from './errors.js';
import { isPennies, penniesToMajor, ratio, roundMoney } from './money.js';
import { TradeLedger } from './trade-ledger.js';
import type {
  CommonStockParams,
  PreferredStockParams,
  StockDefinition,
  StockType,
  Trade,
  TradeIndicator,
} from './types.js';

const logger = createLogger('exchange-core');

export const MAX_SYMBOL_LENGTH = 10;

/** VWSP 기본 룩백 기간 */
export const DEFAULT_VWSP_WINDOW: DurationLike = { minutes: 5 };

/**
 * 종목
 *
 * 심볼, 액면가, 최근 배당금, 거래 원장을 보유한다.
 * 보통주/우선주의 차이는 DividendPolicy 하나로 표현된다.
 */
export class Stock {
  readonly symbol: string;
  readonly parValuePennies: number;
  readonly lastDividendPennies: number;
  readonly fixedDividendRate: number | null;

  private readonly policy: DividendPolicy;
  private readonly ledger: TradeLedger;

  /**
   * @param definition - type에 따라 배당 정책이 정해진다 (COMMON | PREFERRED)
   */
  constructor(definition: StockDefinition, clock: Clock = systemClock) {
    const { symbol, parValuePennies, lastDividendPennies } = definition;

    // 심볼 길이는 코드 포인트 단위
    const symbolLength = [...symbol].length;
    if (symbolLength === 0 || symbolLength > MAX_SYMBOL_LENGTH) {
      throw new InvalidStockError(
        'symbol',
        `심볼은 1~${MAX_SYMBOL_LENGTH}자여야 합니다: "${symbol}"`
      );
    }
    if (!isPennies(parValuePennies)) {
      throw new InvalidStockError(
        'parValuePennies',
        `${symbol}: 액면가는 양의 정수(페니)여야 합니다: ${parValuePennies}`
      );
    }
    if (!isPennies(lastDividendPennies, { allowZero: true })) {
      throw new InvalidStockError(
        'lastDividendPennies',
        `${symbol}: 최근 배당금은 0 이상의 정수(페니)여야 합니다: ${lastDividendPennies}`
      );
    }

    if (definition.type === 'PREFERRED') {
      const { fixedDividendRate } = definition;
      if (!Number.isFinite(fixedDividendRate) || fixedDividendRate <= 0 || fixedDividendRate > 1) {
        throw new InvalidStockError(
          'fixedDividendRate',
          `${symbol}: 고정 배당률은 (0, 1] 범위여야 합니다: ${fixedDividendRate}`
        );
      }
      this.fixedDividendRate = fixedDividendRate;
      this.policy = preferredDividend(fixedDividendRate);
    } else {
      this.fixedDividendRate = null;
      this.policy = commonDividend(lastDividendPennies);
    }

    this.symbol = symbol;
    this.parValuePennies = parValuePennies;
    this.lastDividendPennies = lastDividendPennies;
    this.ledger = new TradeLedger(symbol, clock);
  }

  get type(): StockType {
    return this.policy.type;
  }

  get tradeCount(): number {
    return this.ledger.size;
  }

  trades(): readonly Trade[] {
    return this.ledger.all();
  }

  /**
   * 배당 수익률 (%)
   *
   * 가격이 0 이하이면 에러 대신 0.00을 반환한다.
   *
   * @param pricePennies - 주가 (페니)
   */
  dividendYield(pricePennies: number): Big {
    if (!Number.isFinite(pricePennies) || pricePennies <= 0) {
      return roundMoney(new Big(0));
    }

    const dividend = this.policy.dividendPerShare(this.parValuePennies);
    return roundMoney(dividend.times(100).div(pricePennies));
  }

  /**
   * P/E 비율 = 주가 / 최근 배당금 (반올림 없음)
   *
   * 가격이 0 이하이거나 최근 배당금이 0이면 null.
   */
  peRatio(pricePennies: number): Big | null {
    if (!Number.isFinite(pricePennies) || pricePennies <= 0 || this.lastDividendPennies === 0) {
      return null;
    }

    return ratio(pricePennies, this.lastDividendPennies);
  }

  recordTrade(quantity: number, indicator: TradeIndicator, pricePennies: number): Trade {
    const trade = this.ledger.record(quantity, indicator, pricePennies);

    logger.info('거래 기록', {
      symbol: this.symbol,
      indicator,
      quantity,
      price: penniesToMajor(pricePennies).toFixed(2),
    });

    return trade;
  }

  /**
   * 거래량 가중 주가 (VWSP, 통화 단위)
   *
   * sum(수량 × 가격) / sum(수량) 을 반올림 없이 계산한 뒤 한 번만 반올림한다.
   *
   * @param window - 룩백 기간 (기본 5분)
   * @returns 윈도우 내 거래가 없으면 null
   *
   * @example
   * ```typescript
   * tea.recordTrade(1000, 'BUY', 9550);
   * tea.recordTrade(2000, 'SELL', 10230);
   * tea.volumeWeightedStockPrice()?.toFixed(2); // '100.03'
   * ```
   */
  volumeWeightedStockPrice(window: DurationLike = DEFAULT_VWSP_WINDOW): Big | null {
    let totalQuantity = new Big(0);
    let weightedSum = new Big(0);

    for (const trade of this.ledger.tradesSince(window)) {
      totalQuantity = totalQuantity.plus(trade.quantity);
      weightedSum = weightedSum.plus(new Big(trade.quantity).times(trade.pricePennies));
    }

    if (totalQuantity.eq(0)) {
      return null;
    }

    return roundMoney(penniesToMajor(weightedSum.div(totalQuantity)));
  }
}

export function createCommonStock(params: CommonStockParams, clock?: Clock): Stock {
  return new Stock({ type: 'COMMON', ...params }, clock);
}

export function createPreferredStock(params: PreferredStockParams, clock?: Clock): Stock {
  return new Stock({ type: 'PREFERRED', ...params }, clock);
}
