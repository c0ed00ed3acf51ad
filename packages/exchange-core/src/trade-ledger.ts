import { Duration } from 'luxon';
import type { DurationLike } from 'luxon';
import type { Clock } from './clock.js';
import { InvalidTradeError } from './errors.js';
import { isPennies } from './money.js';
import { TRADE_INDICATORS } from './types.js';
import type { Trade, TradeIndicator } from './types.js';

/**
 * 종목별 거래 원장 (추가 전용)
 *
 * 거래는 기록된 순서대로 보관되며 수정/삭제되지 않는다.
 * 타임스탬프는 기록 시점의 clock.now()로 부여된다.
 */
export class TradeLedger {
  private readonly trades: Trade[] = [];

  constructor(
    private readonly symbol: string,
    private readonly clock: Clock
  ) {}

  get size(): number {
    return this.trades.length;
  }

  /**
   * 거래 기록
   *
   * 검증 실패 시 InvalidTradeError를 던지고 원장은 변경되지 않는다.
   */
  record(quantity: number, indicator: TradeIndicator, pricePennies: number): Trade {
    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      throw new InvalidTradeError(this.symbol, `수량은 양의 정수여야 합니다: ${quantity}`);
    }
    if (!isPennies(pricePennies)) {
      throw new InvalidTradeError(this.symbol, `가격은 양의 정수(페니)여야 합니다: ${pricePennies}`);
    }
    if (!(TRADE_INDICATORS as readonly string[]).includes(indicator)) {
      throw new InvalidTradeError(this.symbol, `알 수 없는 거래 구분: ${indicator}`);
    }

    const trade: Trade = Object.freeze({
      timestamp: this.clock.now(),
      quantity,
      indicator,
      pricePennies,
    });
    this.trades.push(trade);
    return trade;
  }

  /**
   * 최근 window 이내 거래 (timestamp >= now - window)
   *
   * 호출할 때마다 현재 시각 기준으로 다시 평가한다.
   */
  *tradesSince(window: DurationLike): Generator<Trade, void, undefined> {
    const cutoffMs = this.clock.now().minus(Duration.fromDurationLike(window)).toMillis();
    for (const trade of this.trades) {
      if (trade.timestamp.toMillis() >= cutoffMs) {
        yield trade;
      }
    }
  }

  all(): readonly Trade[] {
    return [...this.trades];
  }
}
