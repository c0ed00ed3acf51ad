import { DateTime } from 'luxon';
import type { DurationLike } from 'luxon';

/**
 * 현재 시각 공급자
 *
 * 거래 타임스탬프와 VWSP 윈도우 기준 시각은 모두 Clock에서 읽는다.
 */
export interface Clock {
  now(): DateTime;
}

export const systemClock: Clock = {
  now: () => DateTime.utc(),
};

/**
 * 수동으로 조작하는 시계 (테스트, 재현용)
 *
 * @example
 * ```typescript
 * const clock = new ManualClock(DateTime.fromISO('2024-01-02T09:00:00Z'));
 * stock.recordTrade(100, 'BUY', 10000);
 * clock.advance({ minutes: 10 });
 * stock.volumeWeightedStockPrice(); // null
 * ```
 */
export class ManualClock implements Clock {
  private current: DateTime;

  constructor(start: DateTime = DateTime.utc()) {
    this.current = start;
  }

  now(): DateTime {
    return this.current;
  }

  set(time: DateTime): void {
    this.current = time;
  }

  advance(by: DurationLike): DateTime {
    this.current = this.current.plus(by);
    return this.current;
  }
}
