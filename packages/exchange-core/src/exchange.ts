import Big from 'big.js';
import type { DurationLike } from 'luxon';
import { createLogger } from '@exchange/shared-utils';
import { systemClock } from './clock.js';
import type { Clock } from './clock.js';
import { DuplicateSymbolError, StockNotFoundError } from './errors.js';
import { roundMoney } from './money.js';
import { createCommonStock, createPreferredStock, DEFAULT_VWSP_WINDOW } from './stock.js';
import type { Stock } from './stock.js';
import type { StockDefinition } from './types.js';

const logger = createLogger('exchange');

/**
 * 거래소: 심볼 → 종목 레지스트리
 *
 * 인스턴스마다 독립된 레지스트리를 가지며, 등록된 모든 종목은
 * 같은 Clock을 공유한다.
 */
export class Exchange {
  private readonly stocks = new Map<string, Stock>();

  constructor(private readonly clock: Clock = systemClock) {}

  get size(): number {
    return this.stocks.size;
  }

  /** 등록 순서대로의 심볼 목록 */
  get stockSymbols(): string[] {
    return [...this.stocks.keys()];
  }

  createCommonStock(symbol: string, lastDividendPennies: number, parValuePennies: number): Stock {
    this.assertAvailable(symbol);
    const stock = createCommonStock({ symbol, lastDividendPennies, parValuePennies }, this.clock);
    return this.register(stock);
  }

  createPreferredStock(
    symbol: string,
    lastDividendPennies: number,
    fixedDividendRate: number,
    parValuePennies: number
  ): Stock {
    this.assertAvailable(symbol);
    const stock = createPreferredStock(
      { symbol, lastDividendPennies, fixedDividendRate, parValuePennies },
      this.clock
    );
    return this.register(stock);
  }

  /**
   * 정의 객체로 종목 등록 (설정 파일 로딩용)
   */
  addStock(definition: StockDefinition): Stock {
    if (definition.type === 'PREFERRED') {
      return this.createPreferredStock(
        definition.symbol,
        definition.lastDividendPennies,
        definition.fixedDividendRate,
        definition.parValuePennies
      );
    }
    return this.createCommonStock(
      definition.symbol,
      definition.lastDividendPennies,
      definition.parValuePennies
    );
  }

  hasStock(symbol: string): boolean {
    return this.stocks.has(symbol);
  }

  getStock(symbol: string): Stock {
    const stock = this.stocks.get(symbol);
    if (!stock) {
      throw new StockNotFoundError(symbol);
    }
    return stock;
  }

  /**
   * 전 종목 지수 (All-Share Index)
   *
   * 각 종목 VWSP의 기하평균. VWSP가 없거나 0 이하인 종목은 제외한다.
   * 오버플로/언더플로를 피하기 위해 exp(mean(ln(vwsp)))로 계산한다.
   *
   * @param window - VWSP 룩백 기간 (기본 5분)
   * @returns 대상 종목이 없으면 null
   */
  allShareIndex(window: DurationLike = DEFAULT_VWSP_WINDOW): Big | null {
    let logSum = 0;
    let count = 0;

    for (const stock of this.stocks.values()) {
      const vwsp = stock.volumeWeightedStockPrice(window);
      if (vwsp === null || vwsp.lte(0)) continue;

      logSum += Math.log(vwsp.toNumber());
      count++;
    }

    if (count === 0) {
      return null;
    }

    return roundMoney(new Big(Math.exp(logSum / count)));
  }

  private assertAvailable(symbol: string): void {
    if (this.stocks.has(symbol)) {
      throw new DuplicateSymbolError(symbol);
    }
  }

  private register(stock: Stock): Stock {
    this.stocks.set(stock.symbol, stock);
    logger.debug('종목 등록', {
      symbol: stock.symbol,
      type: stock.type,
      parValuePennies: stock.parValuePennies,
    });
    return stock;
  }
}
