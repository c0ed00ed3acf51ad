import Big from 'big.js';

export const MONEY_DECIMALS = 2;
export const PENNIES_PER_UNIT = 100;

/**
 * 금액 반올림 (소수점 2자리, ROUND_HALF_UP)
 *
 * 공개 결과(수익률, VWSP, 지수)에 한 번만 적용한다.
 * 중간 합계/곱에는 적용하지 않는다.
 *
 * @example
 * ```typescript
 * roundMoney(new Big('0.005')).toFixed(2); // '0.01'
 * roundMoney(new Big('100.0333')).toFixed(2); // '100.03'
 * ```
 */
export function roundMoney(value: Big): Big {
  return value.round(MONEY_DECIMALS, Big.roundHalfUp);
}

/**
 * 두 값의 비율 (반올림 없음)
 */
export function ratio(numerator: Big | number, denominator: Big | number): Big {
  return new Big(numerator).div(denominator);
}

/**
 * 페니 → 통화 단위 변환 (반올림 없음)
 */
export function penniesToMajor(pennies: Big | number): Big {
  return new Big(pennies).div(PENNIES_PER_UNIT);
}

export function isPennies(value: number, opts?: { allowZero?: boolean }): boolean {
  if (!Number.isSafeInteger(value)) return false;
  return opts?.allowZero ? value >= 0 : value > 0;
}
