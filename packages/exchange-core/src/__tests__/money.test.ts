import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { isPennies, penniesToMajor, ratio, roundMoney } from '../money.js';

describe('Money', () => {
  describe('roundMoney', () => {
    it('0.005는 0.01로 반올림 (ROUND_HALF_UP)', () => {
      expect(roundMoney(new Big('0.005')).toFixed(2)).toBe('0.01');
    });

    it('0.004는 0.00으로 내림', () => {
      expect(roundMoney(new Big('0.004')).toFixed(2)).toBe('0.00');
    });

    it('이진 부동소수점 오차 없이 2.675 → 2.68', () => {
      expect(roundMoney(new Big('2.675')).toFixed(2)).toBe('2.68');
    });

    it('이미 소수점 2자리인 값은 그대로 (멱등성)', () => {
      for (const value of ['0.00', '1.23', '99.99', '100.03', '123456789.01']) {
        const once = roundMoney(new Big(value));
        expect(once.eq(new Big(value))).toBe(true);
        expect(roundMoney(once).eq(once)).toBe(true);
      }
    });
  });

  describe('ratio', () => {
    it('반올림하지 않은 비율을 반환해야 함', () => {
      expect(ratio(10000, 8).toString()).toBe('1250');
      expect(ratio(100, 23).toFixed(6)).toBe('4.347826');
    });
  });

  describe('penniesToMajor', () => {
    it('페니를 통화 단위로 변환', () => {
      expect(penniesToMajor(10003).toString()).toBe('100.03');
      expect(penniesToMajor(new Big(5)).toString()).toBe('0.05');
    });
  });

  describe('isPennies', () => {
    it('양의 정수만 허용 (기본)', () => {
      expect(isPennies(1)).toBe(true);
      expect(isPennies(0)).toBe(false);
      expect(isPennies(-5)).toBe(false);
      expect(isPennies(1.5)).toBe(false);
      expect(isPennies(NaN)).toBe(false);
    });

    it('allowZero이면 0도 허용', () => {
      expect(isPennies(0, { allowZero: true })).toBe(true);
      expect(isPennies(-1, { allowZero: true })).toBe(false);
    });
  });
});
