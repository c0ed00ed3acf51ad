import { z } from 'zod';
import { MAX_SYMBOL_LENGTH, TRADE_INDICATORS } from '@exchange/core';

// 길이는 코드 포인트 단위 (Stock 생성자와 동일)
const SymbolSchema = z.string().refine(
  (symbol) => [...symbol].length >= 1 && [...symbol].length <= MAX_SYMBOL_LENGTH,
  { message: `symbol must be 1-${MAX_SYMBOL_LENGTH} characters` }
);

export const CommonStockSchema = z.object({
  type: z.literal('COMMON'),
  symbol: SymbolSchema,
  lastDividendPennies: z.number().int().nonnegative(),
  parValuePennies: z.number().int().positive(),
});

export const PreferredStockSchema = z.object({
  type: z.literal('PREFERRED'),
  symbol: SymbolSchema,
  lastDividendPennies: z.number().int().nonnegative(),
  fixedDividendRate: z.number().positive().max(1),
  parValuePennies: z.number().int().positive(),
});

export const StockDefinitionSchema = z.discriminatedUnion('type', [
  CommonStockSchema,
  PreferredStockSchema,
]);

export const StockFileSchema = z.array(StockDefinitionSchema);

// secondsAgo: 기준 시각으로부터 몇 초 전에 체결됐는지 (기본 0)
export const TradeInputSchema = z.object({
  symbol: SymbolSchema,
  quantity: z.number().int().positive(),
  indicator: z.enum(TRADE_INDICATORS),
  pricePennies: z.number().int().positive(),
  secondsAgo: z.number().nonnegative().default(0),
});

export const TradeFileSchema = z.array(TradeInputSchema);

export type TradeInput = z.infer<typeof TradeInputSchema>;
