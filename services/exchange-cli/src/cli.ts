#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { createLogger } from '@exchange/shared-utils';
import { createSampleExchange, penniesToMajor } from '@exchange/core';
import { loadConfig } from './config/env.js';
import { generateExchangeReport } from './format.js';
import {
  buildExchange,
  parsePriceOption,
  parseStockFile,
  parseTradeFile,
  readJsonFile,
} from './loader.js';

const config = loadConfig();
const logger = createLogger('exchange-cli', config.logLevel);
const program = new Command();

const vwspWindow = { minutes: config.vwspWindowMinutes };

program
  .name('exchange')
  .description('주식 지표 계산 CLI (배당 수익률, P/E, VWSP, All-Share Index)')
  .version('1.0.0');

/**
 * 샘플 거래소 데모
 */
program
  .command('demo')
  .description('샘플 종목으로 지표 계산 데모 실행')
  .action(() => {
    try {
      const exchange = createSampleExchange();
      const tea = exchange.getStock('TEA');
      const gin = exchange.getStock('GIN');
      const price = 10000;

      console.log(`TEA 배당 수익률 @${penniesToMajor(price).toFixed(2)}: ${tea.dividendYield(price).toFixed(2)}%`);
      console.log(`GIN 배당 수익률 @${penniesToMajor(price).toFixed(2)}: ${gin.dividendYield(price).toFixed(2)}%`);

      tea.recordTrade(1000, 'BUY', 9550);
      tea.recordTrade(2000, 'SELL', 10230);

      const vwsp = tea.volumeWeightedStockPrice(vwspWindow);
      const index = exchange.allShareIndex(vwspWindow);
      console.log(`TEA VWSP (${config.vwspWindowMinutes}분): ${vwsp ? vwsp.toFixed(2) : '-'}`);
      console.log(`All-Share Index: ${index ? index.toFixed(2) : '-'}`);
    } catch (error) {
      logger.error('데모 실패', error);
      console.error(`❌ 데모 실패: ${error}`);
      process.exit(1);
    }
  });

/**
 * 파일 기반 리포트
 */
program
  .command('report')
  .description('종목/거래 JSON 파일로 지표 리포트 출력')
  .requiredOption('--stocks <file>', '종목 정의 JSON 파일')
  .option('--trades <file>', '거래 JSON 파일')
  .option('--price <pennies>', '수익률/P/E 계산 가격 (페니, 미지정 시 VWSP 사용)')
  .action((options: { stocks: string; trades?: string; price?: string }) => {
    try {
      logger.info('리포트 시작', options);

      const stocks = parseStockFile(readJsonFile(options.stocks));
      const trades = options.trades ? parseTradeFile(readJsonFile(options.trades)) : [];
      const pricePennies = parsePriceOption(options.price);

      const { exchange } = buildExchange({ stocks, trades });
      console.log(generateExchangeReport(exchange, vwspWindow, pricePennies));
    } catch (error) {
      logger.error('리포트 실패', error);
      console.error(`❌ 리포트 실패: ${error}`);
      process.exit(1);
    }
  });

program.parse();
