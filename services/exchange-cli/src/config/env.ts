import { env as readEnv, envNumber, parseLogLevel } from '@exchange/shared-utils';
import type { LogLevel } from '@exchange/shared-utils';

export type CliConfig = {
  vwspWindowMinutes: number;
  logLevel: LogLevel;
};

const DEFAULT_VWSP_WINDOW_MINUTES = 5;

export function loadConfig(): CliConfig {
  const vwspWindowMinutes = envNumber('VWSP_WINDOW_MINUTES', DEFAULT_VWSP_WINDOW_MINUTES);
  if (vwspWindowMinutes <= 0) {
    throw new Error(`VWSP_WINDOW_MINUTES must be positive, got: ${vwspWindowMinutes}`);
  }

  return {
    vwspWindowMinutes,
    logLevel: parseLogLevel(readEnv('LOG_LEVEL')),
  };
}
