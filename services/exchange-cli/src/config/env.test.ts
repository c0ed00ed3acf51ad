import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadConfig } from './env.js';

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('기본값: 5분 윈도우, INFO', () => {
    vi.stubEnv('VWSP_WINDOW_MINUTES', '');
    vi.stubEnv('LOG_LEVEL', '');

    expect(loadConfig()).toEqual({ vwspWindowMinutes: 5, logLevel: 'INFO' });
  });

  it('환경 변수 적용', () => {
    vi.stubEnv('VWSP_WINDOW_MINUTES', '15');
    vi.stubEnv('LOG_LEVEL', 'debug');

    expect(loadConfig()).toEqual({ vwspWindowMinutes: 15, logLevel: 'DEBUG' });
  });

  it('윈도우가 0 이하이면 에러', () => {
    vi.stubEnv('VWSP_WINDOW_MINUTES', '0');

    expect(() => loadConfig()).toThrow('VWSP_WINDOW_MINUTES must be positive, got: 0');
  });

  it('숫자가 아니면 에러', () => {
    vi.stubEnv('VWSP_WINDOW_MINUTES', 'five');

    expect(() => loadConfig()).toThrow('Environment variable VWSP_WINDOW_MINUTES must be a number');
  });
});
