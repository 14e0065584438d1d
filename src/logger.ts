import pino from 'pino';

// Quiet under the test runner unless a level is asked for explicitly.
const level = process.env.LOG_LEVEL ?? (process.env.VITEST ? 'silent' : 'info');

export function createLogger(name: string): pino.Logger {
  return pino({ name, level, base: { service: 'trust-risk-engine' } });
}
