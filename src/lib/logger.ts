export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

function isDebugEnabled(): boolean {
  // Enable with TILE_BUNDLER_DEBUG=1 or NODE_ENV=development
  const flag = process.env.TILE_BUNDLER_DEBUG;
  if (flag !== undefined && flag !== '' && flag !== '0' && flag !== 'false') return true;
  return process.env.NODE_ENV === 'development';
}

export const logger = {
  debug: (...args: unknown[]): void => {
    if (isDebugEnabled()) {
      console.debug('[DEBUG]', ...args);
    }
  },
  info: (...args: unknown[]): void => {
    console.info('[INFO]', ...args);
  },
  warn: (...args: unknown[]): void => {
    console.warn('[WARN]', ...args);
  },
  error: (...args: unknown[]): void => {
    console.error('[ERROR]', ...args);
  },
};
