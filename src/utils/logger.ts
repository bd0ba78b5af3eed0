type Level = 'debug' | 'info' | 'warn' | 'error';

const order: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const isLevel = (value: string | undefined): value is Level =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

// Read from the environment on every call so the logger works before settings validate.
const threshold = () => {
  // Tests only want to hear about problems.
  if (process.env.NODE_ENV === 'test') return order.warn;
  const level = process.env.LOG_LEVEL;
  return isLevel(level) ? order[level] : order.info;
};

const enabled = (level: Level) => order[level] >= threshold();

export const logger = {
  debug: (...args: unknown[]) => {
    if (enabled('debug')) console.debug('[DEBUG]', ...args);
  },
  info: (...args: unknown[]) => {
    if (enabled('info')) console.info('[INFO]', ...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled('warn')) console.warn('[WARN]', ...args);
  },
  error: (...args: unknown[]) => {
    if (enabled('error')) console.error('[ERROR]', ...args);
  },
};
