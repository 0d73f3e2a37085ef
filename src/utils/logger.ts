// Simple environment-aware logger for the CLI
// - No-ops unless CLOZE_DRILL_DEBUG=true or NODE_ENV=development
// - Writes to stderr so debug lines never interleave with the drill on stdout

type LogMethod = (...args: unknown[]) => void;

const isDebugEnabled = (): boolean => {
  const dev = process.env.NODE_ENV === 'development';
  const debugFlag = process.env.CLOZE_DRILL_DEBUG;
  return dev || String(debugFlag).toLowerCase() === 'true';
};

const makeMethod = (
  method: 'log' | 'info' | 'warn' | 'error' | 'debug'
): LogMethod => {
  return (...args: unknown[]) => {
    if (!isDebugEnabled()) return;
    console.error(`[${method}]`, ...args);
  };
};

export const logger = {
  log: makeMethod('log'),
  info: makeMethod('info'),
  warn: makeMethod('warn'),
  error: makeMethod('error'),
  debug: makeMethod('debug'),
};

export default logger;
