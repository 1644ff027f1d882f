export type Logger = {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export function defaultLogger(): Logger {
  return {
    info: (...args: unknown[]) => console.log(...args),
    warn: (...args: unknown[]) => console.warn(...args),
    error: (...args: unknown[]) => console.error(...args),
  };
}

export function silentLogger(): Logger {
  const noop = () => {};
  return { info: noop, warn: noop, error: noop };
}
