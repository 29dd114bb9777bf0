/**
 * Scoped debug logging. Loggers are created once per module and stay silent
 * unless debug mode was on when they were created.
 */

// Accepted (case-insensitive) values of PACKEDVEC_DEBUG.
const ENABLED_VALUES = new Set(['1', 'true', 'yes', 'on']);

export type Logger = {
  readonly scope: string;
  readonly enabled: boolean;
  log: (...args: unknown[]) => void;
};

/**
 * Debug mode is on when `globalThis.__PACKEDVEC_DEBUG === true`, or when
 * `PACKEDVEC_DEBUG` holds one of `1`, `true`, `yes`, `on`.
 */
export function isDebugMode(): boolean {
  if (Reflect.get(globalThis, '__PACKEDVEC_DEBUG') === true) return true;
  const flag = typeof process === 'undefined' ? undefined : process.env.PACKEDVEC_DEBUG;
  return flag !== undefined && ENABLED_VALUES.has(flag.trim().toLowerCase());
}

export function createLogger(scope: string, forceEnable = false): Logger {
  const enabled = forceEnable || isDebugMode();
  const tag = `[${scope}]`;
  return {
    scope,
    enabled,
    log: enabled ? (...args) => console.log(tag, ...args) : () => {}
  };
}
