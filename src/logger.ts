/**
 * Console logger for autodiag.
 *
 * Everything goes to stderr; stdout is reserved for the banner, the prompt
 * data and the streamed diagnosis.
 */

const PREFIX = '[autodiag]';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Whether debug output is enabled through AUTODIAG_DEBUG.
 */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.AUTODIAG_DEBUG;
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
}

/**
 * Create a logger whose lines carry the given scope.
 */
export function createLogger(scope?: string): Logger {
  const tag = scope ? `${PREFIX} [${scope}]` : PREFIX;

  return {
    debug: (message: string, ...args: unknown[]) => {
      if (isDebugEnabled()) {
        console.error(`${tag} ${message}`, ...args);
      }
    },
    info: (message: string, ...args: unknown[]) => {
      console.error(`${tag} ${message}`, ...args);
    },
    error: (message: string, ...args: unknown[]) => {
      console.error(`${tag} error: ${message}`, ...args);
    },
  };
}
