const PREFIX = '[FlatGraph]';

function envDebugEnabled(): boolean {
  return typeof process !== 'undefined' && process.env?.FLATGRAPH_DEBUG === '1';
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

/**
 * Console-backed logger. Debug output needs `enabled` or `FLATGRAPH_DEBUG=1`.
 */
export function createLogger(scope: string, enabled = false): Logger {
  const tag = `${PREFIX}[${scope}]`;
  const debugOn = enabled || envDebugEnabled();
  return {
    debug(message, ...details) {
      if (!debugOn) return;
      console.debug(`${tag} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${tag} ${message}`, ...details);
    },
  };
}
