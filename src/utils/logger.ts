/**
 * Console logger gated by the solver debug level.
 * Level 1 messages are progress milestones; level 2 messages are per-node traces.
 */

export type DebugLevel = 0 | 1 | 2;

export interface Logger {
  info(message: string): void; // debugLevel >= 1
  debug(message: string): void; // debugLevel >= 2
}

export function createLogger(scope: string, debugLevel: DebugLevel): Logger {
  const tag = `[${scope}]`;
  return {
    info(message) {
      if (debugLevel >= 1) console.log(`${tag} ${message}`);
    },
    debug(message) {
      if (debugLevel >= 2) console.log(`${tag} ${message}`);
    },
  };
}
