/**
 * Logger accepted by the cache manager. Silent when omitted.
 */
export type CacheLogger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
};

export const silentLogger: CacheLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};
