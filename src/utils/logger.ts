import type { Logger } from '../control-plane/types.js';

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(`  [warn] ${message}`),
  error: (message) => console.error(`  [FAIL] ${message}`),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
