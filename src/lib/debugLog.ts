import { env } from '../config/env.js';

export const createDebugLog =
  (tag: string) =>
  (...args: unknown[]): void => {
    if (!env.debugLogs) return;
    console.info(`[${tag}:debug]`, ...args);
  };
