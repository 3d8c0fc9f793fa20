import type { DugoutBotConfig } from './types.js';
import { configSourceLabel, loadConfigStrict } from './io.js';

import { createLogger, setLogLevel } from '../logger.js';

const log = createLogger('Config');
export type ExitFn = (code: number) => never;

/**
 * Load config for app/CLI entrypoints. On invalid config, print one
 * consistent error and terminate.
 */
export function loadAppConfigOrExit(exitFn: ExitFn = process.exit): DugoutBotConfig {
  try {
    const config = loadConfigStrict();
    if (config.server.logLevel) {
      setLogLevel(config.server.logLevel);
    }
    return config;
  } catch (err) {
    const source = configSourceLabel();
    log.error(`Failed to load ${source}:`, err);
    log.error(`Fix the errors above in ${source} and restart.`);
    return exitFn(1);
  }
}
