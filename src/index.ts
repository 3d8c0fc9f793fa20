export * from './core/index.js';
export * from './nlp/index.js';
export * from './channels/index.js';
export * from './config/index.js';
export { createLogger, setLogLevel, type Logger } from './logger.js';
