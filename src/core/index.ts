/**
 * Core Exports
 */

export * from './types.js';
export * from './bot.js';
export * from './conversation-context.js';
export * from './errors.js';
