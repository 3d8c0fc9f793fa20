/**
 * Channel Adapters
 */

export * from './groupme.js';
