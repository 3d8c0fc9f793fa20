/**
 * Message understanding: extractors, classifier, confidence gate,
 * translator and the parser that ties them together.
 */

export * from './extractors.js';
export * from './classifier.js';
export * from './confidence.js';
export * from './translator.js';
export * from './responses.js';
export * from './command-parser.js';
