/**
 * Text Processing Module
 *
 * Exports the text normalizer.
 */

export * from './normalize.js';
