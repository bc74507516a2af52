/**
 * Host hardware queries used by the report preamble.
 */

export * from './model-name.js';
