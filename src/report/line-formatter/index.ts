export * from './line-formatter.js';
