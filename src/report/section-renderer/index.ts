export * from './section-renderer.js';
export * from './grouping.js';
export * from './layouts.js';
