/**
 * Stress Report - Type Definitions
 */

export * from './stat-record.js';
export * from './category.js';
export * from './report-snapshot.js';
export * from './output-target.js';
