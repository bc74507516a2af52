export * from './report-assembler.js';
