export * from './csv-appender.js';
