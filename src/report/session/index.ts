export * from './stress-report-session.js';
export * from './create-session.js';
