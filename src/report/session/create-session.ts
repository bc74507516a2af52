import { configureRootLogger } from '../../logging/subsystem.js';
import { loadConfig, type ReportConfig } from '../config.js';
import { StressReportSession } from './stress-report-session.js';

/**
 * Applies the configured log level and opens a session on the configured
 * output paths.
 */
export function createReportSession(config: ReportConfig = loadConfig()): StressReportSession {
  configureRootLogger({ level: config.logLevel, pretty: config.env === 'development' });
  return new StressReportSession(config.output, config.modelCommand);
}
