/**
 * CLI Commands - Public API
 */

export { executeFilterCommand, type FilterCommandDeps } from './filter.js';
export { executeReportCommand, type ReportCommandDeps } from './report.js';
export { executeCleanStagingCommand, type CleanStagingCommandDeps } from './clean-staging.js';
