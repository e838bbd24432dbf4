export { createCli, DEFAULT_CONFIG_PATH, type CreateCliOptions } from './cli/index.js';
export { DEFAULT_USER_AGENT, LOG_LEVELS, loadServiceSettings, type LogLevel, type ServiceSettings } from './config.js';
export * from './extraction/index.js';
export { createServer, type CreateServerOptions } from './http/server.js';
export { createLogger, type CreateLoggerOptions, type Logger } from './logger.js';
export { parsePage, type CheerioPageDocument } from './pages/cheerio-page.js';
export { createHttpPageSource, fetchPage, type FetchSettings, type FetchedPage } from './pages/fetcher.js';
export {
  REPORT_FILE_PREFIX,
  formatReportTimestamp,
  renderContactReport,
  resolveReportPath,
  writeContactReport
} from './report/csv-writer.js';
