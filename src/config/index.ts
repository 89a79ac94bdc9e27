import path from 'path';
import dotenv from 'dotenv';
dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface Config {
  version: string;
  logLevel: LogLevel;
  reportTitlePrefix: string;
  defaultCslPath: string;
  snippetMaxLength: number;
  summaryTitleMaxLength: number;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const parseLogLevel = (value: string | undefined): LogLevel =>
  LOG_LEVELS.find(level => level === value?.toLowerCase()) ?? 'info';

const parseLength = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
};

export const config: Config = {
  version: process.env.npm_package_version || '0.1.0',
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  reportTitlePrefix: process.env.REPORT_TITLE_PREFIX || 'ASTRA',
  defaultCslPath: process.env.DEFAULT_CSL_PATH
    ? path.resolve(process.env.DEFAULT_CSL_PATH)
    : path.resolve(__dirname, '../../assets/csl/apa.csl'),
  snippetMaxLength: parseLength(process.env.SNIPPET_MAX_LENGTH, 500),
  summaryTitleMaxLength: parseLength(process.env.SUMMARY_TITLE_MAX_LENGTH, 60),
};

export default config;
