import type { LogLevel } from '@nestjs/common';

export interface ServerConfig {
  host: string;
  port: number;
  corsOrigin: string;
  bodyLimitBytes: number;
}

export interface AnalysisConfig {
  reservedKeywords: string[];
}

export interface AppConfig {
  server: ServerConfig;
  analysis: AnalysisConfig;
  logLevels: LogLevel[];
}

// Nest prints a level and every level more severe than it.
const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((l) => l === level?.toLowerCase());
  return LOG_LEVELS.slice(0, index === -1 ? LOG_LEVELS.indexOf('log') + 1 : index + 1);
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export default (): AppConfig => ({
  server: {
    host: process.env.HOST || '0.0.0.0',
    port: parseInt(process.env.PORT || '3001', 10),
    corsOrigin: process.env.CORS_ORIGIN || 'http://localhost:5173',
    bodyLimitBytes: parseInt(process.env.BODY_LIMIT_MB || '50', 10) * 1024 * 1024,
  },
  analysis: {
    reservedKeywords: parseList(process.env.RESERVED_KEYWORDS),
  },
  logLevels: resolveLogLevels(process.env.LOG_LEVEL),
});
