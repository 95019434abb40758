export * from './types/statement-analytics';
export * from './types/health';
