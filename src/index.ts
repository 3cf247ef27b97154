export * from './ai';
export { LogHandler } from './utilities/log-handler';
export { LogManager, LogType } from './utilities/log-manager';
export type { ILogMessage, LogMessageCallback } from './utilities/log-manager';
