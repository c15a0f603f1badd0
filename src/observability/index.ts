export { ContextLogger } from './context-logger.js';
export type { ContextLoggerOptions, WritableOutput } from './context-logger.js';
