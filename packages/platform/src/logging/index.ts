export * as Logging from './logging.ts'
export { LogThreshold, parseLogLevel } from './logging.ts'
