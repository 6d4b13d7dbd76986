export * from './led-strip.port.ts'
