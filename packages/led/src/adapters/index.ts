export * from './simulated-led-strip.adapter.ts'
