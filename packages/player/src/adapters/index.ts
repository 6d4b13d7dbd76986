export * from './simulated-playback.adapter.ts'
export * from './sqlite-tag-store.adapter.ts'
