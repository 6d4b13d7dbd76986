export * from './playback-backend.port.ts'
export * from './tag-store.port.ts'
