export * from './gpio-input.port.ts'
export * from './nfc-reader.port.ts'
