export * from './power-supply.port.ts'
