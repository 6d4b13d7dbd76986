export * from './network-stack.port.ts'
