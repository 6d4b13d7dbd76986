export * from './simulated-power-supply.adapter.ts'
export * from './sysfs-power-supply.adapter.ts'
