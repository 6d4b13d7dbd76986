/**
 * Input adapters
 *
 * - {@link SysfsGpio} - buttons on `/sys/class/gpio`
 * - {@link SimulatedGpio}, {@link SimulatedNfc} - scripted inputs for tests
 */

export * from './simulated-gpio.adapter.ts'
export * from './simulated-nfc.adapter.ts'
export * from './sysfs-gpio.adapter.ts'
