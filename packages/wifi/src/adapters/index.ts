/**
 * Wi-Fi adapters
 *
 * - {@link ShellNetworkStack} - the host's network tools
 * - {@link SimulatedNetwork} - scripted network for tests
 */

export * from './shell-network-stack.adapter.ts'
export * from './simulated-network-stack.adapter.ts'
