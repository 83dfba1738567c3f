/**
 * Network-related type definitions for libvirt virtual networks.
 */

/** Suffix of every role's private network */
export const ROLE_NETWORK_SUFFIX = '-inet'

/**
 * Network state as reported by `virsh net-info`
 */
export enum NetworkState {
  ACTIVE = 'active',
  INACTIVE = 'inactive',
  UNKNOWN = 'unknown'
}

/**
 * Information about a libvirt network
 */
export interface NetworkInfo {
  name: string
  state: NetworkState
  autostart: boolean
  /** Host bridge device, when libvirt reports one */
  bridge?: string
}

/**
 * Result of a TCP reachability probe
 */
export interface TcpProbeResult {
  host: string
  port: number
  /** Address that accepted the connection */
  address: string
  /** Time to connect, in milliseconds */
  latencyMs: number
}
