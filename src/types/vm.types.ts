/**
 * VM Type Definitions
 *
 * Descriptors are re-derived from `virsh` output on every query and never
 * cached. Role and kind come from the VM name alone (see `parseVmName`).
 */

/**
 * VM run state as reported by `virsh dominfo`
 */
export enum VmState {
  RUNNING = 'running',
  PAUSED = 'paused',
  SHUT_OFF = 'shut_off',
  UNKNOWN = 'unknown'
}

/**
 * What a VM is for, inferred from its name
 */
export enum VmKind {
  PROXY_GATEWAY = 'proxy_gateway',
  APP = 'app',
  DISPOSABLE_APP = 'disposable_app',
  /** Any VM that does not follow the role naming convention */
  UNMANAGED = 'unmanaged'
}

/**
 * Parsed identity of a VM name
 */
export interface VmIdentity {
  kind: VmKind
  role?: string
  /** Ordinal of an app VM (`{role}-app-{n}`) */
  appNumber?: number
  /** Launch stamp of a disposable VM (`YYYYMMDD-HHMMSS`) */
  stamp?: string
}

/**
 * Information about a single VM
 */
export interface VmInfo extends VmIdentity {
  name: string
  state: VmState
}

/**
 * Options shared by the three VM creation operations
 */
export interface CreateVmOptions {
  name: string
  diskPath: string
  ramMb: number
  osVariant: string
  /** Defaults to 1 for gateways, 2 otherwise */
  vcpus?: number
}

export interface CreateGatewayVmOptions extends CreateVmOptions {
  /** Shared ingress network (first NIC) */
  lanNet: string
  /** Role network (second NIC) */
  roleNet: string
  /** Host directory shared into the guest as the `proxy` mount tag */
  roleDir: string
}

export interface CreateAppVmOptions extends CreateVmOptions {
  roleNet: string
  /** Optional host directory shared into the guest as `shared` */
  shareDir?: string
}

export type CreateDisposableVmOptions = CreateAppVmOptions

/**
 * Maps a `State:` value from `virsh dominfo` to a VmState.
 * Anything unrecognized is UNKNOWN.
 */
export function parseVmState (value: string): VmState {
  switch (value.trim().toLowerCase()) {
    case 'running':
      return VmState.RUNNING
    case 'paused':
      return VmState.PAUSED
    case 'shut off':
    case 'shutoff':
      return VmState.SHUT_OFF
    default:
      return VmState.UNKNOWN
  }
}
