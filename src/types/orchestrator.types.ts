/**
 * Provisioning Orchestrator Type Definitions
 */

import { GatewayConfig, GatewayInput } from './gateway.types'
import { RoleOverrides } from './role.types'

/** Pause between stopping and starting a gateway on restart */
export const DEFAULT_RESTART_DELAY_MS = 500

/** App overlay ordinals always probed by deleteRole */
export const MIN_APP_OVERLAY_SWEEP = 20

/**
 * Stages reported through `progress` events
 */
export enum ProvisionStage {
  VALIDATING = 'validating',
  NETWORK_READY = 'network_ready',
  CONFIG_WRITTEN = 'config_written',
  DISK_READY = 'disk_ready',
  VM_CREATED = 'vm_created',
  METADATA_SAVED = 'metadata_saved',
  APP_VM_CREATED = 'app_vm_created',
  DONE = 'done',
  FAILED = 'failed',
  ROLLING_BACK = 'rolling_back',
  CANCELLED = 'cancelled'
}

export interface ProgressEvent {
  role: string
  stage: ProvisionStage
  message: string
}

/**
 * Input of RoleOrchestrator.createRole
 */
export interface CreateRoleRequest {
  roleName: string
  gwTemplateId: string
  appTemplateId?: string
  /** Falls back to the app template when absent */
  dispTemplateId?: string
  overrides?: RoleOverrides
  gateway: GatewayInput
  /** Also create `{role}-app-1` */
  createAppVm?: boolean
}

/**
 * A resource created by the current provisioning run
 */
export type LedgerEntry =
  | { kind: 'network', name: string }
  | {
    kind: 'roleDir'
    path: string
    /** Names of the files written into the directory by this run */
    manifest: string[]
  }
  | { kind: 'overlay', path: string }
  | { kind: 'vm', name: string }

export interface FailedCompensation {
  entry: LedgerEntry
  error: string
}

export interface RollbackReport {
  role: string
  /** Entries undone, in the order they were undone */
  compensated: LedgerEntry[]
  failed: FailedCompensation[]
}

export interface CreateRoleResult {
  role: string
  gatewayVm: string
  roleNetwork: string
  /** False when the role network already existed */
  networkCreated: boolean
  gatewayOverlay: string
  roleDir: string
  config: GatewayConfig
  appVm?: string
  warnings: string[]
}

/**
 * Outcome of one deleteRole step
 */
export interface TeardownStep {
  step: string
  ok: boolean
  error?: string
}

export interface DeleteRoleReport {
  role: string
  steps: TeardownStep[]
}

export interface AppVmRequest {
  /** Overrides the role's app template */
  templateId?: string
  ramMb?: number
  /** Host directory shared into the guest as `shared` */
  shareDir?: string
}

export interface AppVmResult {
  name: string
  appNumber: number
  overlayPath: string
  warnings: string[]
}

export interface DisposableVmResult {
  name: string
  overlayPath: string
}

export interface UpdateGatewayOptions {
  /** Restart the gateway VM so it picks up the new config */
  restart?: boolean
}

export interface UpdateGatewayResult {
  config: GatewayConfig
  files: string[]
  restarted: boolean
  warnings: string[]
}

export interface VmActionResult {
  name: string
  /** False when the VM already was in the requested state */
  changed: boolean
  warning?: string
}
