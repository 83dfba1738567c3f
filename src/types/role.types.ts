import { GatewayMode } from './gateway.types'

/** Metadata file name inside a role directory */
export const ROLE_META_FILE = 'role-meta.json'

/**
 * Persisted description of a role. The role directory holding this file
 * (or a proxy.conf) is what makes a role exist.
 */
export interface RoleMeta {
  version: number
  roleName: string
  gwTemplateId?: string
  appTemplateId?: string
  dispTemplateId?: string
  /** Overrides of the global config */
  lanNet?: string
  gwRamMb?: number
  appRamMb?: number
  gwVcpus?: number
  gatewayMode: GatewayMode
  /** Highest app ordinal ever minted. Never decremented. */
  appVmCount: number
}

/**
 * Per-role overrides accepted at creation time
 */
export interface RoleOverrides {
  lanNet?: string
  gwRamMb?: number
  appRamMb?: number
  gwVcpus?: number
}
