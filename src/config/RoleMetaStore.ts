import fs from 'fs/promises'
import path from 'path'
import { isRecord, numberField, readJsonFile, stringField, writeJsonFile } from '../utils/json'
import { pathExists } from '../storage/OverlayDiskService'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import { CONFIG_VERSION } from '../types/config.types'
import { GatewayMode, PROXY_CONF_FILE } from '../types/gateway.types'
import { ROLE_META_FILE, RoleMeta } from '../types/role.types'

export function roleMetaPath (cfgRoot: string, role: string): string {
  return path.join(cfgRoot, role, ROLE_META_FILE)
}

export function createRoleMeta (roleName: string, gatewayMode: GatewayMode = GatewayMode.PROXY_CHAIN): RoleMeta {
  return { version: CONFIG_VERSION, roleName, gatewayMode, appVmCount: 0 }
}

/**
 * Mints the next app ordinal and records it on `meta`.
 */
export function nextAppNumber (meta: RoleMeta): number {
  meta.appVmCount += 1
  return meta.appVmCount
}

/**
 * @throws ProvisionError NOT_FOUND when the role has no metadata file
 * @throws ProvisionError INVALID_CONFIG when it does not parse
 */
export async function loadRoleMeta (cfgRoot: string, role: string): Promise<RoleMeta> {
  const file = roleMetaPath(cfgRoot, role)
  const data = await readJsonFile(file)
  if (data === null) {
    throw new ProvisionError(ProvisionErrorCode.NOT_FOUND, `Role metadata not found: ${file}`, role)
  }
  if (!isRecord(data)) {
    throw new ProvisionError(ProvisionErrorCode.INVALID_CONFIG, `Role metadata ${file} must hold a JSON object`, role)
  }

  const meta = createRoleMeta(stringField(data, 'roleName') ?? role, parseGatewayMode(stringField(data, 'gatewayMode')))
  meta.version = numberField(data, 'version') ?? CONFIG_VERSION
  meta.appVmCount = Math.max(0, Math.floor(numberField(data, 'appVmCount') ?? 0))

  for (const key of ['gwTemplateId', 'appTemplateId', 'dispTemplateId', 'lanNet'] as const) {
    const value = stringField(data, key)
    if (value !== undefined) {
      meta[key] = value
    }
  }
  for (const key of ['gwRamMb', 'appRamMb', 'gwVcpus'] as const) {
    const value = numberField(data, key)
    if (value !== undefined) {
      meta[key] = value
    }
  }
  return meta
}

export async function saveRoleMeta (cfgRoot: string, meta: RoleMeta): Promise<void> {
  await writeJsonFile(roleMetaPath(cfgRoot, meta.roleName), meta)
}

/**
 * A role exists when its directory holds metadata or a gateway config.
 */
export async function roleExists (cfgRoot: string, role: string): Promise<boolean> {
  const dir = path.join(cfgRoot, role)
  return await pathExists(path.join(dir, ROLE_META_FILE)) || await pathExists(path.join(dir, PROXY_CONF_FILE))
}

/**
 * Names of every role under `cfgRoot`, sorted.
 */
export async function discoverRoles (cfgRoot: string): Promise<string[]> {
  if (!await pathExists(cfgRoot)) {
    return []
  }
  const entries = await fs.readdir(cfgRoot, { withFileTypes: true })

  const roles: string[] = []
  for (const entry of entries) {
    if (entry.isDirectory() && await roleExists(cfgRoot, entry.name)) {
      roles.push(entry.name)
    }
  }
  return roles.sort()
}

function parseGatewayMode (value: string | undefined): GatewayMode {
  return Object.values(GatewayMode).find((mode) => mode === value) ?? GatewayMode.PROXY_CHAIN
}
