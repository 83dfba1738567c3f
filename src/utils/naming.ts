import path from 'path'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import { VmIdentity, VmKind } from '../types/vm.types'
import { ROLE_NETWORK_SUFFIX } from '../types/network.types'

/**
 * Naming conventions shared with the guests and with anything else reading
 * the host's libvirt state. Changing a format here changes it everywhere.
 */

/** Allowed role names after normalization */
export const ROLE_NAME_PATTERN = /^[a-z0-9_-]{1,32}$/

const GATEWAY_SUFFIX = '-gw'
const APP_INFIX = '-app-'
const DISPOSABLE_PREFIX = 'disp-'
const APP_NAME_PATTERN = /^(.+)-app-(\d+)$/
const DISPOSABLE_NAME_PATTERN = /^disp-(.+)-(\d{8}-\d{6})$/

/**
 * Lowercases and strips whitespace from a user-supplied role name.
 */
export function normalizeRoleName (input: string): string {
  return input.trim().toLowerCase().replace(/\s+/g, '')
}

/**
 * Normalizes and validates a role name.
 * @throws ProvisionError INVALID_ROLE_NAME
 */
export function validateRoleName (input: string): string {
  const name = normalizeRoleName(input)
  if (!ROLE_NAME_PATTERN.test(name)) {
    throw new ProvisionError(
      ProvisionErrorCode.INVALID_ROLE_NAME,
      `Invalid role name '${input}': use 1-32 characters from a-z, 0-9, '_' and '-'`,
      input
    )
  }
  return name
}

export function roleNetworkName (role: string): string {
  return `${role}${ROLE_NETWORK_SUFFIX}`
}

export function gatewayVmName (role: string): string {
  return `${role}${GATEWAY_SUFFIX}`
}

export function appVmName (role: string, appNumber: number): string {
  return `${role}${APP_INFIX}${appNumber}`
}

export function disposableVmName (role: string, stamp: string): string {
  return `${DISPOSABLE_PREFIX}${role}-${stamp}`
}

export function gatewayOverlayPath (imagesDir: string, role: string): string {
  return path.join(imagesDir, `${role}-gw.qcow2`)
}

export function appOverlayPath (imagesDir: string, role: string, appNumber: number): string {
  return path.join(imagesDir, `${role}-app-${appNumber}-overlay.qcow2`)
}

export function disposableDir (cfgRoot: string, role: string): string {
  return path.join(cfgRoot, role, 'disposable')
}

export function disposableOverlayPath (cfgRoot: string, role: string, stamp: string): string {
  return path.join(disposableDir(cfgRoot, role), `disp-${stamp}.qcow2`)
}

/**
 * Local-time stamp in `YYYYMMDD-HHMMSS` form.
 */
export function timestampStamp (date: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, '0')
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
}

/**
 * Infers the kind and owning role of a VM from its name.
 *
 * @example
 * parseVmName('work-gw')                    // { kind: PROXY_GATEWAY, role: 'work' }
 * parseVmName('work-app-3')                 // { kind: APP, role: 'work', appNumber: 3 }
 * parseVmName('disp-work-20240101-120000')  // { kind: DISPOSABLE_APP, role: 'work', stamp: '20240101-120000' }
 * parseVmName('win11')                      // { kind: UNMANAGED }
 */
export function parseVmName (name: string): VmIdentity {
  if (name.endsWith(GATEWAY_SUFFIX) && name.length > GATEWAY_SUFFIX.length) {
    return { kind: VmKind.PROXY_GATEWAY, role: name.slice(0, -GATEWAY_SUFFIX.length) }
  }

  const app = APP_NAME_PATTERN.exec(name)
  if (app) {
    return { kind: VmKind.APP, role: app[1], appNumber: Number(app[2]) }
  }

  if (name.startsWith(DISPOSABLE_PREFIX)) {
    const match = DISPOSABLE_NAME_PATTERN.exec(name)
    if (match) {
      return { kind: VmKind.DISPOSABLE_APP, role: match[1], stamp: match[2] }
    }
    return { kind: VmKind.DISPOSABLE_APP }
  }

  return { kind: VmKind.UNMANAGED }
}
