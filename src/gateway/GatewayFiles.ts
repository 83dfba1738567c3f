import fs from 'fs/promises'
import path from 'path'
import { Debugger, errorMessage } from '../utils/debug'
import { pathExists } from '../storage/OverlayDiskService'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import {
  APPLY_SCRIPT_FILE,
  ChainStrategy,
  DEFAULT_WG_INTERFACE,
  GatewayConfig,
  GatewayInput,
  GatewayMode,
  GUEST_PROXY_DIR,
  PROXY_CONF_FILE
} from '../types/gateway.types'
import { generateApplyScript } from './ApplyScript'
import { generateProxyConf, validateGatewayConfig } from './ProxyConfigCodec'

const debug = new Debugger('gateway')

/**
 * Files placed in a role directory for the gateway
 */
export interface StagedGateway {
  config: GatewayConfig
  /** Names of the files copied into the role directory */
  copiedFiles: string[]
  warnings: string[]
}

/**
 * Builds the gateway config a caller's input describes. VPN files are
 * referenced by their guest path (`/proxy/<basename>`).
 * @throws ProvisionError INVALID_CONFIG
 */
export function buildGatewayConfig (role: string, input: GatewayInput): GatewayConfig {
  if (input.mode !== GatewayMode.PROXY_CHAIN && input.configFile.trim().length === 0) {
    const mode = input.mode === GatewayMode.WIREGUARD ? 'WireGuard' : 'OpenVPN'
    throw new ProvisionError(ProvisionErrorCode.INVALID_CONFIG, `${mode} mode requires a ${mode} config file`, role)
  }

  const config: GatewayConfig = {
    role,
    gatewayMode: input.mode,
    chainStrategy: ChainStrategy.STRICT,
    hops: []
  }

  switch (input.mode) {
    case GatewayMode.PROXY_CHAIN:
      config.chainStrategy = input.chainStrategy ?? ChainStrategy.STRICT
      config.hops = input.hops.map((hop, position) => ({ ...hop, index: position + 1 }))
      break
    case GatewayMode.WIREGUARD:
      config.wireguard = {
        configPath: guestPath(input.configFile),
        interfaceName: input.interfaceName !== undefined && input.interfaceName.length > 0
          ? input.interfaceName
          : DEFAULT_WG_INTERFACE,
        routeAllTraffic: input.routeAllTraffic ?? false
      }
      break
    case GatewayMode.OPENVPN:
      config.openvpn = {
        configPath: guestPath(input.configFile),
        routeAllTraffic: input.routeAllTraffic ?? false
      }
      if (input.authFile !== undefined && input.authFile.length > 0) {
        config.openvpn.authFile = guestPath(input.authFile)
      }
      break
  }

  validateGatewayConfig(config)
  return config
}

/**
 * Copies the VPN files named by `input` into the role directory and builds
 * the matching config. A failed auth file copy is only a warning.
 * @param onCopy - Called with each file name before that file is copied
 */
export async function stageGatewayFiles (
  role: string,
  input: GatewayInput,
  roleDir: string,
  onCopy?: (name: string) => void
): Promise<StagedGateway> {
  const config = buildGatewayConfig(role, input)
  const staged: StagedGateway = { config, copiedFiles: [], warnings: [] }

  if (input.mode === GatewayMode.PROXY_CHAIN) {
    return staged
  }

  const copied = await copyIntoRoleDir(input.configFile, roleDir, onCopy)
  if (copied !== null) {
    staged.copiedFiles.push(copied)
  }

  if (input.mode === GatewayMode.OPENVPN && input.authFile !== undefined && input.authFile.length > 0) {
    try {
      const auth = await copyIntoRoleDir(input.authFile, roleDir, onCopy)
      if (auth !== null) {
        staged.copiedFiles.push(auth)
      }
    } catch (error) {
      const warning = `Failed to copy auth file: ${errorMessage(error)}`
      debug.log('warn', warning)
      staged.warnings.push(warning)
    }
  }

  return staged
}

/**
 * Writes proxy.conf and the executable apply-proxy.sh into the role
 * directory, creating it when needed.
 * @returns The names of the files written
 */
export async function writeGatewayConfigFiles (config: GatewayConfig, roleDir: string): Promise<string[]> {
  try {
    await fs.mkdir(roleDir, { recursive: true })
    await fs.writeFile(path.join(roleDir, PROXY_CONF_FILE), generateProxyConf(config))
    const script = path.join(roleDir, APPLY_SCRIPT_FILE)
    await fs.writeFile(script, generateApplyScript(config.role))
    await fs.chmod(script, 0o755)
  } catch (error) {
    throw new ProvisionError(
      ProvisionErrorCode.IO_ERROR,
      `Failed to write gateway config to ${roleDir}: ${errorMessage(error)}`,
      roleDir
    )
  }
  debug.log(`Wrote ${PROXY_CONF_FILE} and ${APPLY_SCRIPT_FILE} for role ${config.role}`)
  return [PROXY_CONF_FILE, APPLY_SCRIPT_FILE]
}

/**
 * Reads a role's proxy.conf.
 * @throws ProvisionError NOT_FOUND
 */
export async function readProxyConf (roleDir: string): Promise<string> {
  const file = path.join(roleDir, PROXY_CONF_FILE)
  try {
    return await fs.readFile(file, 'utf8')
  } catch {
    throw new ProvisionError(ProvisionErrorCode.NOT_FOUND, `Gateway config not found: ${file}`, file)
  }
}

function guestPath (file: string): string {
  return path.posix.join(GUEST_PROXY_DIR, path.basename(file))
}

/**
 * Copies a host file into the role directory.
 * @returns The copied file name, or null when `source` is not a file on the
 * host (it is then taken to name a file already in the role directory)
 */
async function copyIntoRoleDir (
  source: string,
  roleDir: string,
  onCopy?: (name: string) => void
): Promise<string | null> {
  if (!await pathExists(source) || !(await fs.stat(source)).isFile()) {
    return null
  }

  const name = path.basename(source)
  const destination = path.join(roleDir, name)
  if (path.resolve(source) === path.resolve(destination)) {
    return null
  }

  onCopy?.(name)
  try {
    await fs.mkdir(roleDir, { recursive: true })
    await fs.copyFile(source, destination)
  } catch (error) {
    throw new ProvisionError(
      ProvisionErrorCode.IO_ERROR,
      `Failed to copy ${source} to ${roleDir}: ${errorMessage(error)}`,
      source
    )
  }
  debug.log(`Copied ${source} to ${destination}`)
  return name
}
