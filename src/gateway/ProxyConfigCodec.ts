import {
  ChainStrategy,
  DEFAULT_PROXY_PORT,
  DEFAULT_WG_INTERFACE,
  GatewayConfig,
  GatewayMode,
  MAX_PROXY_HOPS,
  ProxyHop,
  ProxyType
} from '../types/gateway.types'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'

const ROLE_HEADER = '# Proxy config for role: '

/** proxy.conf holds one KEY=value per line and is sourced by the guest shell */
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/

/**
 * Renders a gateway config as the `KEY=value` file the gateway sources.
 * Keys of unused modes are written with empty values so the guest script
 * can read every variable unconditionally.
 */
export function generateProxyConf (config: GatewayConfig): string {
  const lines: string[] = [
    `${ROLE_HEADER}${config.role}`,
    `GATEWAY_MODE=${config.gatewayMode}`,
    `CHAIN_STRATEGY=${config.chainStrategy}`,
    `PROXY_COUNT=${config.hops.length}`,
    ''
  ]

  const first = config.hops[0]
  if (config.gatewayMode === GatewayMode.PROXY_CHAIN && first !== undefined) {
    lines.push('# Proxy chain configuration')
    for (const hop of config.hops) {
      const prefix = `PROXY_${hop.index}_`
      lines.push(
        `${prefix}TYPE=${hop.proxyType}`,
        `${prefix}HOST=${hop.host}`,
        `${prefix}PORT=${hop.port}`,
        `${prefix}USER=${hop.username ?? ''}`,
        `${prefix}PASS=${hop.password ?? ''}`,
        `${prefix}LABEL=${hop.label ?? ''}`
      )
    }

    lines.push('', '# First proxy (for compatibility)', `ACTIVE_PROTOCOL=${first.proxyType}`)
    const socks = first.proxyType === ProxyType.SOCKS5 ? first : undefined
    const http = first.proxyType === ProxyType.HTTP ? first : undefined
    lines.push(...compatibilityBlock('SOCKS5', socks), ...compatibilityBlock('HTTP', http))
  } else {
    lines.push(
      '# First proxy (for compatibility)',
      'ACTIVE_PROTOCOL=',
      ...compatibilityBlock('SOCKS5'),
      ...compatibilityBlock('HTTP')
    )
  }

  lines.push('', '# VPN / other modes')
  const wg = config.wireguard
  lines.push(
    `WG_CONFIG_PATH=${wg?.configPath ?? ''}`,
    `WG_INTERFACE_NAME=${wg?.interfaceName ?? ''}`,
    `WG_ROUTE_ALL_TRAFFIC=${wg !== undefined ? String(wg.routeAllTraffic) : ''}`
  )
  const ovpn = config.openvpn
  lines.push(
    `OPENVPN_CONFIG_PATH=${ovpn?.configPath ?? ''}`,
    `OPENVPN_AUTH_FILE=${ovpn?.authFile ?? ''}`,
    `OPENVPN_ROUTE_ALL_TRAFFIC=${ovpn !== undefined ? String(ovpn.routeAllTraffic) : ''}`
  )

  return lines.join('\n')
}

function compatibilityBlock (prefix: 'SOCKS5' | 'HTTP', hop?: ProxyHop): string[] {
  return [
    `${prefix}_HOST=${hop?.host ?? ''}`,
    `${prefix}_PORT=${hop !== undefined ? hop.port : ''}`,
    `${prefix}_USER=${hop?.username ?? ''}`,
    `${prefix}_PASS=${hop?.password ?? ''}`
  ]
}

/**
 * Splits `KEY=value` lines on the first `=`. Comments and blank lines are
 * skipped; values are kept verbatim apart from surrounding whitespace.
 */
export function parseKeyValues (text: string): Map<string, string> {
  const values = new Map<string, string>()
  for (const raw of text.split('\n')) {
    const line = raw.trim()
    if (line.length === 0 || line.startsWith('#')) {
      continue
    }
    const separator = line.indexOf('=')
    if (separator < 0) {
      continue
    }
    values.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim())
  }
  return values
}

/**
 * Reads a proxy.conf back into a GatewayConfig.
 * @param role - Role name; taken from the header comment when omitted
 */
export function parseProxyConf (text: string, role?: string): GatewayConfig {
  const values = parseKeyValues(text)
  const get = (key: string): string => values.get(key) ?? ''
  const optional = (key: string): string | undefined => {
    const value = get(key)
    return value.length > 0 ? value : undefined
  }

  const config: GatewayConfig = {
    role: role ?? roleFromHeader(text),
    gatewayMode: parseGatewayMode(get('GATEWAY_MODE')),
    chainStrategy: parseChainStrategy(get('CHAIN_STRATEGY')),
    hops: []
  }

  const count = Math.min(parseInt(get('PROXY_COUNT'), 10) || 0, MAX_PROXY_HOPS)
  for (let index = 1; index <= count; index++) {
    const host = get(`PROXY_${index}_HOST`)
    if (host.length === 0) {
      continue
    }
    const hop: ProxyHop = {
      index,
      proxyType: get(`PROXY_${index}_TYPE`).toUpperCase() === ProxyType.HTTP ? ProxyType.HTTP : ProxyType.SOCKS5,
      host,
      port: parsePort(get(`PROXY_${index}_PORT`))
    }
    const username = optional(`PROXY_${index}_USER`)
    const password = optional(`PROXY_${index}_PASS`)
    const label = optional(`PROXY_${index}_LABEL`)
    if (username !== undefined) hop.username = username
    if (password !== undefined) hop.password = password
    if (label !== undefined) hop.label = label
    config.hops.push(hop)
  }

  const wgPath = optional('WG_CONFIG_PATH')
  if (wgPath !== undefined) {
    config.wireguard = {
      configPath: wgPath,
      interfaceName: optional('WG_INTERFACE_NAME') ?? DEFAULT_WG_INTERFACE,
      routeAllTraffic: get('WG_ROUTE_ALL_TRAFFIC') === 'true'
    }
  }

  const ovpnPath = optional('OPENVPN_CONFIG_PATH')
  if (ovpnPath !== undefined) {
    config.openvpn = {
      configPath: ovpnPath,
      routeAllTraffic: get('OPENVPN_ROUTE_ALL_TRAFFIC') === 'true'
    }
    const authFile = optional('OPENVPN_AUTH_FILE')
    if (authFile !== undefined) {
      config.openvpn.authFile = authFile
    }
  }

  return config
}

/**
 * Checks a gateway config before it is written.
 * @throws ProvisionError INVALID_CONFIG
 */
export function validateGatewayConfig (config: GatewayConfig): void {
  const fail = (message: string): never => {
    throw new ProvisionError(ProvisionErrorCode.INVALID_CONFIG, message, config.role)
  }
  const checkLine = (owner: string, field: string, value: string | undefined): void => {
    if (value !== undefined && CONTROL_CHARS.test(value)) {
      fail(`${owner}: ${field} contains control characters`)
    }
  }

  switch (config.gatewayMode) {
    case GatewayMode.PROXY_CHAIN:
      if (config.hops.length === 0) {
        fail('Proxy chain requires at least one hop')
      }
      if (config.hops.length > MAX_PROXY_HOPS) {
        fail(`Maximum ${MAX_PROXY_HOPS} proxy hops allowed`)
      }
      for (const hop of config.hops) {
        if (hop.host.trim().length === 0) {
          fail(`Proxy ${hop.index}: host cannot be empty`)
        }
        checkLine(`Proxy ${hop.index}`, 'host', hop.host)
        checkLine(`Proxy ${hop.index}`, 'username', hop.username)
        checkLine(`Proxy ${hop.index}`, 'password', hop.password)
        checkLine(`Proxy ${hop.index}`, 'label', hop.label)
        if (!Number.isInteger(hop.port) || hop.port < 1 || hop.port > 65535) {
          fail(`Proxy ${hop.index}: port must be between 1 and 65535`)
        }
      }
      break
    case GatewayMode.WIREGUARD:
      if (config.wireguard === undefined || config.wireguard.configPath.length === 0) {
        fail('WireGuard mode requires a WireGuard config file')
      }
      checkLine('WireGuard', 'config path', config.wireguard?.configPath)
      checkLine('WireGuard', 'interface name', config.wireguard?.interfaceName)
      break
    case GatewayMode.OPENVPN:
      if (config.openvpn === undefined || config.openvpn.configPath.length === 0) {
        fail('OpenVPN mode requires an OpenVPN config file')
      }
      checkLine('OpenVPN', 'config path', config.openvpn?.configPath)
      checkLine('OpenVPN', 'auth file', config.openvpn?.authFile)
      break
  }
}

function parseGatewayMode (value: string): GatewayMode {
  switch (value) {
    case GatewayMode.WIREGUARD:
      return GatewayMode.WIREGUARD
    case GatewayMode.OPENVPN:
      return GatewayMode.OPENVPN
    default:
      return GatewayMode.PROXY_CHAIN
  }
}

function parseChainStrategy (value: string): ChainStrategy {
  switch (value) {
    case ChainStrategy.DYNAMIC:
      return ChainStrategy.DYNAMIC
    case ChainStrategy.RANDOM:
      return ChainStrategy.RANDOM
    default:
      return ChainStrategy.STRICT
  }
}

function parsePort (value: string): number {
  const port = Number(value)
  return Number.isInteger(port) && port >= 1 && port <= 65535 ? port : DEFAULT_PROXY_PORT
}

function roleFromHeader (text: string): string {
  const header = text.split('\n').find((line) => line.startsWith(ROLE_HEADER))
  return header !== undefined ? header.slice(ROLE_HEADER.length).trim() : ''
}
