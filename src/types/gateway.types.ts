/**
 * Gateway configuration types: what the gateway VM reads from
 * `/proxy/proxy.conf` at boot.
 */

/** File names inside every role directory */
export const PROXY_CONF_FILE = 'proxy.conf'
export const APPLY_SCRIPT_FILE = 'apply-proxy.sh'

/** Mount point of the role directory inside the gateway */
export const GUEST_PROXY_DIR = '/proxy'

/** Upper bound on proxychains hops */
export const MAX_PROXY_HOPS = 8

/** Port used when a parsed hop carries an unusable port */
export const DEFAULT_PROXY_PORT = 1080

/** Interface name used when a WireGuard config does not say */
export const DEFAULT_WG_INTERFACE = 'wg0'

/**
 * How the gateway forwards role traffic
 */
export enum GatewayMode {
  PROXY_CHAIN = 'PROXY_CHAIN',
  WIREGUARD = 'WIREGUARD',
  OPENVPN = 'OPENVPN'
}

export enum ProxyType {
  SOCKS5 = 'SOCKS5',
  HTTP = 'HTTP'
}

/**
 * proxychains chain mode
 */
export enum ChainStrategy {
  STRICT = 'strict_chain',
  DYNAMIC = 'dynamic_chain',
  RANDOM = 'random_chain'
}

/**
 * One proxy in the chain
 */
export interface ProxyHop {
  /** 1-based position in the chain */
  index: number
  proxyType: ProxyType
  host: string
  port: number
  username?: string
  password?: string
  label?: string
}

export interface WireGuardConfig {
  /** Path as seen by the guest, e.g. /proxy/wg0.conf */
  configPath: string
  interfaceName: string
  routeAllTraffic: boolean
}

export interface OpenVpnConfig {
  /** Path as seen by the guest, e.g. /proxy/client.ovpn */
  configPath: string
  authFile?: string
  routeAllTraffic: boolean
}

/**
 * Complete gateway configuration of a role
 */
export interface GatewayConfig {
  role: string
  gatewayMode: GatewayMode
  chainStrategy: ChainStrategy
  hops: ProxyHop[]
  wireguard?: WireGuardConfig
  openvpn?: OpenVpnConfig
}

/**
 * Gateway settings as a caller supplies them. VPN paths point at files on
 * the host; they are copied into the role directory and rewritten to guest
 * paths before the config is written.
 */
export type GatewayInput =
  | {
    mode: GatewayMode.PROXY_CHAIN
    hops: Array<Omit<ProxyHop, 'index'>>
    chainStrategy?: ChainStrategy
  }
  | {
    mode: GatewayMode.WIREGUARD
    configFile: string
    interfaceName?: string
    routeAllTraffic?: boolean
  }
  | {
    mode: GatewayMode.OPENVPN
    configFile: string
    authFile?: string
    routeAllTraffic?: boolean
  }
