/**
 * Configuration type definitions for the host-wide settings and the
 * resource adapter.
 */

/** Version written into every persisted config and metadata file */
export const CONFIG_VERSION = 1

/** Per-role configuration root, relative to the user's home directory */
export const DEFAULT_CFG_ROOT_NAME = 'VMS/rolevirt-roles'

/** Config file location, relative to the user's config directory */
export const DEFAULT_CONFIG_FILE = 'rolevirt/config.json'

/** Default location of qcow2 templates and overlays */
export const DEFAULT_IMAGES_DIR = '/var/lib/libvirt/images'

/** Default shared ingress network */
export const DEFAULT_LAN_NET = 'lan-net'

export const DEFAULT_GATEWAY_RAM_MB = 1024
export const DEFAULT_APP_RAM_MB = 2048
export const DEFAULT_DISP_RAM_MB = 2048
export const DEFAULT_DEBIAN_OS_VARIANT = 'debian12'
export const DEFAULT_FEDORA_OS_VARIANT = 'fedora40'

/** Lowest RAM values accepted by validateGlobalConfig */
export const MIN_GATEWAY_RAM_MB = 128
export const MIN_APP_RAM_MB = 256
export const MIN_DISP_RAM_MB = 256

/** Default TCP connect timeout for proxy hop probes */
export const DEFAULT_CONNECT_TIMEOUT_MS = 5000

/** Default elevation launcher */
export const DEFAULT_ELEVATION_COMMAND = 'pkexec'

/**
 * Defaults applied when a role or template does not say otherwise
 */
export interface ConfigDefaults {
  gatewayRamMb: number
  appRamMb: number
  dispRamMb: number
  debianOsVariant: string
  fedoraOsVariant: string
}

/**
 * Host-wide configuration
 */
export interface GlobalConfig {
  version: number
  /** Directory holding one subdirectory per role */
  cfgRoot: string
  /** Directory holding templates and overlays */
  imagesDir: string
  /** Shared ingress network every gateway attaches to */
  lanNet: string
  defaults: ConfigDefaults
}

/**
 * Partial input accepted by createGlobalConfig
 */
export type GlobalConfigInput = Partial<Omit<GlobalConfig, 'defaults'>> & {
  defaults?: Partial<ConfigDefaults>
}

/**
 * Executables used by the adapter
 */
export interface ToolPaths {
  virsh: string
  virtInstall: string
  qemuImg: string
}

export const DEFAULT_TOOLS: ToolPaths = {
  virsh: 'virsh',
  virtInstall: 'virt-install',
  qemuImg: 'qemu-img'
}

/**
 * Options for LibvirtAdapter and its services
 */
export interface AdapterOptions {
  /** Paths under these prefixes are written through the elevation launcher */
  protectedPrefixes?: string[]
  /** Elevation launcher, `pkexec` unless set */
  elevationCommand?: string
  /** TCP probe timeout in milliseconds */
  connectTimeoutMs?: number
  /** Directory for temporary network XML files, os.tmpdir() unless set */
  tmpDir?: string
  tools?: Partial<ToolPaths>
}
