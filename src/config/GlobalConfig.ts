import os from 'os'
import path from 'path'
import { isRecord, numberField, readJsonFile, stringField, writeJsonFile } from '../utils/json'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import {
  CONFIG_VERSION,
  ConfigDefaults,
  DEFAULT_APP_RAM_MB,
  DEFAULT_CFG_ROOT_NAME,
  DEFAULT_CONFIG_FILE,
  DEFAULT_DEBIAN_OS_VARIANT,
  DEFAULT_DISP_RAM_MB,
  DEFAULT_FEDORA_OS_VARIANT,
  DEFAULT_GATEWAY_RAM_MB,
  DEFAULT_IMAGES_DIR,
  DEFAULT_LAN_NET,
  GlobalConfig,
  GlobalConfigInput,
  MIN_APP_RAM_MB,
  MIN_DISP_RAM_MB,
  MIN_GATEWAY_RAM_MB
} from '../types/config.types'

/**
 * Location of the config file: `$XDG_CONFIG_HOME/rolevirt/config.json`,
 * falling back to `~/.config`.
 */
export function defaultConfigPath (): string {
  const base = process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config')
  return path.join(base, DEFAULT_CONFIG_FILE)
}

/**
 * Fills every missing field with its default.
 */
export function createGlobalConfig (input: GlobalConfigInput = {}): GlobalConfig {
  const defaults: ConfigDefaults = {
    gatewayRamMb: input.defaults?.gatewayRamMb ?? DEFAULT_GATEWAY_RAM_MB,
    appRamMb: input.defaults?.appRamMb ?? DEFAULT_APP_RAM_MB,
    dispRamMb: input.defaults?.dispRamMb ?? DEFAULT_DISP_RAM_MB,
    debianOsVariant: input.defaults?.debianOsVariant ?? DEFAULT_DEBIAN_OS_VARIANT,
    fedoraOsVariant: input.defaults?.fedoraOsVariant ?? DEFAULT_FEDORA_OS_VARIANT
  }

  return {
    version: input.version ?? CONFIG_VERSION,
    cfgRoot: input.cfgRoot ?? path.join(os.homedir(), DEFAULT_CFG_ROOT_NAME),
    imagesDir: input.imagesDir ?? DEFAULT_IMAGES_DIR,
    lanNet: input.lanNet ?? DEFAULT_LAN_NET,
    defaults
  }
}

/**
 * @throws ProvisionError INVALID_CONFIG
 */
export function validateGlobalConfig (config: GlobalConfig): void {
  const fail = (message: string): never => {
    throw new ProvisionError(ProvisionErrorCode.INVALID_CONFIG, message)
  }

  if (config.lanNet.trim().length === 0) {
    fail('LAN network name cannot be empty')
  }
  if (config.defaults.gatewayRamMb < MIN_GATEWAY_RAM_MB) {
    fail(`Gateway RAM must be at least ${MIN_GATEWAY_RAM_MB} MB`)
  }
  if (config.defaults.appRamMb < MIN_APP_RAM_MB) {
    fail(`App VM RAM must be at least ${MIN_APP_RAM_MB} MB`)
  }
  if (config.defaults.dispRamMb < MIN_DISP_RAM_MB) {
    fail(`Disposable VM RAM must be at least ${MIN_DISP_RAM_MB} MB`)
  }
}

/**
 * Loads the config file, merged over the defaults. A missing file yields
 * the defaults.
 */
export async function loadGlobalConfig (file: string = defaultConfigPath()): Promise<GlobalConfig> {
  const data = await readJsonFile(file)
  if (data === null) {
    return createGlobalConfig()
  }
  if (!isRecord(data)) {
    throw new ProvisionError(ProvisionErrorCode.INVALID_CONFIG, `Config file ${file} must hold a JSON object`, file)
  }

  const input: GlobalConfigInput = {
    version: numberField(data, 'version'),
    cfgRoot: stringField(data, 'cfgRoot'),
    imagesDir: stringField(data, 'imagesDir'),
    lanNet: stringField(data, 'lanNet')
  }
  const defaults = data.defaults
  if (isRecord(defaults)) {
    input.defaults = {
      gatewayRamMb: numberField(defaults, 'gatewayRamMb'),
      appRamMb: numberField(defaults, 'appRamMb'),
      dispRamMb: numberField(defaults, 'dispRamMb'),
      debianOsVariant: stringField(defaults, 'debianOsVariant'),
      fedoraOsVariant: stringField(defaults, 'fedoraOsVariant')
    }
  }
  return createGlobalConfig(input)
}

export async function saveGlobalConfig (config: GlobalConfig, file: string = defaultConfigPath()): Promise<void> {
  await writeJsonFile(file, config)
}

/**
 * Directory holding one role's files.
 */
export function roleDir (config: GlobalConfig, role: string): string {
  return path.join(config.cfgRoot, role)
}
