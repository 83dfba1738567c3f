// Core classes
export { RoleOrchestrator, RoleOrchestratorOptions } from './core/RoleOrchestrator'
export { TemplateManager } from './core/TemplateManager'
export { LibvirtAdapter } from './core/LibvirtAdapter'
export { DomainManager, parseDomainInfo, parseDiskSource } from './core/DomainManager'
export { ProvisioningLedger, removeManifestDir, describeEntry } from './core/ProvisioningLedger'
export {
  VirtInstallCommandBuilder,
  VirtInstallCommand,
  GATEWAY_VCPUS,
  APP_VCPUS,
  PROXY_MOUNT_TAG,
  SHARED_MOUNT_TAG
} from './core/VirtInstallCommandBuilder'

// Network classes
export { NetworkManager, networkXml, parseNetworkInfo } from './network/NetworkManager'
export { ConnectivityProbe } from './network/ConnectivityProbe'

// Storage classes
export { OverlayDiskService, parseBackingFile, pathExists } from './storage/OverlayDiskService'

// Gateway config
export { generateProxyConf, parseProxyConf, parseKeyValues, validateGatewayConfig } from './gateway/ProxyConfigCodec'
export { generateApplyScript } from './gateway/ApplyScript'
export {
  StagedGateway,
  buildGatewayConfig,
  stageGatewayFiles,
  writeGatewayConfigFiles,
  readProxyConf
} from './gateway/GatewayFiles'

// Persistence
export {
  defaultConfigPath,
  createGlobalConfig,
  validateGlobalConfig,
  loadGlobalConfig,
  saveGlobalConfig,
  roleDir
} from './config/GlobalConfig'
export { TemplateRegistry, defaultTemplatesPath } from './config/TemplateRegistry'
export {
  roleMetaPath,
  createRoleMeta,
  nextAppNumber,
  loadRoleMeta,
  saveRoleMeta,
  roleExists,
  discoverRoles
} from './config/RoleMetaStore'

// Utilities
export {
  CommandExecutor,
  CommandResult,
  InvocationStrategy,
  DIRECT,
  elevatedStrategy,
  DEFAULT_PROTECTED_PREFIXES,
  needsElevation,
  PrivilegePolicy,
  invocationFailed,
  toolNotFound
} from './utils/commandExecutor'
export { Debugger, LogLevel, errorMessage } from './utils/debug'
export {
  ROLE_NAME_PATTERN,
  normalizeRoleName,
  validateRoleName,
  roleNetworkName,
  gatewayVmName,
  appVmName,
  disposableVmName,
  gatewayOverlayPath,
  appOverlayPath,
  disposableDir,
  disposableOverlayPath,
  timestampStamp,
  parseVmName
} from './utils/naming'

// Types
export * from './types/errors.types'
export * from './types/vm.types'
export * from './types/network.types'
export * from './types/config.types'
export * from './types/gateway.types'
export * from './types/template.types'
export * from './types/role.types'
export * from './types/orchestrator.types'
