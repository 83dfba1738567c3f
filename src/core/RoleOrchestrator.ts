import { EventEmitter } from 'events'
import fs from 'fs/promises'
import { LibvirtAdapter } from './LibvirtAdapter'
import { ProvisioningLedger, removeManifestDir } from './ProvisioningLedger'
import { Debugger, errorMessage } from '../utils/debug'
import { sleep } from '../utils/sleep'
import {
  appOverlayPath,
  appVmName,
  disposableDir,
  disposableOverlayPath,
  disposableVmName,
  gatewayOverlayPath,
  gatewayVmName,
  normalizeRoleName,
  roleNetworkName,
  timestampStamp,
  validateRoleName
} from '../utils/naming'
import { pathExists } from '../storage/OverlayDiskService'
import { roleDir, validateGlobalConfig } from '../config/GlobalConfig'
import { TemplateRegistry } from '../config/TemplateRegistry'
import {
  createRoleMeta,
  discoverRoles,
  loadRoleMeta,
  nextAppNumber,
  roleExists,
  saveRoleMeta
} from '../config/RoleMetaStore'
import {
  buildGatewayConfig,
  readProxyConf,
  stageGatewayFiles,
  writeGatewayConfigFiles
} from '../gateway/GatewayFiles'
import { parseProxyConf } from '../gateway/ProxyConfigCodec'
import { isProvisionError, ProvisionError, ProvisionErrorCode, toProvisionError } from '../types/errors.types'
import { GlobalConfig } from '../types/config.types'
import { APPLY_SCRIPT_FILE, GatewayConfig, GatewayInput, PROXY_CONF_FILE } from '../types/gateway.types'
import { TcpProbeResult } from '../types/network.types'
import { RoleMeta } from '../types/role.types'
import { Template } from '../types/template.types'
import { VmInfo, VmState } from '../types/vm.types'
import {
  AppVmRequest,
  AppVmResult,
  CreateRoleRequest,
  CreateRoleResult,
  DEFAULT_RESTART_DELAY_MS,
  DeleteRoleReport,
  DisposableVmResult,
  MIN_APP_OVERLAY_SWEEP,
  ProgressEvent,
  ProvisionStage,
  RollbackReport,
  UpdateGatewayOptions,
  UpdateGatewayResult,
  VmActionResult
} from '../types/orchestrator.types'

export interface RoleOrchestratorOptions {
  /** Pause between stop and start on a gateway restart */
  restartDelayMs?: number
  /** Clock used for disposable VM stamps */
  now?: () => Date
}

/**
 * RoleOrchestrator provisions and tears down roles: a gateway VM on the
 * shared LAN and a private role network, plus app VMs behind it.
 *
 * createRole runs as a saga. Every resource the run creates is recorded in a
 * ProvisioningLedger; a failure before the gateway VM exists undoes them in
 * reverse order and rethrows the original error.
 *
 * Events:
 * - `progress` ({@link ProgressEvent}) for each stage reached
 * - `rollback` ({@link RollbackReport}) after a failed or cancelled run
 *
 * @example
 * const orchestrator = new RoleOrchestrator(new LibvirtAdapter(), config, templates)
 * orchestrator.on('progress', (e) => console.log(e.stage, e.message))
 *
 * await orchestrator.createRole({
 *   roleName: 'work',
 *   gwTemplateId: gateway.id,
 *   appTemplateId: desktop.id,
 *   gateway: { mode: GatewayMode.PROXY_CHAIN, hops: [{ proxyType: ProxyType.SOCKS5, host: '10.0.0.5', port: 1080 }] },
 *   createAppVm: true
 * })
 */
export class RoleOrchestrator extends EventEmitter {
  private ledger: ProvisioningLedger | null = null
  private restartDelayMs: number
  private now: () => Date
  private debug: Debugger

  constructor (
    private readonly adapter: LibvirtAdapter,
    private readonly config: GlobalConfig,
    private readonly templates: TemplateRegistry,
    options: RoleOrchestratorOptions = {}
  ) {
    super()
    this.restartDelayMs = options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS
    this.now = options.now ?? (() => new Date())
    this.debug = new Debugger('orchestrator')
  }

  // ==================== Provisioning ====================

  /**
   * Provisions a role: role network, role directory with the gateway
   * config, gateway overlay and VM, metadata and optionally the first app VM.
   *
   * Metadata and the app VM are best-effort and reported as warnings.
   * @throws ProvisionError of the failing step, after rollback
   */
  async createRole (request: CreateRoleRequest): Promise<CreateRoleResult> {
    let role = normalizeRoleName(request.roleName)
    const ledger = new ProvisioningLedger(role)
    this.ledger = ledger
    const warnings: string[] = []
    const overrides = request.overrides ?? {}

    let result: CreateRoleResult
    try {
      // 1. Validate
      this.progress(role, ProvisionStage.VALIDATING, 'Validating request')
      role = validateRoleName(request.roleName)
      validateGlobalConfig(this.config)
      if (await roleExists(this.config.cfgRoot, role)) {
        throw new ProvisionError(ProvisionErrorCode.ALREADY_EXISTS, `Role '${role}' already exists`, role)
      }
      buildGatewayConfig(role, request.gateway)
      const lanNet = overrides.lanNet ?? this.config.lanNet

      // 2. Gateway template
      const template = this.templates.require(request.gwTemplateId)
      await this.adapter.validateTemplate(template.path)

      // 3. Shared LAN
      await this.adapter.ensureLanNetExists(lanNet)

      // 4. Role network
      const roleNet = roleNetworkName(role)
      const networkCreated = await this.adapter.ensureRoleNetwork(role)
      if (networkCreated) {
        ledger.record({ kind: 'network', name: roleNet }, async () => await this.adapter.destroyNetwork(roleNet))
      }
      this.progress(role, ProvisionStage.NETWORK_READY, networkCreated
        ? `Created network ${roleNet}`
        : `Using existing network ${roleNet}`)

      // 5. Role directory and gateway config
      const dir = roleDir(this.config, role)
      const config = await this.writeRoleDir(ledger, role, dir, request.gateway, warnings)
      this.progress(role, ProvisionStage.CONFIG_WRITTEN, `Wrote gateway config to ${dir}`)

      // 6. Gateway overlay
      const overlay = gatewayOverlayPath(this.config.imagesDir, role)
      await this.adapter.createOverlayDisk(template.path, overlay)
      ledger.record({ kind: 'overlay', path: overlay }, async () => await this.adapter.deleteOverlayDisk(overlay))
      this.progress(role, ProvisionStage.DISK_READY, `Created overlay ${overlay}`)

      // 7. Gateway VM
      const gatewayVm = gatewayVmName(role)
      await this.adapter.createGatewayVm({
        name: gatewayVm,
        diskPath: overlay,
        ramMb: overrides.gwRamMb ?? Math.max(template.defaultRamMb, this.config.defaults.gatewayRamMb),
        osVariant: template.osVariant,
        vcpus: overrides.gwVcpus,
        lanNet,
        roleNet,
        roleDir: dir
      })
      ledger.record({ kind: 'vm', name: gatewayVm }, async () => {
        await this.adapter.destroyVm(gatewayVm)
        await this.adapter.undefineVm(gatewayVm)
      })
      this.progress(role, ProvisionStage.VM_CREATED, `Created gateway VM ${gatewayVm}`)

      result = {
        role,
        gatewayVm,
        roleNetwork: roleNet,
        networkCreated,
        gatewayOverlay: overlay,
        roleDir: dir,
        config,
        warnings
      }
    } catch (error) {
      const failure = toProvisionError(error, ProvisionErrorCode.IO_ERROR, role)
      this.debug.log('error', `Provisioning role ${role} failed: ${failure.message}`)
      this.progress(role, ProvisionStage.FAILED, failure.message)
      await this.rollback(ledger)
      throw failure
    }
    ledger.clear()

    // 8. Metadata
    const meta = createRoleMeta(role, request.gateway.mode)
    meta.gwTemplateId = request.gwTemplateId
    meta.appTemplateId = request.appTemplateId
    meta.dispTemplateId = request.dispTemplateId
    Object.assign(meta, overrides)
    try {
      await saveRoleMeta(this.config.cfgRoot, meta)
      this.progress(role, ProvisionStage.METADATA_SAVED, 'Saved role metadata')
    } catch (error) {
      this.warn(warnings, `Failed to save role metadata: ${errorMessage(error)}`)
    }

    // 9. First app VM
    if (request.createAppVm === true) {
      if (request.appTemplateId === undefined) {
        this.warn(warnings, 'No app template given; app VM not created')
      } else {
        try {
          const app = await this.provisionAppVm(role, meta, {})
          warnings.push(...app.warnings)
          result.appVm = app.name
          this.progress(role, ProvisionStage.APP_VM_CREATED, `Created app VM ${app.name}`)
        } catch (error) {
          this.warn(warnings, `Failed to create app VM: ${errorMessage(error)}`)
        }
      }
    }

    this.progress(role, ProvisionStage.DONE, `Role ${role} is ready`)
    return result
  }

  /**
   * Undoes whatever the last createRole run still has recorded.
   * @returns null when there was nothing to undo
   */
  async cancel (): Promise<RollbackReport | null> {
    const ledger = this.ledger
    if (ledger === null || ledger.isEmpty) {
      return null
    }
    return await this.rollback(ledger)
  }

  // ==================== Teardown ====================

  /**
   * Removes everything belonging to a role, including resources the
   * metadata no longer knows about. Failing steps are reported, not thrown.
   * @throws ProvisionError INVALID_ROLE_NAME
   */
  async deleteRole (roleName: string): Promise<DeleteRoleReport> {
    const role = validateRoleName(roleName)
    const report: DeleteRoleReport = { role, steps: [] }
    const step = async (label: string, action: () => Promise<void>): Promise<void> => {
      try {
        await action()
        report.steps.push({ step: label, ok: true })
      } catch (error) {
        const message = errorMessage(error)
        this.debug.log('warn', `Teardown step '${label}' for role ${role} failed: ${message}`)
        report.steps.push({ step: label, ok: false, error: message })
      }
    }

    let appVmCount = 0
    try {
      appVmCount = (await loadRoleMeta(this.config.cfgRoot, role)).appVmCount
    } catch (error) {
      this.debug.log('warn', `No usable metadata for role ${role}: ${errorMessage(error)}`)
    }

    const vms = new Set<string>()
    await step('list VMs', async () => {
      for (const vm of await this.adapter.listRoleVms(role)) {
        vms.add(vm.name)
      }
    })
    vms.add(gatewayVmName(role))
    for (let n = 1; n <= appVmCount; n++) {
      vms.add(appVmName(role, n))
    }
    for (const vm of vms) {
      await step(`remove VM ${vm}`, async () => {
        await this.adapter.destroyVm(vm)
        await this.adapter.undefineVm(vm)
      })
    }

    const overlays = [gatewayOverlayPath(this.config.imagesDir, role)]
    for (let n = 1; n <= Math.max(MIN_APP_OVERLAY_SWEEP, appVmCount); n++) {
      overlays.push(appOverlayPath(this.config.imagesDir, role, n))
    }
    for (const overlay of overlays) {
      if (await pathExists(overlay)) {
        await step(`delete overlay ${overlay}`, async () => await this.adapter.deleteOverlayDisk(overlay))
      }
    }

    const disposables = disposableDir(this.config.cfgRoot, role)
    await step(`remove ${disposables}`, async () => await fs.rm(disposables, { recursive: true, force: true }))

    const roleNet = roleNetworkName(role)
    await step(`destroy network ${roleNet}`, async () => await this.adapter.destroyNetwork(roleNet))

    const dir = roleDir(this.config, role)
    await step(`remove ${dir}`, async () => await fs.rm(dir, { recursive: true, force: true }))

    this.debug.log(`Deleted role ${role}: ${report.steps.filter((s) => !s.ok).length} step(s) failed`)
    return report
  }

  // ==================== App and disposable VMs ====================

  /**
   * Adds the next `{role}-app-{n}` VM and persists the raised counter.
   * @throws ProvisionError NOT_FOUND when the role has no metadata
   * @throws ProvisionError PRECONDITION_FAILED when no app template is known
   */
  async createAppVm (roleName: string, request: AppVmRequest = {}): Promise<AppVmResult> {
    const role = validateRoleName(roleName)
    const meta = await loadRoleMeta(this.config.cfgRoot, role)
    return await this.provisionAppVm(role, meta, request)
  }

  /**
   * Starts a transient `disp-{role}-{stamp}` VM whose overlay lives under
   * the role's `disposable/` directory.
   */
  async launchDisposableVm (roleName: string): Promise<DisposableVmResult> {
    const role = validateRoleName(roleName)
    const meta = await loadRoleMeta(this.config.cfgRoot, role)
    const templateId = meta.dispTemplateId ?? meta.appTemplateId
    if (templateId === undefined) {
      throw new ProvisionError(
        ProvisionErrorCode.PRECONDITION_FAILED,
        `Role '${role}' has no disposable or app template`,
        role
      )
    }
    const template = await this.resolveTemplate(templateId)

    const stamp = timestampStamp(this.now())
    const name = disposableVmName(role, stamp)
    const overlayPath = disposableOverlayPath(this.config.cfgRoot, role, stamp)

    await this.adapter.createOverlayDisk(template.path, overlayPath)
    try {
      await this.adapter.createDisposableVm({
        name,
        diskPath: overlayPath,
        ramMb: Math.max(template.defaultRamMb, this.config.defaults.dispRamMb),
        osVariant: template.osVariant,
        roleNet: roleNetworkName(role)
      })
    } catch (error) {
      await this.discardOverlay(overlayPath)
      throw error
    }

    this.debug.log(`Launched disposable VM ${name}`)
    return { name, overlayPath }
  }

  // ==================== Gateway config ====================

  /**
   * @throws ProvisionError NOT_FOUND when the role has no proxy.conf
   */
  async loadGatewayConfig (roleName: string): Promise<GatewayConfig> {
    const role = validateRoleName(roleName)
    return parseProxyConf(await readProxyConf(roleDir(this.config, role)), role)
  }

  /**
   * Rewrites the role's gateway files and records the new mode. With
   * `restart`, the gateway VM is stopped and started again; a failed
   * restart is a warning.
   * @throws ProvisionError NOT_FOUND when the role does not exist
   */
  async updateGatewayConfig (
    roleName: string,
    input: GatewayInput,
    options: UpdateGatewayOptions = {}
  ): Promise<UpdateGatewayResult> {
    const role = validateRoleName(roleName)
    if (!await roleExists(this.config.cfgRoot, role)) {
      throw new ProvisionError(ProvisionErrorCode.NOT_FOUND, `Role '${role}' not found`, role)
    }

    const dir = roleDir(this.config, role)
    const staged = await stageGatewayFiles(role, input, dir)
    const written = await writeGatewayConfigFiles(staged.config, dir)
    const result: UpdateGatewayResult = {
      config: staged.config,
      files: [...staged.copiedFiles, ...written],
      restarted: false,
      warnings: [...staged.warnings]
    }

    let meta: RoleMeta
    try {
      meta = await loadRoleMeta(this.config.cfgRoot, role)
    } catch (error) {
      if (!isProvisionError(error) || error.code !== ProvisionErrorCode.NOT_FOUND) {
        throw error
      }
      meta = createRoleMeta(role)
    }
    meta.gatewayMode = input.mode
    await saveRoleMeta(this.config.cfgRoot, meta)

    if (options.restart === true) {
      const gatewayVm = gatewayVmName(role)
      try {
        await this.adapter.stopVm(gatewayVm)
        await sleep(this.restartDelayMs)
        await this.adapter.startVm(gatewayVm)
        result.restarted = true
      } catch (error) {
        this.warn(result.warnings, `Failed to restart ${gatewayVm}: ${errorMessage(error)}`)
      }
    }

    return result
  }

  // ==================== VM control ====================

  /**
   * @throws ProvisionError NOT_FOUND
   */
  async startVm (name: string): Promise<VmActionResult> {
    const info = await this.requireVm(name)
    if (info.state === VmState.RUNNING) {
      return { name, changed: false, warning: `VM '${name}' is already running` }
    }
    await this.adapter.startVm(name)
    return { name, changed: true }
  }

  /**
   * Graceful shutdown.
   * @throws ProvisionError NOT_FOUND
   */
  async stopVm (name: string): Promise<VmActionResult> {
    const info = await this.requireVm(name)
    if (info.state === VmState.SHUT_OFF) {
      return { name, changed: false, warning: `VM '${name}' is not running` }
    }
    await this.adapter.stopVm(name)
    return { name, changed: true }
  }

  // ==================== Queries ====================

  async listRoles (): Promise<string[]> {
    return await discoverRoles(this.config.cfgRoot)
  }

  async getRoleVms (roleName: string): Promise<VmInfo[]> {
    return await this.adapter.listRoleVms(validateRoleName(roleName))
  }

  /**
   * Pre-flight check that a proxy hop accepts TCP connections.
   * @throws ProvisionError CONNECTION_FAILED
   */
  async testProxyHop (host: string, port: number): Promise<TcpProbeResult> {
    return await this.adapter.testTcpConnection(host, port)
  }

  // ==================== Internals ====================

  /**
   * Creates the role directory when missing, copies the VPN files and
   * writes proxy.conf and apply-proxy.sh.
   */
  private async writeRoleDir (
    ledger: ProvisioningLedger,
    role: string,
    dir: string,
    input: GatewayInput,
    warnings: string[]
  ): Promise<GatewayConfig> {
    const existed = await pathExists(dir)
    try {
      await fs.mkdir(dir, { recursive: true })
    } catch (error) {
      throw new ProvisionError(ProvisionErrorCode.IO_ERROR, `Failed to create ${dir}: ${errorMessage(error)}`, dir)
    }

    const manifest: string[] = []
    if (!existed) {
      ledger.record({ kind: 'roleDir', path: dir, manifest }, async () => await removeManifestDir(dir, manifest))
    }

    const staged = await stageGatewayFiles(role, input, dir, (name) => manifest.push(name))
    warnings.push(...staged.warnings)

    manifest.push(PROXY_CONF_FILE, APPLY_SCRIPT_FILE)
    await writeGatewayConfigFiles(staged.config, dir)
    return staged.config
  }

  /**
   * Mints the next ordinal on `meta`, creates overlay then VM, and saves the
   * metadata. The overlay is deleted again when the VM cannot be created.
   */
  private async provisionAppVm (role: string, meta: RoleMeta, request: AppVmRequest): Promise<AppVmResult> {
    const templateId = request.templateId ?? meta.appTemplateId
    if (templateId === undefined) {
      throw new ProvisionError(ProvisionErrorCode.PRECONDITION_FAILED, `Role '${role}' has no app template`, role)
    }
    const template = await this.resolveTemplate(templateId)

    const appNumber = nextAppNumber(meta)
    const name = appVmName(role, appNumber)
    const overlayPath = appOverlayPath(this.config.imagesDir, role, appNumber)

    await this.adapter.createOverlayDisk(template.path, overlayPath)
    try {
      await this.adapter.createAppVm({
        name,
        diskPath: overlayPath,
        ramMb: request.ramMb ?? meta.appRamMb ?? Math.max(template.defaultRamMb, this.config.defaults.appRamMb),
        osVariant: template.osVariant,
        roleNet: roleNetworkName(role),
        shareDir: request.shareDir
      })
    } catch (error) {
      await this.discardOverlay(overlayPath)
      throw error
    }

    const warnings: string[] = []
    try {
      await saveRoleMeta(this.config.cfgRoot, meta)
    } catch (error) {
      this.warn(warnings, `Failed to save app VM counter for role ${role}: ${errorMessage(error)}`)
    }
    this.debug.log(`Created app VM ${name}`)
    return { name, appNumber, overlayPath, warnings }
  }

  private async resolveTemplate (id: string): Promise<Template> {
    const template = this.templates.require(id)
    await this.adapter.validateTemplate(template.path)
    return template
  }

  private async discardOverlay (overlayPath: string): Promise<void> {
    try {
      await this.adapter.deleteOverlayDisk(overlayPath)
    } catch (error) {
      this.debug.log('warn', `Failed to delete overlay ${overlayPath}: ${errorMessage(error)}`)
    }
  }

  private async requireVm (name: string): Promise<VmInfo> {
    const info = await this.adapter.getVmInfo(name)
    if (info === null) {
      throw new ProvisionError(ProvisionErrorCode.NOT_FOUND, `VM '${name}' not found`, name)
    }
    return info
  }

  private async rollback (ledger: ProvisioningLedger): Promise<RollbackReport> {
    this.progress(ledger.role, ProvisionStage.ROLLING_BACK, `Undoing ${ledger.entries.length} step(s)`)
    const report = await ledger.compensate()
    if (report.failed.length > 0) {
      this.debug.log('warn', `Rollback of role ${ledger.role} left ${report.failed.length} resource(s) behind`)
    }
    this.emit('rollback', report)
    this.progress(ledger.role, ProvisionStage.CANCELLED, `Rolled back ${report.compensated.length} step(s)`)
    return report
  }

  private progress (role: string, stage: ProvisionStage, message: string): void {
    this.debug.log(`[${role}] ${stage}: ${message}`)
    const event: ProgressEvent = { role, stage, message }
    this.emit('progress', event)
  }

  private warn (warnings: string[], message: string): void {
    this.debug.log('warn', message)
    warnings.push(message)
  }
}
