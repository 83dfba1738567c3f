import { CommandExecutor, DEFAULT_PROTECTED_PREFIXES, InvocationStrategy, PrivilegePolicy } from '../utils/commandExecutor'
import { Debugger, errorMessage } from '../utils/debug'
import {
  appOverlayPath,
  disposableOverlayPath,
  gatewayOverlayPath
} from '../utils/naming'
import { INSTALL_HINT, isProvisionError, ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import {
  AdapterOptions,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_ELEVATION_COMMAND,
  DEFAULT_TOOLS,
  ToolPaths
} from '../types/config.types'
import { NetworkInfo, TcpProbeResult } from '../types/network.types'
import {
  CreateAppVmOptions,
  CreateDisposableVmOptions,
  CreateGatewayVmOptions,
  VmInfo
} from '../types/vm.types'
import { NetworkManager } from '../network/NetworkManager'
import { ConnectivityProbe } from '../network/ConnectivityProbe'
import { OverlayDiskService } from '../storage/OverlayDiskService'
import { DomainManager } from './DomainManager'

/**
 * LibvirtAdapter is the single entry point for hypervisor state: what exists,
 * what state it is in, and idempotent create/destroy of single resources.
 * It works on raw names and paths and knows nothing about roles beyond the
 * naming convention parsed by `parseVmName`.
 *
 * @example
 * const adapter = new LibvirtAdapter()
 * await adapter.checkPrerequisites()
 *
 * const created = await adapter.ensureRoleNetwork('work')
 * await adapter.createOverlayDisk(template, adapter.gatewayOverlayPath(imagesDir, 'work'))
 *
 * // Which VMs break if this template is deleted?
 * await adapter.getVmsUsingImage(template)
 */
export class LibvirtAdapter {
  readonly networks: NetworkManager
  readonly domains: DomainManager
  readonly disks: OverlayDiskService
  readonly probe: ConnectivityProbe
  private executor: CommandExecutor
  private policy: PrivilegePolicy
  private tools: ToolPaths
  private debug: Debugger

  constructor (executor: CommandExecutor = new CommandExecutor(), options: AdapterOptions = {}) {
    this.executor = executor
    this.tools = { ...DEFAULT_TOOLS, ...options.tools }
    this.policy = new PrivilegePolicy(
      options.protectedPrefixes ?? DEFAULT_PROTECTED_PREFIXES,
      options.elevationCommand ?? DEFAULT_ELEVATION_COMMAND
    )
    this.networks = new NetworkManager(executor, this.tools.virsh, options.tmpDir)
    this.domains = new DomainManager(executor, this.tools.virsh, this.tools.virtInstall)
    this.disks = new OverlayDiskService(executor, this.policy, this.tools.qemuImg)
    this.probe = new ConnectivityProbe(options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS)
    this.debug = new Debugger('adapter')
  }

  // ==================== Host checks ====================

  /**
   * Verifies virsh, virt-install and qemu-img are on PATH.
   * @throws ProvisionError TOOL_NOT_FOUND naming every missing tool
   */
  async checkPrerequisites (): Promise<void> {
    const missing: string[] = []
    for (const tool of [this.tools.virsh, this.tools.virtInstall, this.tools.qemuImg]) {
      if (!await this.onPath(tool)) {
        missing.push(tool)
      }
    }

    if (missing.length > 0) {
      throw new ProvisionError(
        ProvisionErrorCode.TOOL_NOT_FOUND,
        `Required commands not found: ${missing.join(', ')}. ${INSTALL_HINT}`,
        undefined,
        { missing }
      )
    }
  }

  /**
   * @throws ProvisionError PERMISSION_DENIED if `virsh list --all` fails
   */
  async checkLibvirtAccess (): Promise<void> {
    const result = await this.executor.run(this.tools.virsh, ['list', '--all'])
    if (result.exitCode !== 0) {
      throw new ProvisionError(
        ProvisionErrorCode.PERMISSION_DENIED,
        `Cannot access libvirt. Ensure you are in the 'libvirt' group or run with sudo. Error: ${result.stderr.trim()}`,
        undefined,
        { command: result.command, stderr: result.stderr.trim() }
      )
    }
  }

  /**
   * Invocation strategy used for writes to `target`.
   */
  strategyFor (target: string): InvocationStrategy {
    return this.policy.strategyFor(target)
  }

  // ==================== Networks ====================

  async networkExists (name: string): Promise<boolean> {
    return await this.networks.exists(name)
  }

  async getNetworkInfo (name: string): Promise<NetworkInfo | null> {
    return await this.networks.getInfo(name)
  }

  async ensureLanNetExists (name: string): Promise<void> {
    await this.networks.ensureLanNetExists(name)
  }

  async ensureRoleNetwork (role: string): Promise<boolean> {
    return await this.networks.ensureRoleNetwork(role)
  }

  async destroyNetwork (name: string): Promise<void> {
    await this.networks.destroyNetwork(name)
  }

  // ==================== Disks ====================

  async validateTemplate (templatePath: string): Promise<void> {
    await this.disks.validateTemplate(templatePath)
  }

  async createOverlayDisk (templatePath: string, overlayPath: string): Promise<void> {
    await this.disks.createOverlayDisk(templatePath, overlayPath)
  }

  async deleteOverlayDisk (overlayPath: string): Promise<void> {
    await this.disks.deleteOverlayDisk(overlayPath)
  }

  async ensureImagesDir (imagesDir: string): Promise<void> {
    await this.disks.ensureImagesDir(imagesDir)
  }

  isInImagesDir (filePath: string, imagesDir: string): boolean {
    return this.disks.isInImagesDir(filePath, imagesDir)
  }

  async copyTemplateToImagesDir (source: string, imagesDir: string): Promise<string> {
    return await this.disks.copyTemplateToImagesDir(source, imagesDir)
  }

  async getBackingFile (diskPath: string): Promise<string | null> {
    return await this.disks.getBackingFile(diskPath)
  }

  async deleteFile (filePath: string): Promise<void> {
    await this.disks.deleteFile(filePath)
  }

  gatewayOverlayPath (imagesDir: string, role: string): string {
    return gatewayOverlayPath(imagesDir, role)
  }

  appOverlayPath (imagesDir: string, role: string, appNumber: number): string {
    return appOverlayPath(imagesDir, role, appNumber)
  }

  disposableOverlayPath (cfgRoot: string, role: string, stamp: string): string {
    return disposableOverlayPath(cfgRoot, role, stamp)
  }

  // ==================== VMs ====================

  async vmExists (name: string): Promise<boolean> {
    return await this.domains.exists(name)
  }

  async getVmInfo (name: string): Promise<VmInfo | null> {
    return await this.domains.getInfo(name)
  }

  async listVms (pattern?: string): Promise<VmInfo[]> {
    return await this.domains.list(pattern)
  }

  /**
   * VMs whose name parses to `role`. `work` does not match `work2-gw`.
   */
  async listRoleVms (role: string): Promise<VmInfo[]> {
    const vms = await this.domains.list(role)
    return vms.filter((vm) => vm.role === role)
  }

  /**
   * Every managed VM keyed by its role. Unmanaged VMs are left out.
   */
  async groupVmsByRole (): Promise<Map<string, VmInfo[]>> {
    const groups = new Map<string, VmInfo[]>()
    for (const vm of await this.domains.list()) {
      if (vm.role === undefined) {
        continue
      }
      const group = groups.get(vm.role) ?? []
      group.push(vm)
      groups.set(vm.role, group)
    }
    return groups
  }

  async createGatewayVm (options: CreateGatewayVmOptions): Promise<void> {
    await this.domains.createGatewayVm(options)
  }

  async createAppVm (options: CreateAppVmOptions): Promise<void> {
    await this.domains.createAppVm(options)
  }

  async createDisposableVm (options: CreateDisposableVmOptions): Promise<void> {
    await this.domains.createDisposableVm(options)
  }

  async startVm (name: string): Promise<void> {
    await this.domains.start(name)
  }

  async stopVm (name: string): Promise<void> {
    await this.domains.stop(name)
  }

  async destroyVm (name: string): Promise<void> {
    await this.domains.destroy(name)
  }

  async undefineVm (name: string): Promise<void> {
    await this.domains.undefine(name)
  }

  /**
   * Best-effort destroy, undefine and overlay removal. Never throws for
   * teardown failures.
   */
  async cleanupVm (name: string, overlayPath?: string): Promise<void> {
    const steps: Array<[string, () => Promise<void>]> = [
      [`destroy ${name}`, async () => await this.domains.destroy(name)],
      [`undefine ${name}`, async () => await this.domains.undefine(name)]
    ]
    if (overlayPath !== undefined) {
      steps.push([`delete ${overlayPath}`, async () => await this.disks.deleteOverlayDisk(overlayPath)])
    }

    for (const [label, step] of steps) {
      try {
        await step()
      } catch (error) {
        this.debug.log('warn', `Cleanup step '${label}' failed: ${errorMessage(error)}`)
      }
    }
  }

  // ==================== Image usage ====================

  async getVmDiskPath (name: string): Promise<string | null> {
    return await this.domains.getDiskPath(name)
  }

  /**
   * Disk path to the names of the VMs using it.
   */
  async getDiskToVmMap (): Promise<Map<string, string[]>> {
    const map = new Map<string, string[]>()
    let names: string[]
    try {
      names = await this.domains.listNames()
    } catch (error) {
      if (isProvisionError(error) && error.code === ProvisionErrorCode.TOOL_NOT_FOUND) {
        throw error
      }
      this.debug.log('warn', `Cannot list VMs: ${errorMessage(error)}`)
      return map
    }

    for (const name of names) {
      const disk = await this.domains.getDiskPath(name)
      if (disk === null) {
        continue
      }
      const users = map.get(disk) ?? []
      users.push(name)
      map.set(disk, users)
    }
    return map
  }

  /**
   * VMs whose disk is `imagePath` or is an overlay directly backed by it.
   * @returns Sorted, deduplicated VM names
   */
  async getVmsUsingImage (imagePath: string): Promise<string[]> {
    const users = new Set<string>()
    const diskMap = await this.getDiskToVmMap()

    for (const [disk, vms] of diskMap) {
      if (disk === imagePath || await this.disks.getBackingFile(disk) === imagePath) {
        vms.forEach((vm) => users.add(vm))
      }
    }
    return [...users].sort()
  }

  // ==================== Connectivity ====================

  async testTcpConnection (host: string, port: number, timeoutMs?: number): Promise<TcpProbeResult> {
    return await this.probe.testTcpConnection(host, port, timeoutMs)
  }

  private async onPath (tool: string): Promise<boolean> {
    try {
      const result = await this.executor.run('which', [tool])
      return result.exitCode === 0
    } catch (error) {
      if (isProvisionError(error) && error.code === ProvisionErrorCode.TOOL_NOT_FOUND) {
        return false
      }
      throw error
    }
  }
}
