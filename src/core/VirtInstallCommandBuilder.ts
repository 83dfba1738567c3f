import { CreateAppVmOptions, CreateDisposableVmOptions, CreateGatewayVmOptions } from '../types/vm.types'

/**
 * Result of buildCommand() containing the binary and arguments separately
 */
export interface VirtInstallCommand {
  command: string
  args: string[]
}

/** vCPUs given to a gateway VM unless overridden */
export const GATEWAY_VCPUS = 1

/** vCPUs given to app and disposable VMs unless overridden */
export const APP_VCPUS = 2

/** Mount tag of the role directory inside the gateway */
export const PROXY_MOUNT_TAG = 'proxy'

/** Mount tag of an optional host share inside an app VM */
export const SHARED_MOUNT_TAG = 'shared'

/**
 * VirtInstallCommandBuilder provides a fluent API for building
 * `virt-install --import` argument arrays. Arguments come out in the order
 * the setters are called.
 *
 * @example
 * const { command, args } = new VirtInstallCommandBuilder()
 *   .setName('work-gw')
 *   .setMemory(1024)
 *   .setVcpus(1)
 *   .setImport()
 *   .addDisk('/var/lib/libvirt/images/work-gw.qcow2')
 *   .addNetwork('default')
 *   .addNetwork('work-inet')
 *   .addFilesystem('/var/lib/rolevirt/roles/work', 'proxy')
 *   .setOsVariant('debian12')
 *   .setNoAutoConsole()
 *   .buildCommand()
 */
export class VirtInstallCommandBuilder {
  private binary: string = 'virt-install'
  private args: string[] = []

  /**
   * Set the virt-install binary to use
   */
  setBinary (binary: string): this {
    this.binary = binary
    return this
  }

  setName (name: string): this {
    this.args.push('--name', name)
    return this
  }

  /**
   * Set memory size in MiB
   */
  setMemory (sizeMb: number): this {
    this.args.push('--memory', String(sizeMb))
    return this
  }

  setVcpus (count: number): this {
    this.args.push('--vcpus', String(count))
    return this
  }

  /**
   * Boot the existing disk instead of running an installer
   */
  setImport (): this {
    this.args.push('--import')
    return this
  }

  /**
   * Create a transient domain. libvirt discards it on shutdown.
   */
  setTransient (): this {
    this.args.push('--transient')
    return this
  }

  addDisk (diskPath: string, format: string = 'qcow2'): this {
    this.args.push('--disk', `path=${diskPath},format=${format}`)
    return this
  }

  addNetwork (network: string, model: string = 'virtio'): this {
    this.args.push('--network', `network=${network},model=${model}`)
    return this
  }

  /**
   * Share a host directory into the guest (9p, mapped access mode)
   */
  addFilesystem (source: string, target: string): this {
    this.args.push('--filesystem', `source=${source},target=${target},accessmode=mapped`)
    return this
  }

  setOsVariant (variant: string): this {
    this.args.push('--os-variant', variant)
    return this
  }

  setNoAutoConsole (): this {
    this.args.push('--noautoconsole')
    return this
  }

  /**
   * Build the final command with binary and args separately
   */
  buildCommand (): VirtInstallCommand {
    return { command: this.binary, args: [...this.args] }
  }

  /**
   * Gateway: shared LAN first, role network second, role directory as `proxy`.
   */
  static gateway (options: CreateGatewayVmOptions): VirtInstallCommandBuilder {
    return new VirtInstallCommandBuilder()
      .setName(options.name)
      .setMemory(options.ramMb)
      .setVcpus(options.vcpus ?? GATEWAY_VCPUS)
      .setImport()
      .addDisk(options.diskPath)
      .addNetwork(options.lanNet)
      .addNetwork(options.roleNet)
      .addFilesystem(options.roleDir, PROXY_MOUNT_TAG)
      .setOsVariant(options.osVariant)
      .setNoAutoConsole()
  }

  /**
   * App VM: role network only, optional share appended last.
   */
  static app (options: CreateAppVmOptions): VirtInstallCommandBuilder {
    const builder = new VirtInstallCommandBuilder()
      .setName(options.name)
      .setMemory(options.ramMb)
      .setVcpus(options.vcpus ?? APP_VCPUS)
      .setImport()
      .addDisk(options.diskPath)
      .addNetwork(options.roleNet)
      .setOsVariant(options.osVariant)
      .setNoAutoConsole()

    if (options.shareDir !== undefined) {
      builder.addFilesystem(options.shareDir, SHARED_MOUNT_TAG)
    }
    return builder
  }

  /**
   * Disposable VM: like an app VM, but transient.
   */
  static disposable (options: CreateDisposableVmOptions): VirtInstallCommandBuilder {
    const builder = new VirtInstallCommandBuilder()
      .setName(options.name)
      .setMemory(options.ramMb)
      .setVcpus(options.vcpus ?? APP_VCPUS)
      .setImport()
      .setTransient()
      .addDisk(options.diskPath)
      .addNetwork(options.roleNet)
      .setOsVariant(options.osVariant)
      .setNoAutoConsole()

    if (options.shareDir !== undefined) {
      builder.addFilesystem(options.shareDir, SHARED_MOUNT_TAG)
    }
    return builder
  }
}
