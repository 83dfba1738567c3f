import { CommandExecutor, invocationFailed } from '../utils/commandExecutor'
import { Debugger, errorMessage } from '../utils/debug'
import { parseVmName } from '../utils/naming'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import {
  CreateAppVmOptions,
  CreateDisposableVmOptions,
  CreateGatewayVmOptions,
  parseVmState,
  VmInfo,
  VmState
} from '../types/vm.types'
import { VirtInstallCommandBuilder } from './VirtInstallCommandBuilder'

/**
 * DomainManager handles libvirt domains through `virsh` and `virt-install`.
 *
 * Teardown primitives (stop, destroy, undefine) are idempotent: an absent or
 * already stopped domain is success.
 */
export class DomainManager {
  private executor: CommandExecutor
  private debug: Debugger
  private virsh: string
  private virtInstall: string

  constructor (executor: CommandExecutor = new CommandExecutor(), virsh: string = 'virsh', virtInstall: string = 'virt-install') {
    this.executor = executor
    this.virsh = virsh
    this.virtInstall = virtInstall
    this.debug = new Debugger('domain')
  }

  /**
   * Checks if a domain is defined.
   * Any non-zero exit of `dominfo` counts as "does not exist".
   */
  async exists (name: string): Promise<boolean> {
    const result = await this.executor.run(this.virsh, ['dominfo', name])
    return result.exitCode === 0
  }

  /**
   * @returns null when the domain does not exist
   */
  async getInfo (name: string): Promise<VmInfo | null> {
    const result = await this.executor.run(this.virsh, ['dominfo', name])
    if (result.exitCode !== 0) {
      return null
    }
    return parseDomainInfo(name, result.stdout)
  }

  /**
   * Lists every defined domain, optionally only names containing `pattern`.
   * @throws ProvisionError TOOL_INVOCATION_FAILED if the listing fails
   */
  async list (pattern?: string): Promise<VmInfo[]> {
    const names = await this.listNames()
    const vms: VmInfo[] = []
    for (const name of names) {
      if (pattern !== undefined && !name.includes(pattern)) {
        continue
      }
      const info = await this.getInfo(name)
      if (info) {
        vms.push(info)
      }
    }
    return vms
  }

  /**
   * Names of every defined domain, running or not.
   */
  async listNames (): Promise<string[]> {
    const result = await this.executor.run(this.virsh, ['list', '--all', '--name'])
    if (result.exitCode !== 0) {
      throw invocationFailed(result, 'Failed to list VMs')
    }
    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
  }

  async createGatewayVm (options: CreateGatewayVmOptions): Promise<void> {
    await this.install(options.name, VirtInstallCommandBuilder.gateway(options))
  }

  async createAppVm (options: CreateAppVmOptions): Promise<void> {
    await this.install(options.name, VirtInstallCommandBuilder.app(options))
  }

  async createDisposableVm (options: CreateDisposableVmOptions): Promise<void> {
    await this.install(options.name, VirtInstallCommandBuilder.disposable(options))
  }

  /**
   * Starts a defined domain. Fails if it is already running.
   */
  async start (name: string): Promise<void> {
    this.debug.log(`Starting VM ${name}`)
    const result = await this.executor.run(this.virsh, ['start', name])
    if (result.exitCode !== 0) {
      throw invocationFailed(result, `Failed to start VM '${name}'`)
    }
  }

  /**
   * Requests a graceful ACPI shutdown.
   */
  async stop (name: string): Promise<void> {
    this.debug.log(`Shutting down VM ${name}`)
    const result = await this.executor.run(this.virsh, ['shutdown', name])
    if (result.exitCode !== 0 && !isNotRunning(result.stderr) && !isDomainNotFound(result.stderr)) {
      throw invocationFailed(result, `Failed to stop VM '${name}'`)
    }
  }

  /**
   * Forces a domain off.
   */
  async destroy (name: string): Promise<void> {
    this.debug.log(`Destroying VM ${name}`)
    const result = await this.executor.run(this.virsh, ['destroy', name])
    if (result.exitCode !== 0 && !isNotRunning(result.stderr) && !isDomainNotFound(result.stderr)) {
      throw invocationFailed(result, `Failed to destroy VM '${name}'`)
    }
  }

  /**
   * Removes a domain definition, forcing it off first.
   */
  async undefine (name: string): Promise<void> {
    try {
      await this.destroy(name)
    } catch (error) {
      this.debug.log('warn', `Ignoring destroy failure before undefine: ${errorMessage(error)}`)
    }

    this.debug.log(`Undefining VM ${name}`)
    const result = await this.executor.run(this.virsh, ['undefine', name])
    if (result.exitCode !== 0 && !isDomainNotFound(result.stderr)) {
      throw invocationFailed(result, `Failed to undefine VM '${name}'`)
    }
  }

  /**
   * First file-backed disk in the domain XML.
   * @returns null when the domain is unknown or has no file disk
   */
  async getDiskPath (name: string): Promise<string | null> {
    const result = await this.executor.run(this.virsh, ['dumpxml', name])
    if (result.exitCode !== 0) {
      return null
    }
    return parseDiskSource(result.stdout)
  }

  private async install (name: string, builder: VirtInstallCommandBuilder): Promise<void> {
    if (await this.exists(name)) {
      throw new ProvisionError(ProvisionErrorCode.ALREADY_EXISTS, `VM '${name}' already exists`, name)
    }

    const { command, args } = builder.setBinary(this.virtInstall).buildCommand()
    this.debug.log(`Creating VM ${name}`)
    const result = await this.executor.run(command, args)
    if (result.exitCode !== 0) {
      const error = invocationFailed(result, `Failed to create VM '${name}'`)
      this.debug.log('error', error.message)
      throw error
    }
    this.debug.log(`VM ${name} created`)
  }
}

/**
 * Builds a VmInfo from `virsh dominfo` output and the domain name.
 */
export function parseDomainInfo (name: string, output: string): VmInfo {
  let state = VmState.UNKNOWN
  for (const line of output.split('\n')) {
    const separator = line.indexOf(':')
    if (separator < 0) {
      continue
    }
    if (line.slice(0, separator).trim().toLowerCase() === 'state') {
      state = parseVmState(line.slice(separator + 1))
    }
  }
  return { name, state, ...parseVmName(name) }
}

/**
 * Extracts the first `<source file=...>` path, single or double quoted.
 */
export function parseDiskSource (xml: string): string | null {
  const match = /<source\s+file=(['"])(.*?)\1/.exec(xml)
  return match ? match[2] : null
}

function isNotRunning (stderr: string): boolean {
  return stderr.includes('not running')
}

function isDomainNotFound (stderr: string): boolean {
  return stderr.includes('failed to get domain') || stderr.includes('Domain not found')
}
