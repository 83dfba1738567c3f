import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { CommandExecutor, invocationFailed } from '../utils/commandExecutor'
import { Debugger, errorMessage } from '../utils/debug'
import { roleNetworkName } from '../utils/naming'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import { NetworkInfo, NetworkState } from '../types/network.types'

/**
 * NetworkManager manages libvirt virtual networks through `virsh net-*`.
 *
 * @example
 * const networks = new NetworkManager()
 *
 * // Idempotent: false when work-inet already existed
 * const created = await networks.ensureRoleNetwork('work')
 *
 * // Safe on an absent network
 * await networks.destroyNetwork('work-inet')
 */
export class NetworkManager {
  private executor: CommandExecutor
  private debug: Debugger
  private virsh: string
  private tmpDir: string

  constructor (executor: CommandExecutor = new CommandExecutor(), virsh: string = 'virsh', tmpDir: string = os.tmpdir()) {
    this.executor = executor
    this.virsh = virsh
    this.tmpDir = tmpDir
    this.debug = new Debugger('network')
  }

  /**
   * Checks if a network is defined.
   * Any non-zero exit of `net-info` counts as "does not exist".
   */
  async exists (name: string): Promise<boolean> {
    const result = await this.executor.run(this.virsh, ['net-info', name])
    this.debug.log(`Network ${name} ${result.exitCode === 0 ? 'exists' : 'does not exist'}`)
    return result.exitCode === 0
  }

  /**
   * Reads the state of a network.
   * @returns null when the network does not exist
   */
  async getInfo (name: string): Promise<NetworkInfo | null> {
    const result = await this.executor.run(this.virsh, ['net-info', name])
    if (result.exitCode !== 0) {
      return null
    }
    return parseNetworkInfo(name, result.stdout)
  }

  /**
   * Fails unless the shared ingress network exists. Never creates it.
   * @throws ProvisionError PRECONDITION_FAILED
   */
  async ensureLanNetExists (name: string): Promise<void> {
    if (!await this.exists(name)) {
      const message = `LAN network '${name}' does not exist in libvirt. Create it (for example with virt-manager) before provisioning roles`
      this.debug.log('error', message)
      throw new ProvisionError(ProvisionErrorCode.PRECONDITION_FAILED, message, name)
    }
  }

  /**
   * Defines, autostarts and starts `{role}-inet` unless it already exists.
   * A failed autostart or start undoes the earlier calls before throwing.
   * @returns true when this call created the network
   */
  async ensureRoleNetwork (role: string): Promise<boolean> {
    const name = roleNetworkName(role)
    if (await this.exists(name)) {
      this.debug.log(`Role network ${name} already exists`)
      return false
    }

    this.debug.log(`Creating role network ${name}`)
    const xmlPath = path.join(this.tmpDir, `net-${name}.xml`)
    await fs.writeFile(xmlPath, networkXml(name))

    try {
      const defined = await this.executor.run(this.virsh, ['net-define', xmlPath])
      if (defined.exitCode !== 0) {
        throw invocationFailed(defined, `Failed to define network '${name}'`)
      }

      const autostart = await this.executor.run(this.virsh, ['net-autostart', name])
      if (autostart.exitCode !== 0) {
        await this.quietly(['net-undefine', name])
        throw invocationFailed(autostart, `Failed to set autostart for network '${name}'`)
      }

      const started = await this.executor.run(this.virsh, ['net-start', name])
      if (started.exitCode !== 0) {
        await this.quietly(['net-destroy', name])
        await this.quietly(['net-undefine', name])
        throw invocationFailed(started, `Failed to start network '${name}'`)
      }
    } catch (error) {
      this.debug.log('error', errorMessage(error))
      throw error
    } finally {
      await fs.rm(xmlPath, { force: true })
    }

    this.debug.log(`Role network ${name} created`)
    return true
  }

  /**
   * Stops and undefines a network. An absent network is not an error.
   */
  async destroyNetwork (name: string): Promise<void> {
    this.debug.log(`Destroying network ${name}`)
    await this.quietly(['net-destroy', name])

    const result = await this.executor.run(this.virsh, ['net-undefine', name])
    if (result.exitCode !== 0 && !isNetworkNotFound(result.stderr)) {
      const error = invocationFailed(result, `Failed to undefine network '${name}'`)
      this.debug.log('error', error.message)
      throw error
    }
    this.debug.log(`Network ${name} removed`)
  }

  /** Runs a cleanup call whose exit code does not matter */
  private async quietly (args: string[]): Promise<void> {
    const result = await this.executor.run(this.virsh, args)
    if (result.exitCode !== 0) {
      this.debug.log('warn', `Ignoring failure of ${result.command}: ${result.stderr.trim()}`)
    }
  }
}

/**
 * Isolated bridge network definition for `virsh net-define`.
 */
export function networkXml (name: string): string {
  return `<network>\n  <name>${name}</name>\n  <bridge stp='on' delay='0'/>\n</network>`
}

/**
 * Parses `virsh net-info` output. Unknown keys are ignored.
 */
export function parseNetworkInfo (name: string, output: string): NetworkInfo {
  const info: NetworkInfo = { name, state: NetworkState.UNKNOWN, autostart: false }

  for (const line of output.split('\n')) {
    const separator = line.indexOf(':')
    if (separator < 0) {
      continue
    }
    const key = line.slice(0, separator).trim().toLowerCase()
    const value = line.slice(separator + 1).trim()

    switch (key) {
      case 'active':
        info.state = value.toLowerCase() === 'yes' ? NetworkState.ACTIVE : NetworkState.INACTIVE
        break
      case 'autostart':
        info.autostart = value.toLowerCase() === 'yes'
        break
      case 'bridge':
        if (value.length > 0) {
          info.bridge = value
        }
        break
    }
  }

  return info
}

function isNetworkNotFound (stderr: string): boolean {
  const lower = stderr.toLowerCase()
  return lower.includes('not found') || lower.includes('failed to get network')
}
