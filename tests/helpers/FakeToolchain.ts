/**
 * In-process stand-in for virsh, virt-install, qemu-img and the coreutils
 * the adapter shells out to.
 *
 * Domains and networks live in memory. Disk images and directories are real
 * files, so tests point every path at a temporary directory. Each call is
 * recorded as a command line; failures are injected per command line.
 */

import fs from 'fs/promises'
import path from 'path'
import { CommandExecutor, CommandResult, toolNotFound } from '../../src/utils/commandExecutor'

type SpawnResult = Omit<CommandResult, 'command'>

export type FakeDomainState = 'running' | 'shut off' | 'paused'

export interface FakeDomain {
  name: string
  state: FakeDomainState
  disk: string | null
  transient: boolean
  /** Arguments virt-install was called with */
  installArgs: string[]
}

export interface FakeNetwork {
  name: string
  active: boolean
  autostart: boolean
  bridge: string
}

interface InjectedFailure {
  pattern: RegExp
  stderr: string
  remaining: number
}

const ok = (stdout = ''): SpawnResult => ({ exitCode: 0, stdout, stderr: '' })
const fail = (stderr: string): SpawnResult => ({ exitCode: 1, stdout: '', stderr })

export class FakeToolchain extends CommandExecutor {
  /** Every command line, elevation launcher included */
  readonly calls: string[] = []
  readonly domains = new Map<string, FakeDomain>()
  readonly networks = new Map<string, FakeNetwork>()
  /** Overlay path to backing file */
  readonly backingFiles = new Map<string, string>()
  /** Executables that behave as not installed */
  readonly missingTools = new Set<string>()
  private failures: InjectedFailure[] = []
  private bridgeCounter = 0

  /**
   * Makes the next `times` command lines matching `pattern` exit 1 with
   * `stderr`, without touching any state.
   */
  failOn (pattern: RegExp, stderr = 'error: simulated failure', times = Infinity): void {
    this.failures.push({ pattern, stderr, remaining: times })
  }

  addNetwork (name: string, active = true): FakeNetwork {
    const network: FakeNetwork = { name, active, autostart: true, bridge: this.nextBridge() }
    this.networks.set(name, network)
    return network
  }

  addDomain (name: string, disk: string | null, state: FakeDomainState = 'shut off'): FakeDomain {
    const domain: FakeDomain = { name, state, disk, transient: false, installArgs: [] }
    this.domains.set(name, domain)
    return domain
  }

  /** Recorded command lines starting with `prefix` */
  callsStartingWith (prefix: string): string[] {
    return this.calls.filter((call) => call.startsWith(prefix))
  }

  protected async spawnProcess (command: string, args: string[]): Promise<SpawnResult> {
    const line = [command, ...args].join(' ')
    this.calls.push(line)

    let tool = command
    let toolArgs = args
    if (tool === 'pkexec' && args.length > 0) {
      tool = args[0]
      toolArgs = args.slice(1)
    }
    if (this.missingTools.has(command) || this.missingTools.has(tool)) {
      throw toolNotFound(this.missingTools.has(command) ? command : tool)
    }

    const failure = this.failures.find((f) => f.remaining > 0 && f.pattern.test(line))
    if (failure !== undefined) {
      failure.remaining -= 1
      return fail(failure.stderr)
    }

    switch (tool) {
      case 'virsh':
        return await this.virsh(toolArgs)
      case 'virt-install':
        return this.virtInstall(toolArgs)
      case 'qemu-img':
        return await this.qemuImg(toolArgs)
      case 'which':
        return this.missingTools.has(toolArgs[0]) ? fail('') : ok(`/usr/bin/${toolArgs[0]}\n`)
      case 'mkdir':
        await fs.mkdir(toolArgs[toolArgs.length - 1], { recursive: true })
        return ok()
      case 'cp':
        await fs.copyFile(toolArgs[0], toolArgs[1])
        return ok()
      case 'chmod':
        await fs.chmod(toolArgs[1], parseInt(toolArgs[0], 8))
        return ok()
      case 'chown':
        return ok()
      case 'rm':
        await fs.rm(toolArgs[toolArgs.length - 1], { force: true })
        return ok()
      default:
        throw toolNotFound(tool)
    }
  }

  private async virsh (args: string[]): Promise<SpawnResult> {
    const [subcommand, name] = args

    switch (subcommand) {
      case 'net-info': {
        const network = this.networks.get(name)
        if (network === undefined) {
          return networkNotFound(name)
        }
        return ok([
          `Name:           ${network.name}`,
          'UUID:           00000000-0000-0000-0000-000000000000',
          `Active:         ${network.active ? 'yes' : 'no'}`,
          'Persistent:     yes',
          `Autostart:      ${network.autostart ? 'yes' : 'no'}`,
          `Bridge:         ${network.bridge}`,
          ''
        ].join('\n'))
      }
      case 'net-define': {
        const xml = await fs.readFile(name, 'utf8')
        const match = /<name>(.*)<\/name>/.exec(xml)
        if (match === null) {
          return fail('error: Failed to define network: missing name')
        }
        this.networks.set(match[1], { name: match[1], active: false, autostart: false, bridge: this.nextBridge() })
        return ok(`Network ${match[1]} defined from ${name}\n`)
      }
      case 'net-autostart':
      case 'net-start':
      case 'net-destroy': {
        const network = this.networks.get(name)
        if (network === undefined) {
          return networkNotFound(name)
        }
        if (subcommand === 'net-autostart') {
          network.autostart = true
        } else if (subcommand === 'net-start') {
          if (network.active) {
            return fail(`error: Failed to start network ${name}\nerror: Requested operation is not valid: network is already active\n`)
          }
          network.active = true
        } else {
          if (!network.active) {
            return fail(`error: Failed to destroy network ${name}\nerror: Requested operation is not valid: network is not active\n`)
          }
          network.active = false
        }
        return ok()
      }
      case 'net-undefine':
        if (!this.networks.delete(name)) {
          return networkNotFound(name)
        }
        return ok(`Network ${name} has been undefined\n`)
      case 'list':
        return ok([...this.domains.keys()].map((n) => `${n}\n`).join('') + '\n')
      case 'dominfo': {
        const domain = this.domains.get(name)
        if (domain === undefined) {
          return domainNotFound(name)
        }
        return ok(`Id:             -\nName:           ${domain.name}\nOS Type:        hvm\nState:          ${domain.state}\n`)
      }
      case 'dumpxml': {
        const domain = this.domains.get(name)
        if (domain === undefined) {
          return domainNotFound(name)
        }
        const disk = domain.disk === null
          ? ''
          : `    <disk type='file' device='disk'>\n      <source file='${domain.disk}'/>\n    </disk>\n`
        return ok(`<domain type='kvm'>\n  <name>${domain.name}</name>\n  <devices>\n${disk}  </devices>\n</domain>\n`)
      }
      case 'start':
      case 'shutdown':
      case 'destroy': {
        const domain = this.domains.get(name)
        if (domain === undefined) {
          return domainNotFound(name)
        }
        if (subcommand === 'start') {
          if (domain.state === 'running') {
            return fail(`error: Failed to start domain '${name}'\nerror: Requested operation is not valid: domain is already active\n`)
          }
          domain.state = 'running'
          return ok(`Domain '${name}' started\n`)
        }
        if (domain.state === 'shut off') {
          return fail(`error: Failed to ${subcommand} domain '${name}'\nerror: Requested operation is not valid: domain is not running\n`)
        }
        domain.state = 'shut off'
        if (domain.transient) {
          this.domains.delete(name)
        }
        return ok()
      }
      case 'undefine':
        if (!this.domains.delete(name)) {
          return domainNotFound(name)
        }
        return ok(`Domain '${name}' has been undefined\n`)
      default:
        return fail(`error: unknown command: '${subcommand}'`)
    }
  }

  private virtInstall (args: string[]): SpawnResult {
    const name = valueAfter(args, '--name')
    if (name === undefined) {
      return fail('ERROR    --name is required')
    }
    if (this.domains.has(name)) {
      return fail(`ERROR    Guest name '${name}' is already in use.`)
    }
    const diskSpec = valueAfter(args, '--disk')
    const disk = diskSpec === undefined ? null : /path=([^,]+)/.exec(diskSpec)?.[1] ?? null

    this.domains.set(name, {
      name,
      state: 'running',
      disk,
      transient: args.includes('--transient'),
      installArgs: [...args]
    })
    return ok('Starting install...\nDomain creation completed.\n')
  }

  private async qemuImg (args: string[]): Promise<SpawnResult> {
    const [subcommand] = args

    if (subcommand === 'create') {
      const backing = valueAfter(args, '-b')
      const overlay = args[args.length - 1]
      try {
        await fs.writeFile(overlay, `qcow2 overlay of ${backing ?? 'nothing'}\n`, { flag: 'wx' })
      } catch {
        return fail(`qemu-img: ${overlay}: Could not create '${overlay}': No such file or directory`)
      }
      if (backing !== undefined) {
        this.backingFiles.set(overlay, backing)
      }
      return ok(`Formatting '${overlay}', fmt=qcow2 size=21474836480 backing_file=${backing ?? ''}\n`)
    }

    if (subcommand === 'info') {
      const image = args[args.length - 1]
      try {
        await fs.access(image)
      } catch {
        return fail(`qemu-img: Could not open '${image}': Could not open '${image}': No such file or directory`)
      }
      const lines = [`image: ${path.basename(image)}`, 'file format: qcow2', 'virtual size: 20 GiB (21474836480 bytes)']
      const backing = this.backingFiles.get(image)
      if (backing !== undefined) {
        lines.push(`backing file: ${backing}`, 'backing file format: qcow2')
      }
      return ok(lines.join('\n') + '\n')
    }

    return fail(`qemu-img: Command not supported: ${subcommand}`)
  }

  private nextBridge (): string {
    this.bridgeCounter += 1
    return `virbr${this.bridgeCounter}`
  }
}

function valueAfter (args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag)
  return index >= 0 ? args[index + 1] : undefined
}

function networkNotFound (name: string): SpawnResult {
  return fail(`error: failed to get network '${name}'\nerror: Network not found: no network with matching name '${name}'\n`)
}

function domainNotFound (name: string): SpawnResult {
  return fail(`error: failed to get domain '${name}'\n`)
}
