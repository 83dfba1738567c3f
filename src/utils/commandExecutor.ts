import { spawn } from 'child_process'
import path from 'path'
import { Debugger } from './debug'
import { INSTALL_HINT, ProvisionError, ProvisionErrorCode } from '../types/errors.types'

/**
 * Outcome of a finished process. A non-zero exit code is data, not an error:
 * several callers give specific exit codes an idempotent meaning.
 */
export interface CommandResult {
  /** Full command line as executed (after the strategy rewrote it) */
  command: string
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * Front-end used to launch a command. Elevation is a drop-in substitution of
 * the launcher; the command and its arguments stay the same.
 */
export interface InvocationStrategy {
  readonly name: 'direct' | 'elevated'
  wrap (command: string, args: string[]): { command: string, args: string[] }
}

/** Runs the command as the current user */
export const DIRECT: InvocationStrategy = {
  name: 'direct',
  wrap: (command, args) => ({ command, args })
}

/**
 * Creates a strategy that re-invokes commands through an elevation wrapper
 * such as `pkexec` (graphical prompt) or `sudo`.
 */
export function elevatedStrategy (launcher: string = 'pkexec'): InvocationStrategy {
  return {
    name: 'elevated',
    wrap: (command, args) => ({ command: launcher, args: [command, ...args] })
  }
}

/** Host paths that need elevated privileges to write */
export const DEFAULT_PROTECTED_PREFIXES = ['/var/lib', '/usr', '/etc']

/**
 * Whether writing to `target` requires elevation.
 * Compares whole path components, so `/var/library` is not under `/var/lib`.
 */
export function needsElevation (target: string, protectedPrefixes: string[] = DEFAULT_PROTECTED_PREFIXES): boolean {
  const resolved = path.resolve(target)
  return protectedPrefixes.some((prefix) => {
    const root = path.resolve(prefix)
    return resolved === root || resolved.startsWith(root + path.sep)
  })
}

/**
 * Picks the invocation strategy for a filesystem target.
 *
 * @example
 * const policy = new PrivilegePolicy()
 * policy.strategyFor('/var/lib/libvirt/images/a.qcow2').name // 'elevated'
 * policy.strategyFor('/home/me/images/a.qcow2').name         // 'direct'
 */
export class PrivilegePolicy {
  private readonly elevated: InvocationStrategy

  constructor (
    readonly protectedPrefixes: string[] = DEFAULT_PROTECTED_PREFIXES,
    elevationCommand: string = 'pkexec'
  ) {
    this.elevated = elevatedStrategy(elevationCommand)
  }

  strategyFor (target: string): InvocationStrategy {
    return needsElevation(target, this.protectedPrefixes) ? this.elevated : DIRECT
  }
}

/**
 * CommandExecutor runs external tools using spawn.
 * It never uses shell concatenation and captures stdout/stderr separately.
 */
export class CommandExecutor {
  protected debug: Debugger

  constructor () {
    this.debug = new Debugger('command-executor')
  }

  /**
   * Runs a command to completion.
   * @returns The exit code and captured output, whatever the exit code
   * @throws ProvisionError TOOL_NOT_FOUND if the executable (or the elevation launcher) is missing
   */
  async run (command: string, args: string[], strategy: InvocationStrategy = DIRECT): Promise<CommandResult> {
    const invocation = strategy.wrap(command, args)
    const fullCommand = [invocation.command, ...invocation.args].join(' ')
    this.debug.log(`Executing: ${fullCommand}`)

    const result = await this.spawnProcess(invocation.command, invocation.args)
    if (result.exitCode === 0) {
      this.debug.log(`Command completed successfully: ${fullCommand}`)
    } else {
      this.debug.log(`Command exited with code ${result.exitCode}: ${fullCommand}`)
    }
    return { command: fullCommand, ...result }
  }

  /**
   * Runs a command and treats any non-zero exit as a failure.
   * @returns stdout
   * @throws ProvisionError TOOL_INVOCATION_FAILED with the command line and stderr
   */
  async execute (command: string, args: string[], strategy: InvocationStrategy = DIRECT): Promise<string> {
    const result = await this.run(command, args, strategy)
    if (result.exitCode !== 0) {
      throw invocationFailed(result)
    }
    return result.stdout
  }

  /**
   * Spawns the process and collects its output.
   * Subclasses replace this to simulate tools in-process.
   */
  protected spawnProcess (command: string, args: string[]): Promise<Omit<CommandResult, 'command'>> {
    return new Promise((resolve, reject) => {
      const childProcess = spawn(command, args)
      let stdout = ''
      let stderr = ''

      childProcess.stdout.on('data', (data) => {
        stdout += data
      })

      childProcess.stderr.on('data', (data) => {
        stderr += data
      })

      childProcess.on('close', (code) => {
        resolve({ exitCode: code ?? -1, stdout, stderr })
      })

      childProcess.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          this.debug.log('error', `Command not found: ${command}`)
          reject(toolNotFound(command))
          return
        }
        const message = `Error occurred while executing command: ${command} ${args.join(' ')}: ${error.message}`
        this.debug.log('error', message)
        reject(new ProvisionError(ProvisionErrorCode.TOOL_INVOCATION_FAILED, message, command, {
          command: `${command} ${args.join(' ')}`
        }))
      })
    })
  }
}

/**
 * Builds the error for a command that ran but exited non-zero.
 */
export function invocationFailed (result: CommandResult, message?: string): ProvisionError {
  const stderr = result.stderr.trim()
  return new ProvisionError(
    ProvisionErrorCode.TOOL_INVOCATION_FAILED,
    `${message ?? `Command failed with exit code ${result.exitCode}: ${result.command}`}: ${stderr}`,
    undefined,
    { command: result.command, exitCode: result.exitCode, stderr }
  )
}

/**
 * Builds the error for an executable that is not installed.
 */
export function toolNotFound (command: string): ProvisionError {
  return new ProvisionError(
    ProvisionErrorCode.TOOL_NOT_FOUND,
    `Command not found: ${command}. ${INSTALL_HINT}`,
    command,
    { command }
  )
}
