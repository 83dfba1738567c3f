import fs from 'fs/promises'
import { constants as fsConstants } from 'fs'
import path from 'path'
import { CommandExecutor, invocationFailed, PrivilegePolicy } from '../utils/commandExecutor'
import { Debugger } from '../utils/debug'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'

/** Ownership libvirt's QEMU processes expect on Debian-family hosts */
const LIBVIRT_OWNER = 'libvirt-qemu:kvm'
const FALLBACK_OWNER = 'root:root'

/**
 * OverlayDiskService manages qcow2 overlays and template files with
 * qemu-img and coreutils. Writes to protected host paths go through the
 * elevation launcher chosen by the PrivilegePolicy.
 *
 * @example
 * const disks = new OverlayDiskService()
 *
 * await disks.createOverlayDisk(
 *   '/var/lib/libvirt/images/debian-gw.qcow2',
 *   '/var/lib/libvirt/images/work-gw.qcow2'
 * )
 *
 * await disks.getBackingFile('/var/lib/libvirt/images/work-gw.qcow2')
 * // '/var/lib/libvirt/images/debian-gw.qcow2'
 */
export class OverlayDiskService {
  private executor: CommandExecutor
  private policy: PrivilegePolicy
  private debug: Debugger
  private qemuImg: string

  constructor (
    executor: CommandExecutor = new CommandExecutor(),
    policy: PrivilegePolicy = new PrivilegePolicy(),
    qemuImg: string = 'qemu-img'
  ) {
    this.executor = executor
    this.policy = policy
    this.qemuImg = qemuImg
    this.debug = new Debugger('disk')
  }

  /**
   * Checks that a template is an existing, readable regular file.
   * @throws ProvisionError TEMPLATE_INVALID
   */
  async validateTemplate (templatePath: string): Promise<void> {
    let isFile = false
    try {
      isFile = (await fs.stat(templatePath)).isFile()
    } catch {
      throw new ProvisionError(ProvisionErrorCode.TEMPLATE_INVALID, `Template disk does not exist: ${templatePath}`, templatePath)
    }
    if (!isFile) {
      throw new ProvisionError(ProvisionErrorCode.TEMPLATE_INVALID, `Template path is not a file: ${templatePath}`, templatePath)
    }
    try {
      await fs.access(templatePath, fsConstants.R_OK)
    } catch {
      throw new ProvisionError(ProvisionErrorCode.TEMPLATE_INVALID, `Template disk is not readable: ${templatePath}`, templatePath)
    }
  }

  /**
   * Creates a copy-on-write overlay backed by a template.
   * @throws ProvisionError TEMPLATE_INVALID if the template is missing
   * @throws ProvisionError ALREADY_EXISTS if the overlay exists
   * @throws ProvisionError TOOL_INVOCATION_FAILED if qemu-img fails
   */
  async createOverlayDisk (templatePath: string, overlayPath: string): Promise<void> {
    if (!await pathExists(templatePath)) {
      throw new ProvisionError(ProvisionErrorCode.TEMPLATE_INVALID, `Template disk does not exist: ${templatePath}`, templatePath)
    }
    if (await pathExists(overlayPath)) {
      throw new ProvisionError(ProvisionErrorCode.ALREADY_EXISTS, `Overlay disk already exists: ${overlayPath}`, overlayPath)
    }

    const strategy = this.policy.strategyFor(overlayPath)
    this.debug.log(`Creating overlay ${overlayPath} backed by ${templatePath} (${strategy.name})`)

    const parent = path.dirname(overlayPath)
    if (!await pathExists(parent)) {
      const mkdir = await this.executor.run('mkdir', ['-p', parent], strategy)
      if (mkdir.exitCode !== 0) {
        this.debug.log('warn', `Failed to create ${parent}: ${mkdir.stderr.trim()}`)
      }
    }

    const created = await this.executor.run(
      this.qemuImg,
      ['create', '-f', 'qcow2', '-F', 'qcow2', '-b', templatePath, overlayPath],
      strategy
    )
    if (created.exitCode !== 0) {
      const error = invocationFailed(created, `Failed to create overlay disk ${overlayPath}`)
      this.debug.log('error', error.message)
      throw error
    }

    const chmod = await this.executor.run('chmod', ['644', overlayPath], strategy)
    if (chmod.exitCode !== 0) {
      this.debug.log('warn', `Failed to set permissions on ${overlayPath}: ${chmod.stderr.trim()}`)
    }
    this.debug.log(`Overlay ${overlayPath} created`)
  }

  /**
   * Removes an overlay. A missing file is not an error.
   */
  async deleteOverlayDisk (overlayPath: string): Promise<void> {
    if (!await pathExists(overlayPath)) {
      this.debug.log(`Overlay ${overlayPath} does not exist, nothing to delete`)
      return
    }

    await this.deleteFile(overlayPath)
    this.debug.log(`Overlay ${overlayPath} deleted`)
  }

  /**
   * Creates the images directory if it is missing.
   */
  async ensureImagesDir (imagesDir: string): Promise<void> {
    if (await pathExists(imagesDir)) {
      return
    }
    const result = await this.executor.run('mkdir', ['-p', imagesDir], this.policy.strategyFor(imagesDir))
    if (result.exitCode !== 0) {
      throw invocationFailed(result, `Failed to create images directory ${imagesDir}`)
    }
    this.debug.log(`Images directory ${imagesDir} created`)
  }

  /**
   * Whether a path lies inside the images directory.
   */
  isInImagesDir (filePath: string, imagesDir: string): boolean {
    const relative = path.relative(path.resolve(imagesDir), path.resolve(filePath))
    return relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative)
  }

  /**
   * Copies a template into the images directory. An existing file with the
   * same name is reused as-is.
   * @returns The destination path
   */
  async copyTemplateToImagesDir (source: string, imagesDir: string): Promise<string> {
    const destination = path.join(imagesDir, path.basename(source))
    if (await pathExists(destination)) {
      this.debug.log(`Reusing existing template ${destination}`)
      return destination
    }

    const strategy = this.policy.strategyFor(destination)
    this.debug.log(`Copying template ${source} to ${destination} (${strategy.name})`)

    const copied = await this.executor.run('cp', [source, destination], strategy)
    if (copied.exitCode !== 0) {
      throw invocationFailed(copied, `Failed to copy template ${source}`)
    }

    // Files written as root would otherwise be unreadable to QEMU
    if (strategy.name === 'elevated') {
      const chown = await this.executor.run('chown', [LIBVIRT_OWNER, destination], strategy)
      if (chown.exitCode !== 0) {
        this.debug.log('warn', `chown ${LIBVIRT_OWNER} failed, falling back to ${FALLBACK_OWNER}`)
        await this.executor.run('chown', [FALLBACK_OWNER, destination], strategy)
      }
    }

    const chmod = await this.executor.run('chmod', ['644', destination], strategy)
    if (chmod.exitCode !== 0) {
      this.debug.log('warn', `Failed to set permissions on ${destination}: ${chmod.stderr.trim()}`)
    }
    return destination
  }

  /**
   * Resolves the direct backing file of a qcow2 image.
   * @returns null when the image has no backing file or cannot be inspected
   */
  async getBackingFile (diskPath: string): Promise<string | null> {
    const result = await this.executor.run(this.qemuImg, ['info', diskPath])
    if (result.exitCode !== 0) {
      this.debug.log('warn', `Cannot inspect ${diskPath}: ${result.stderr.trim()}`)
      return null
    }
    return parseBackingFile(result.stdout)
  }

  /**
   * Removes a file with `rm -f`. "No such file" counts as success.
   */
  async deleteFile (filePath: string): Promise<void> {
    const result = await this.executor.run('rm', ['-f', filePath], this.policy.strategyFor(filePath))
    if (result.exitCode !== 0 && !result.stderr.includes('No such file')) {
      const error = invocationFailed(result, `Failed to delete ${filePath}`)
      this.debug.log('error', error.message)
      throw error
    }
  }
}

/**
 * Extracts the first `backing file:` value from `qemu-img info` output.
 * qemu-img may append "(actual path: ...)", so only the first token is kept.
 */
export function parseBackingFile (output: string): string | null {
  for (const line of output.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed.toLowerCase().startsWith('backing file:')) {
      continue
    }
    const token = trimmed.slice('backing file:'.length).trim().split(/\s+/)[0]
    return token.length > 0 ? token : null
  }
  return null
}

export async function pathExists (target: string): Promise<boolean> {
  try {
    await fs.access(target)
    return true
  } catch {
    return false
  }
}
