/**
 * OverlayDiskService tests
 *
 * Overlay creation and deletion, template validation and template import,
 * with direct and elevated invocation.
 */

import fs from 'fs/promises'
import path from 'path'
import { FakeToolchain } from './helpers/FakeToolchain'
import { makeTempDir } from './helpers/testEnvironment'
import { OverlayDiskService, parseBackingFile } from '../src/storage/OverlayDiskService'
import { PrivilegePolicy } from '../src/utils/commandExecutor'
import { ProvisionErrorCode } from '../src/types/errors.types'

describe('OverlayDiskService', () => {
  let fake: FakeToolchain
  let root: string
  let template: string
  let disks: OverlayDiskService

  beforeEach(async () => {
    fake = new FakeToolchain()
    root = await makeTempDir()
    template = path.join(root, 'base.qcow2')
    await fs.writeFile(template, 'base image\n')
    disks = new OverlayDiskService(fake, new PrivilegePolicy([]))
  })

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  describe('createOverlayDisk', () => {
    it('creates a qcow2 overlay backed by the template', async () => {
      const overlay = path.join(root, 'work-gw.qcow2')
      await disks.createOverlayDisk(template, overlay)

      expect(fake.calls).toEqual([
        `qemu-img create -f qcow2 -F qcow2 -b ${template} ${overlay}`,
        `chmod 644 ${overlay}`
      ])
      await expect(disks.getBackingFile(overlay)).resolves.toBe(template)
    })

    it('creates a missing parent directory first', async () => {
      const overlay = path.join(root, 'roles', 'work', 'disposable', 'disp-20240102-030405.qcow2')
      await disks.createOverlayDisk(template, overlay)

      expect(fake.calls[0]).toBe(`mkdir -p ${path.dirname(overlay)}`)
      await expect(fs.access(overlay)).resolves.toBeUndefined()
    })

    it('goes through the elevation launcher under protected prefixes', async () => {
      const elevated = new OverlayDiskService(fake, new PrivilegePolicy([root]))
      const overlay = path.join(root, 'work-gw.qcow2')
      await elevated.createOverlayDisk(template, overlay)

      expect(fake.calls).toEqual([
        `pkexec qemu-img create -f qcow2 -F qcow2 -b ${template} ${overlay}`,
        `pkexec chmod 644 ${overlay}`
      ])
    })

    it('refuses a missing template', async () => {
      await expect(disks.createOverlayDisk(path.join(root, 'missing.qcow2'), path.join(root, 'o.qcow2')))
        .rejects.toMatchObject({ code: ProvisionErrorCode.TEMPLATE_INVALID })
      expect(fake.calls).toEqual([])
    })

    it('refuses to overwrite an existing overlay', async () => {
      const overlay = path.join(root, 'work-gw.qcow2')
      await fs.writeFile(overlay, 'old')

      await expect(disks.createOverlayDisk(template, overlay)).rejects.toMatchObject({
        code: ProvisionErrorCode.ALREADY_EXISTS,
        resource: overlay
      })
      await expect(fs.readFile(overlay, 'utf8')).resolves.toBe('old')
    })

    it('surfaces qemu-img stderr', async () => {
      fake.failOn(/qemu-img create/, 'qemu-img: No space left on device')
      const overlay = path.join(root, 'work-gw.qcow2')

      await expect(disks.createOverlayDisk(template, overlay)).rejects.toMatchObject({
        code: ProvisionErrorCode.TOOL_INVOCATION_FAILED,
        message: `Failed to create overlay disk ${overlay}: qemu-img: No space left on device`
      })
    })

    it('only warns when chmod fails', async () => {
      fake.failOn(/^chmod/, 'chmod: operation not permitted')
      await expect(disks.createOverlayDisk(template, path.join(root, 'o.qcow2'))).resolves.toBeUndefined()
    })
  })

  describe('deleteOverlayDisk', () => {
    it('removes the file', async () => {
      const overlay = path.join(root, 'work-gw.qcow2')
      await disks.createOverlayDisk(template, overlay)
      await disks.deleteOverlayDisk(overlay)

      await expect(fs.access(overlay)).rejects.toThrow()
      expect(fake.calls.slice(-1)).toEqual([`rm -f ${overlay}`])
    })

    it('does nothing for a missing file', async () => {
      await disks.deleteOverlayDisk(path.join(root, 'missing.qcow2'))
      expect(fake.calls).toEqual([])
    })
  })

  describe('validateTemplate', () => {
    it('accepts a readable file', async () => {
      await expect(disks.validateTemplate(template)).resolves.toBeUndefined()
    })

    it('rejects a directory', async () => {
      await expect(disks.validateTemplate(root)).rejects.toMatchObject({
        code: ProvisionErrorCode.TEMPLATE_INVALID,
        message: `Template path is not a file: ${root}`
      })
    })

    it('rejects a missing path', async () => {
      const missing = path.join(root, 'missing.qcow2')
      await expect(disks.validateTemplate(missing)).rejects.toMatchObject({
        message: `Template disk does not exist: ${missing}`
      })
    })
  })

  describe('copyTemplateToImagesDir', () => {
    it('copies and sets permissions without chown when direct', async () => {
      const imagesDir = path.join(root, 'images')
      await disks.ensureImagesDir(imagesDir)
      const destination = await disks.copyTemplateToImagesDir(template, imagesDir)

      expect(destination).toBe(path.join(imagesDir, 'base.qcow2'))
      expect(fake.calls).toEqual([
        `mkdir -p ${imagesDir}`,
        `cp ${template} ${destination}`,
        `chmod 644 ${destination}`
      ])
    })

    it('hands the copy to libvirt-qemu when elevated', async () => {
      const imagesDir = path.join(root, 'images')
      await fs.mkdir(imagesDir)
      const elevated = new OverlayDiskService(fake, new PrivilegePolicy([imagesDir]))
      const destination = await elevated.copyTemplateToImagesDir(template, imagesDir)

      expect(fake.calls).toEqual([
        `pkexec cp ${template} ${destination}`,
        `pkexec chown libvirt-qemu:kvm ${destination}`,
        `pkexec chmod 644 ${destination}`
      ])
    })

    it('falls back to root ownership when libvirt-qemu is unknown', async () => {
      const imagesDir = path.join(root, 'images')
      await fs.mkdir(imagesDir)
      fake.failOn(/chown libvirt-qemu/, "chown: invalid user: 'libvirt-qemu:kvm'")
      const elevated = new OverlayDiskService(fake, new PrivilegePolicy([imagesDir]))
      const destination = await elevated.copyTemplateToImagesDir(template, imagesDir)

      expect(fake.callsStartingWith('pkexec chown')).toEqual([
        `pkexec chown libvirt-qemu:kvm ${destination}`,
        `pkexec chown root:root ${destination}`
      ])
    })

    it('reuses an existing destination', async () => {
      const imagesDir = path.join(root, 'images')
      await fs.mkdir(imagesDir)
      await fs.writeFile(path.join(imagesDir, 'base.qcow2'), 'already here')

      await expect(disks.copyTemplateToImagesDir(template, imagesDir)).resolves.toBe(path.join(imagesDir, 'base.qcow2'))
      expect(fake.calls).toEqual([])
    })
  })

  describe('isInImagesDir', () => {
    it('requires the path to lie strictly inside', () => {
      expect(disks.isInImagesDir('/var/lib/libvirt/images/a.qcow2', '/var/lib/libvirt/images')).toBe(true)
      expect(disks.isInImagesDir('/var/lib/libvirt/images', '/var/lib/libvirt/images')).toBe(false)
      expect(disks.isInImagesDir('/var/lib/libvirt/images2/a.qcow2', '/var/lib/libvirt/images')).toBe(false)
      expect(disks.isInImagesDir('/home/me/a.qcow2', '/var/lib/libvirt/images')).toBe(false)
    })
  })
})

describe('parseBackingFile', () => {
  it('keeps only the path before an actual-path note', () => {
    const output = 'image: a.qcow2\nfile format: qcow2\nbacking file: /images/base.qcow2 (actual path: /images/base.qcow2)\n'
    expect(parseBackingFile(output)).toBe('/images/base.qcow2')
  })

  it('returns null without a backing file line', () => {
    expect(parseBackingFile('image: base.qcow2\nfile format: qcow2\n')).toBeNull()
  })
})
