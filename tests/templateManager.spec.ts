/**
 * TemplateManager tests
 *
 * Registration into the images directory, edits, filtering and guarded
 * deletion of templates that still back VM disks.
 */

import fs from 'fs/promises'
import path from 'path'
import { createTestEnvironment, removeTestEnvironment, TestEnvironment } from './helpers/testEnvironment'
import { TemplateRegistry } from '../src/config/TemplateRegistry'
import { ProvisionErrorCode } from '../src/types/errors.types'
import { GatewayMode, ProxyType } from '../src/types/gateway.types'
import { RoleKind, UpdateTemplateInput } from '../src/types/template.types'

describe('TemplateManager', () => {
  let env: TestEnvironment

  beforeEach(async () => {
    env = await createTestEnvironment()
  })

  afterEach(async () => {
    await removeTestEnvironment(env)
  })

  const exists = async (target: string): Promise<boolean> => await fs.access(target).then(() => true, () => false)

  describe('registerTemplate', () => {
    it('copies an outside image into the images directory', async () => {
      const downloads = path.join(env.root, 'downloads')
      await fs.mkdir(downloads)
      const source = path.join(downloads, 'debian-13.qcow2')
      await fs.writeFile(source, 'fresh image\n')
      const destination = path.join(env.config.imagesDir, 'debian-13.qcow2')

      const template = await env.templateManager.registerTemplate({
        label: 'Debian 13',
        path: source,
        osVariant: 'debian13',
        roleKind: RoleKind.GENERIC
      })

      expect(template).toEqual({
        id: template.id,
        label: 'Debian 13',
        path: destination,
        osVariant: 'debian13',
        roleKind: RoleKind.GENERIC,
        defaultRamMb: 1024
      })
      expect(env.fake.calls).toEqual([`cp ${source} ${destination}`, `chmod 644 ${destination}`])
      await expect(fs.readFile(destination, 'utf8')).resolves.toBe('fresh image\n')
    })

    it('registers an image already in place without copying', async () => {
      const template = await env.templateManager.registerTemplate({
        label: 'gateway again',
        path: env.gatewayTemplate.path,
        osVariant: 'debian12',
        roleKind: RoleKind.PROXY_GATEWAY,
        defaultRamMb: 512,
        notes: 'second entry'
      })

      expect(template.path).toBe(env.gatewayTemplate.path)
      expect(template.notes).toBe('second entry')
      expect(env.fake.calls).toEqual([])
    })

    it('persists the registry', async () => {
      const template = await env.templateManager.registerTemplate({
        label: 'app',
        path: env.appTemplate.path,
        osVariant: 'fedora40',
        roleKind: RoleKind.APP
      })

      const loaded = await TemplateRegistry.load(env.registry.file)
      expect(loaded.require(template.id).label).toBe('app')
    })

    it('takes the OS variant from the config defaults by kind', async () => {
      const gateway = await env.templateManager.registerTemplate({
        label: 'gw',
        path: env.gatewayTemplate.path,
        roleKind: RoleKind.PROXY_GATEWAY
      })
      const app = await env.templateManager.registerTemplate({
        label: 'app',
        path: env.appTemplate.path,
        roleKind: RoleKind.DISPOSABLE_APP
      })

      expect(gateway.osVariant).toBe('debian12')
      expect(app.osVariant).toBe('fedora40')
    })

    it.each<{ label: string, defaultRamMb: number, message: string }>([
      { label: '  ', defaultRamMb: 1024, message: 'Template label cannot be empty' },
      { label: 'small', defaultRamMb: 64, message: 'Template RAM must be at least 128 MB' }
    ])('rejects: $message', async ({ label, defaultRamMb, message }) => {
      await expect(env.templateManager.registerTemplate({
        label,
        path: env.appTemplate.path,
        roleKind: RoleKind.APP,
        defaultRamMb
      })).rejects.toMatchObject({ code: ProvisionErrorCode.INVALID_CONFIG, message })
      expect(env.registry.list()).toHaveLength(2)
      expect(env.fake.calls).toEqual([])
    })

    it('refuses a missing image', async () => {
      await expect(env.templateManager.registerTemplate({
        label: 'ghost',
        path: path.join(env.root, 'ghost.qcow2'),
        osVariant: 'debian12',
        roleKind: RoleKind.APP
      })).rejects.toMatchObject({ code: ProvisionErrorCode.TEMPLATE_INVALID })
      expect(env.registry.list()).toHaveLength(2)
    })
  })

  describe('updateTemplate', () => {
    it('merges changes and keeps the id', async () => {
      const updated = await env.templateManager.updateTemplate('app-template', { label: 'Fedora desktop', defaultRamMb: 4096 })

      expect(updated).toEqual({ ...env.appTemplate, label: 'Fedora desktop', defaultRamMb: 4096 })
      const loaded = await TemplateRegistry.load(env.registry.file)
      expect(loaded.require('app-template').defaultRamMb).toBe(4096)
    })

    it.each<{ changes: UpdateTemplateInput, code: ProvisionErrorCode, message: string }>([
      { changes: { label: '' }, code: ProvisionErrorCode.INVALID_CONFIG, message: 'Template label cannot be empty' },
      { changes: { defaultRamMb: 0 }, code: ProvisionErrorCode.INVALID_CONFIG, message: 'Template RAM must be at least 128 MB' },
      { changes: { path: '/nonexistent/x.qcow2' }, code: ProvisionErrorCode.TEMPLATE_INVALID, message: 'Template disk does not exist: /nonexistent/x.qcow2' }
    ])('rejects an edit: $message', async ({ changes, code, message }) => {
      await expect(env.templateManager.updateTemplate('app-template', changes)).rejects.toMatchObject({ code, message })

      expect(env.registry.require('app-template')).toEqual(env.appTemplate)
    })

    it('copies a new image from outside into the images directory', async () => {
      const source = path.join(env.root, 'fedora-41.qcow2')
      await fs.writeFile(source, 'newer image\n')
      const destination = path.join(env.config.imagesDir, 'fedora-41.qcow2')

      const updated = await env.templateManager.updateTemplate('app-template', { path: source })

      expect(updated.path).toBe(destination)
      expect(env.fake.calls).toEqual([`cp ${source} ${destination}`, `chmod 644 ${destination}`])
      const loaded = await TemplateRegistry.load(env.registry.file)
      expect(loaded.require('app-template').path).toBe(destination)
    })

    it('rejects unknown ids', async () => {
      await expect(env.templateManager.updateTemplate('nope', { label: 'x' })).rejects.toMatchObject({
        code: ProvisionErrorCode.NOT_FOUND,
        message: "Template with ID 'nope' not found"
      })
    })
  })

  describe('listing', () => {
    it('filters by kind', () => {
      expect(env.templateManager.listTemplates().map((t) => t.id)).toEqual(['gw-template', 'app-template'])
      expect(env.templateManager.listTemplates(RoleKind.APP).map((t) => t.id)).toEqual(['app-template'])
      expect(env.templateManager.gatewayTemplates().map((t) => t.id)).toEqual(['gw-template'])
      expect(env.templateManager.appTemplates().map((t) => t.id)).toEqual(['app-template'])
    })
  })

  describe('deleteTemplate', () => {
    beforeEach(async () => {
      await env.orchestrator.createRole({
        roleName: 'work',
        gwTemplateId: 'gw-template',
        gateway: { mode: GatewayMode.PROXY_CHAIN, hops: [{ proxyType: ProxyType.SOCKS5, host: '10.0.0.5', port: 1080 }] }
      })
    })

    it('refuses to delete an image that backs a VM disk', async () => {
      await expect(env.templateManager.deleteTemplate('gw-template', { deleteFile: true })).rejects.toMatchObject({
        code: ProvisionErrorCode.PRECONDITION_FAILED,
        message: "Template 'debian-gw.qcow2' is used by: work-gw",
        context: { vms: ['work-gw'] }
      })
      expect(env.registry.get('gw-template')).toBeDefined()
      expect(await exists(env.gatewayTemplate.path)).toBe(true)
    })

    it('deletes anyway with force', async () => {
      await expect(env.templateManager.deleteTemplate('gw-template', { deleteFile: true, force: true }))
        .resolves.toEqual(env.gatewayTemplate)
      expect(env.registry.get('gw-template')).toBeUndefined()
      expect(await exists(env.gatewayTemplate.path)).toBe(false)
    })

    it('only unregisters without deleteFile', async () => {
      await env.templateManager.deleteTemplate('gw-template')

      expect(await exists(env.gatewayTemplate.path)).toBe(true)
      const loaded = await TemplateRegistry.load(env.registry.file)
      expect(loaded.list().map((t) => t.id)).toEqual(['app-template'])
    })

    it('deletes an unused image', async () => {
      await env.templateManager.deleteTemplate('app-template', { deleteFile: true })
      expect(await exists(env.appTemplate.path)).toBe(false)
    })
  })
})
