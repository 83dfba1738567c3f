import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { FakeToolchain } from './FakeToolchain'
import { LibvirtAdapter } from '../../src/core/LibvirtAdapter'
import { RoleOrchestrator } from '../../src/core/RoleOrchestrator'
import { TemplateManager } from '../../src/core/TemplateManager'
import { createGlobalConfig } from '../../src/config/GlobalConfig'
import { TemplateRegistry } from '../../src/config/TemplateRegistry'
import { GlobalConfig } from '../../src/types/config.types'
import { RoleKind, Template } from '../../src/types/template.types'

export interface TestEnvironment {
  root: string
  config: GlobalConfig
  fake: FakeToolchain
  adapter: LibvirtAdapter
  registry: TemplateRegistry
  orchestrator: RoleOrchestrator
  templateManager: TemplateManager
  gatewayTemplate: Template
  appTemplate: Template
}

export async function makeTempDir (): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), 'rolevirt-test-'))
}

/**
 * Temp directories for images, role configs and network XML, a fake
 * toolchain with `lan-net` defined, and a gateway and an app template.
 */
export async function createTestEnvironment (): Promise<TestEnvironment> {
  const root = await makeTempDir()
  const imagesDir = path.join(root, 'images')
  const tmpDir = path.join(root, 'tmp')
  await fs.mkdir(imagesDir)
  await fs.mkdir(tmpDir)

  const config = createGlobalConfig({ cfgRoot: path.join(root, 'roles'), imagesDir })
  const fake = new FakeToolchain()
  fake.addNetwork(config.lanNet)
  const adapter = new LibvirtAdapter(fake, { protectedPrefixes: [], tmpDir })
  const registry = new TemplateRegistry(path.join(root, 'templates.json'))

  const gatewayTemplate = await addTemplate(registry, imagesDir, 'gw-template', 'debian-gw.qcow2', RoleKind.PROXY_GATEWAY)
  const appTemplate = await addTemplate(registry, imagesDir, 'app-template', 'fedora-app.qcow2', RoleKind.APP)

  return {
    root,
    config,
    fake,
    adapter,
    registry,
    orchestrator: new RoleOrchestrator(adapter, config, registry, { restartDelayMs: 0 }),
    templateManager: new TemplateManager(adapter, config, registry),
    gatewayTemplate,
    appTemplate
  }
}

export async function removeTestEnvironment (env: TestEnvironment): Promise<void> {
  await fs.rm(env.root, { recursive: true, force: true })
}

async function addTemplate (
  registry: TemplateRegistry,
  imagesDir: string,
  id: string,
  file: string,
  roleKind: RoleKind
): Promise<Template> {
  const templatePath = path.join(imagesDir, file)
  await fs.writeFile(templatePath, 'base image\n')
  const template: Template = {
    id,
    label: file,
    path: templatePath,
    osVariant: roleKind === RoleKind.PROXY_GATEWAY ? 'debian12' : 'fedora40',
    roleKind,
    defaultRamMb: 1024
  }
  registry.add(template)
  return template
}
