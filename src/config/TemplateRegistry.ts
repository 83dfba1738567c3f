import { randomUUID } from 'crypto'
import path from 'path'
import { isRecord, numberField, readJsonFile, stringField, writeJsonFile } from '../utils/json'
import { Debugger } from '../utils/debug'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import { CONFIG_VERSION } from '../types/config.types'
import {
  DEFAULT_TEMPLATE_RAM_MB,
  RoleKind,
  Template,
  TemplateRegistryData,
  TEMPLATES_FILE
} from '../types/template.types'
import { defaultConfigPath } from './GlobalConfig'

/**
 * Registry file next to the global config file.
 */
export function defaultTemplatesPath (): string {
  return path.join(path.dirname(defaultConfigPath()), TEMPLATES_FILE)
}

/**
 * TemplateRegistry holds registered base images, persisted as JSON.
 * Listing order is registration order.
 */
export class TemplateRegistry {
  private templates: Map<string, Template> = new Map()
  private debug: Debugger

  constructor (readonly file: string = defaultTemplatesPath(), templates: Template[] = []) {
    this.debug = new Debugger('templates')
    for (const template of templates) {
      this.templates.set(template.id, template)
    }
  }

  /**
   * Loads the registry. A missing file gives an empty registry; entries
   * that do not parse are skipped with a warning.
   */
  static async load (file: string = defaultTemplatesPath()): Promise<TemplateRegistry> {
    const data = await readJsonFile(file)
    const registry = new TemplateRegistry(file)
    if (data === null) {
      return registry
    }
    if (!isRecord(data) || !Array.isArray(data.templates)) {
      throw new ProvisionError(ProvisionErrorCode.INVALID_CONFIG, `Template registry ${file} is malformed`, file)
    }

    for (const entry of data.templates) {
      const template = parseTemplate(entry)
      if (template === null) {
        registry.debug.log('warn', `Skipping malformed template entry in ${file}`)
        continue
      }
      registry.templates.set(template.id, template)
    }
    return registry
  }

  async save (): Promise<void> {
    const data: TemplateRegistryData = { version: CONFIG_VERSION, templates: this.list() }
    await writeJsonFile(this.file, data)
  }

  generateId (): string {
    return randomUUID()
  }

  /**
   * @throws ProvisionError ALREADY_EXISTS
   */
  add (template: Template): void {
    if (this.templates.has(template.id)) {
      throw new ProvisionError(ProvisionErrorCode.ALREADY_EXISTS, `Template with ID '${template.id}' already exists`, template.id)
    }
    this.templates.set(template.id, template)
  }

  /**
   * @throws ProvisionError NOT_FOUND
   */
  update (template: Template): void {
    if (!this.templates.has(template.id)) {
      throw notFound(template.id)
    }
    this.templates.set(template.id, template)
  }

  /**
   * @throws ProvisionError NOT_FOUND
   */
  remove (id: string): Template {
    const template = this.require(id)
    this.templates.delete(id)
    return template
  }

  get (id: string): Template | undefined {
    return this.templates.get(id)
  }

  /**
   * @throws ProvisionError NOT_FOUND
   */
  require (id: string): Template {
    const template = this.templates.get(id)
    if (template === undefined) {
      throw notFound(id)
    }
    return template
  }

  list (): Template[] {
    return [...this.templates.values()]
  }

  /**
   * Templates of `kind`, plus generic ones.
   */
  byRoleKind (kind: RoleKind): Template[] {
    return this.list().filter((t) => t.roleKind === kind || t.roleKind === RoleKind.GENERIC)
  }

  gatewayTemplates (): Template[] {
    return this.byRoleKind(RoleKind.PROXY_GATEWAY)
  }

  /**
   * App and disposable templates, plus generic ones.
   */
  appTemplates (): Template[] {
    return this.list().filter((t) => t.roleKind !== RoleKind.PROXY_GATEWAY)
  }
}

function notFound (id: string): ProvisionError {
  return new ProvisionError(ProvisionErrorCode.NOT_FOUND, `Template with ID '${id}' not found`, id)
}

function parseRoleKind (value: string | undefined): RoleKind | undefined {
  return Object.values(RoleKind).find((kind) => kind === value)
}

function parseTemplate (entry: unknown): Template | null {
  if (!isRecord(entry)) {
    return null
  }
  const id = stringField(entry, 'id')
  const label = stringField(entry, 'label')
  const templatePath = stringField(entry, 'path')
  const osVariant = stringField(entry, 'osVariant')
  const roleKind = parseRoleKind(stringField(entry, 'roleKind'))
  if (id === undefined || label === undefined || templatePath === undefined || osVariant === undefined || roleKind === undefined) {
    return null
  }

  const template: Template = {
    id,
    label,
    path: templatePath,
    osVariant,
    roleKind,
    defaultRamMb: numberField(entry, 'defaultRamMb') ?? DEFAULT_TEMPLATE_RAM_MB
  }
  const notes = stringField(entry, 'notes')
  if (notes !== undefined) {
    template.notes = notes
  }
  return template
}
