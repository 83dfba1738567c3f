import { LibvirtAdapter } from './LibvirtAdapter'
import { TemplateRegistry } from '../config/TemplateRegistry'
import { Debugger } from '../utils/debug'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import { GlobalConfig } from '../types/config.types'
import {
  DEFAULT_TEMPLATE_RAM_MB,
  DeleteTemplateOptions,
  MIN_TEMPLATE_RAM_MB,
  RegisterTemplateInput,
  RoleKind,
  Template,
  UpdateTemplateInput
} from '../types/template.types'

/**
 * TemplateManager registers base images and keeps the registry file in
 * step with the images directory.
 */
export class TemplateManager {
  private debug: Debugger

  constructor (
    private readonly adapter: LibvirtAdapter,
    private readonly config: GlobalConfig,
    private readonly registry: TemplateRegistry
  ) {
    this.debug = new Debugger('templates')
  }

  /**
   * Registers an image, copying it into the images directory first when it
   * lives elsewhere.
   * @throws ProvisionError INVALID_CONFIG for an empty label or too little RAM
   * @throws ProvisionError TEMPLATE_INVALID when the image is missing
   */
  async registerTemplate (input: RegisterTemplateInput): Promise<Template> {
    const defaults = this.config.defaults
    const template: Template = {
      id: this.registry.generateId(),
      label: input.label,
      path: input.path,
      osVariant: input.osVariant ?? (input.roleKind === RoleKind.PROXY_GATEWAY
        ? defaults.debianOsVariant
        : defaults.fedoraOsVariant),
      roleKind: input.roleKind,
      defaultRamMb: input.defaultRamMb ?? DEFAULT_TEMPLATE_RAM_MB
    }
    if (input.notes !== undefined) {
      template.notes = input.notes
    }

    await this.prepare(template)
    this.registry.add(template)
    await this.registry.save()
    this.debug.log(`Registered template ${template.label} (${template.id}) at ${template.path}`)
    return template
  }

  /**
   * Applies `changes` under the same checks as registration; a new path
   * outside the images directory is copied in.
   * @throws ProvisionError NOT_FOUND
   * @throws ProvisionError INVALID_CONFIG
   * @throws ProvisionError TEMPLATE_INVALID
   */
  async updateTemplate (id: string, changes: UpdateTemplateInput): Promise<Template> {
    const updated: Template = { ...this.registry.require(id), ...changes, id }
    await this.prepare(updated)
    this.registry.update(updated)
    await this.registry.save()
    return updated
  }

  /**
   * All templates, or those usable for `kind` (including generic ones).
   */
  listTemplates (kind?: RoleKind): Template[] {
    return kind === undefined ? this.registry.list() : this.registry.byRoleKind(kind)
  }

  gatewayTemplates (): Template[] {
    return this.registry.gatewayTemplates()
  }

  appTemplates (): Template[] {
    return this.registry.appTemplates()
  }

  /**
   * Unregisters a template and, with `deleteFile`, removes its image.
   * @throws ProvisionError NOT_FOUND
   * @throws ProvisionError PRECONDITION_FAILED when the file is to be
   * deleted while VMs still use it and `force` is not set
   */
  async deleteTemplate (id: string, options: DeleteTemplateOptions = {}): Promise<Template> {
    const template = this.registry.require(id)

    if (options.deleteFile === true && options.force !== true) {
      const users = await this.adapter.getVmsUsingImage(template.path)
      if (users.length > 0) {
        throw new ProvisionError(
          ProvisionErrorCode.PRECONDITION_FAILED,
          `Template '${template.label}' is used by: ${users.join(', ')}`,
          template.path,
          { vms: users }
        )
      }
    }

    this.registry.remove(id)
    await this.registry.save()
    if (options.deleteFile === true) {
      await this.adapter.deleteFile(template.path)
    }
    this.debug.log(`Deleted template ${template.label} (${id})`)
    return template
  }

  /**
   * Validates a template and moves its image into the images directory,
   * rewriting `template.path` when a copy was made.
   */
  private async prepare (template: Template): Promise<void> {
    if (template.label.trim().length === 0) {
      throw new ProvisionError(ProvisionErrorCode.INVALID_CONFIG, 'Template label cannot be empty', template.id)
    }
    if (!Number.isInteger(template.defaultRamMb) || template.defaultRamMb < MIN_TEMPLATE_RAM_MB) {
      throw new ProvisionError(
        ProvisionErrorCode.INVALID_CONFIG,
        `Template RAM must be at least ${MIN_TEMPLATE_RAM_MB} MB`,
        template.id
      )
    }

    const imagesDir = this.config.imagesDir
    await this.adapter.ensureImagesDir(imagesDir)
    await this.adapter.validateTemplate(template.path)
    if (!this.adapter.isInImagesDir(template.path, imagesDir)) {
      template.path = await this.adapter.copyTemplateToImagesDir(template.path, imagesDir)
    }
  }
}
