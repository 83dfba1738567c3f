/**
 * Template registry types
 */

/** Registry file name under the config directory */
export const TEMPLATES_FILE = 'templates.json'

/** RAM suggested for VMs of a template when none is given */
export const DEFAULT_TEMPLATE_RAM_MB = 1024

/** Smallest RAM a template may suggest */
export const MIN_TEMPLATE_RAM_MB = 128

/**
 * Which kind of VM a template is meant for
 */
export enum RoleKind {
  PROXY_GATEWAY = 'proxy_gateway',
  APP = 'app',
  DISPOSABLE_APP = 'disposable_app',
  /** Usable for any kind */
  GENERIC = 'generic'
}

/**
 * A registered base disk image
 */
export interface Template {
  /** Random UUID */
  id: string
  label: string
  /** Absolute path under the images directory */
  path: string
  osVariant: string
  roleKind: RoleKind
  defaultRamMb: number
  notes?: string
}

export interface TemplateRegistryData {
  version: number
  templates: Template[]
}

/**
 * Input of TemplateManager.registerTemplate. `path` may lie outside the
 * images directory; the file is then copied in.
 */
export interface RegisterTemplateInput {
  label: string
  path: string
  /** Defaults to the configured Debian variant for gateways, Fedora otherwise */
  osVariant?: string
  roleKind: RoleKind
  defaultRamMb?: number
  notes?: string
}

export type UpdateTemplateInput = Partial<Omit<Template, 'id'>>

export interface DeleteTemplateOptions {
  /** Also delete the image file */
  deleteFile?: boolean
  /** Delete the file even if VMs still use it */
  force?: boolean
}
