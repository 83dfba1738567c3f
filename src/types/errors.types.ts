/**
 * Error Type Definitions
 *
 * One error class covers the adapter and the orchestrator. The code tells
 * callers which remediation path applies: fix the input, install a missing
 * tool, or inspect the captured stderr of a failed command.
 */

import { errorMessage } from '../utils/debug'

/**
 * Error codes for structured error handling
 */
export enum ProvisionErrorCode {
  /** A read-only precondition does not hold (missing LAN network, etc.) */
  PRECONDITION_FAILED = 'PRECONDITION_FAILED',
  /** Role name does not match the allowed pattern */
  INVALID_ROLE_NAME = 'INVALID_ROLE_NAME',
  /** Global or gateway configuration is invalid */
  INVALID_CONFIG = 'INVALID_CONFIG',
  /** Template missing, unreadable or not a regular file */
  TEMPLATE_INVALID = 'TEMPLATE_INVALID',
  /** External tool exited non-zero */
  TOOL_INVOCATION_FAILED = 'TOOL_INVOCATION_FAILED',
  /** External tool is not installed */
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  /** Role, VM, network, overlay or template already exists */
  ALREADY_EXISTS = 'ALREADY_EXISTS',
  /** Role, template or metadata not found */
  NOT_FOUND = 'NOT_FOUND',
  /** Current user cannot talk to libvirt */
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  /** TCP pre-flight probe failed */
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  /** Local filesystem operation failed */
  IO_ERROR = 'IO_ERROR'
}

/** Packages that provide virsh, virt-install and qemu-img on Debian/Ubuntu */
export const INSTALL_HINT = 'Install with: sudo apt install libvirt-clients virtinst qemu-utils'

/**
 * Custom error class for provisioning operations
 */
export class ProvisionError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ProvisionErrorCode

  /** Name or path of the resource involved */
  public readonly resource?: string

  /** Command line, stderr, exit code and similar details */
  public readonly context?: Record<string, unknown>

  constructor (
    code: ProvisionErrorCode,
    message: string,
    resource?: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'ProvisionError'
    this.code = code
    this.resource = resource
    this.context = context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProvisionError)
    }
  }

  /** Captured standard error of the failed command, if any */
  get stderr (): string | undefined {
    const stderr = this.context?.stderr
    return typeof stderr === 'string' ? stderr : undefined
  }
}

/**
 * Type guard to check if an error is a ProvisionError
 */
export function isProvisionError (error: unknown): error is ProvisionError {
  return error instanceof ProvisionError
}

/**
 * Returns the error unchanged when it already is a ProvisionError,
 * otherwise wraps it under the given code.
 */
export function toProvisionError (
  error: unknown,
  code: ProvisionErrorCode,
  resource?: string
): ProvisionError {
  if (error instanceof ProvisionError) {
    return error
  }
  const message = errorMessage(error)
  return new ProvisionError(code, message, resource, { cause: message })
}
