import fs from 'fs/promises'
import path from 'path'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import { errorMessage } from './debug'

export type JsonRecord = Record<string, unknown>

export function isRecord (value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function stringField (record: JsonRecord, key: string): string | undefined {
  const value = record[key]
  return typeof value === 'string' ? value : undefined
}

export function numberField (record: JsonRecord, key: string): number | undefined {
  const value = record[key]
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

/**
 * Reads and parses a JSON file.
 * @returns null when the file does not exist
 * @throws ProvisionError IO_ERROR on unreadable files
 * @throws ProvisionError INVALID_CONFIG on malformed JSON
 */
export async function readJsonFile (file: string): Promise<unknown> {
  let text: string
  try {
    text = await fs.readFile(file, 'utf8')
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return null
    }
    throw new ProvisionError(ProvisionErrorCode.IO_ERROR, `Cannot read ${file}: ${errorMessage(error)}`, file)
  }

  try {
    const parsed: unknown = JSON.parse(text)
    return parsed
  } catch (error) {
    throw new ProvisionError(ProvisionErrorCode.INVALID_CONFIG, `Malformed JSON in ${file}: ${errorMessage(error)}`, file)
  }
}

/**
 * Writes `value` as pretty-printed JSON, creating parent directories.
 * @throws ProvisionError IO_ERROR
 */
export async function writeJsonFile (file: string, value: unknown): Promise<void> {
  try {
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(file, JSON.stringify(value, null, 2) + '\n')
  } catch (error) {
    throw new ProvisionError(ProvisionErrorCode.IO_ERROR, `Cannot write ${file}: ${errorMessage(error)}`, file)
  }
}

/** fs errors can come from another realm under Jest */
function isNodeError (error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error
}
