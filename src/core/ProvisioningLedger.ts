import fs from 'fs/promises'
import path from 'path'
import { Debugger, errorMessage } from '../utils/debug'
import { pathExists } from '../storage/OverlayDiskService'
import { ProvisionError, ProvisionErrorCode } from '../types/errors.types'
import { LedgerEntry, RollbackReport } from '../types/orchestrator.types'

type Undo = () => Promise<void>

interface LedgerRecord {
  entry: LedgerEntry
  undo: Undo
}

/**
 * ProvisioningLedger tracks the resources one provisioning run created,
 * each with the action that undoes it.
 *
 * Entries are recorded only after their create succeeded. On failure they
 * are undone newest first; every undo is attempted even when an earlier one
 * fails, and compensate() itself never throws.
 */
export class ProvisioningLedger {
  private records: LedgerRecord[] = []
  private debug: Debugger

  constructor (readonly role: string) {
    this.debug = new Debugger('ledger')
  }

  record (entry: LedgerEntry, undo: Undo): void {
    this.records.push({ entry, undo })
    this.debug.log(`Recorded ${describeEntry(entry)} for role ${this.role}`)
  }

  get entries (): LedgerEntry[] {
    return this.records.map((r) => r.entry)
  }

  get isEmpty (): boolean {
    return this.records.length === 0
  }

  /**
   * Forgets every entry without undoing anything.
   */
  clear (): void {
    this.records = []
  }

  async compensate (): Promise<RollbackReport> {
    const report: RollbackReport = { role: this.role, compensated: [], failed: [] }
    const pending = this.records.reverse()
    this.records = []

    for (const { entry, undo } of pending) {
      try {
        await undo()
        report.compensated.push(entry)
        this.debug.log(`Undid ${describeEntry(entry)}`)
      } catch (error) {
        const message = errorMessage(error)
        this.debug.log('warn', `Failed to undo ${describeEntry(entry)}: ${message}`)
        report.failed.push({ entry, error: message })
      }
    }

    return report
  }
}

/**
 * Removes a directory this run created. Only the manifest's files are
 * deleted when anything else appeared in it meanwhile.
 * @throws ProvisionError PRECONDITION_FAILED when foreign files keep the
 * directory in place
 */
export async function removeManifestDir (dir: string, manifest: string[]): Promise<void> {
  if (!await pathExists(dir)) {
    return
  }

  const foreign = (await fs.readdir(dir)).filter((name) => !manifest.includes(name))
  if (foreign.length === 0) {
    await fs.rm(dir, { recursive: true, force: true })
    return
  }

  for (const name of manifest) {
    await fs.rm(path.join(dir, name), { force: true })
  }
  throw new ProvisionError(
    ProvisionErrorCode.PRECONDITION_FAILED,
    `Directory ${dir} holds files not written by this run (${foreign.join(', ')}); left in place`,
    dir,
    { foreign }
  )
}

export function describeEntry (entry: LedgerEntry): string {
  switch (entry.kind) {
    case 'network':
      return `network ${entry.name}`
    case 'roleDir':
      return `role directory ${entry.path}`
    case 'overlay':
      return `overlay ${entry.path}`
    case 'vm':
      return `VM ${entry.name}`
  }
}
