/**
 * Append-only table of target records addressed by handle.
 */

import { InvalidHandleError } from '../../core/errors.js'
import type { TargetHandle, TargetRecord } from './types.js'

export class TargetStore<TAttribs> {
  private readonly records: TargetRecord<TAttribs>[] = []

  get size(): number {
    return this.records.length
  }

  add(name: string, attribs?: TAttribs): TargetHandle {
    this.records.push({ name, attribs, state: 'Unstarted' })
    return this.records.length - 1
  }

  /**
   * Look up a record.
   *
   * @throws {InvalidHandleError} if the handle is not an index of this store
   */
  get(handle: TargetHandle): TargetRecord<TAttribs> {
    const record = Number.isInteger(handle) ? this.records[handle] : undefined
    if (record === undefined) {
      throw new InvalidHandleError(handle, this.records.length)
    }
    return record
  }

  handles(): TargetHandle[] {
    return this.records.map((_, handle) => handle)
  }
}
