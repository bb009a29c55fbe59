/**
 * Array-in-document source for Telegram, Instagram and Discord JSON exports.
 */

import type { RecordScanner } from './scanner.js'
import { pull, type RecordDecoder, type RecordSource, type UnitResult } from './source.js'

export class ArrayRecordSource implements RecordSource {
  constructor(
    private readonly scanner: RecordScanner,
    private readonly decode: RecordDecoder
  ) {}

  next(): Promise<UnitResult | undefined> {
    return pull(async () => {
      const text = await this.scanner.next()
      return text === null ? undefined : this.decode(text)
    })
  }
}
