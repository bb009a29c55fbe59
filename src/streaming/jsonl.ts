/**
 * JSON Lines source: one record per non-blank line.
 */

import type { LineReader } from './reader.js'
import { pull, type RecordDecoder, type RecordSource, type UnitResult } from './source.js'

export class JsonlRecordSource implements RecordSource {
  constructor(
    private readonly lines: LineReader,
    private readonly decode: RecordDecoder
  ) {}

  next(): Promise<UnitResult | undefined> {
    return pull(async () => {
      while (true) {
        const line = await this.lines.next()
        if (line === null) return undefined
        if (line.trim().length > 0) return this.decode(line)
      }
    })
  }
}
