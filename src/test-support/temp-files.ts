/**
 * Temporary Export Files for Tests
 *
 * Streams read from disk, so tests write their exports to a scratch
 * directory under the OS temp dir and remove it afterwards.
 *
 * Usage:
 * ```ts
 * const files = createTempFiles('stream')
 * const path = files.write('result.json', '{"messages":[]}')
 * // ...
 * await files.cleanup()
 * ```
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { type FileHandle, open as openFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

export interface TempFiles {
  readonly dir: string
  /** Write a file and return its path. */
  write(name: string, content: string | Uint8Array): string
  /** Write a file and open it for reading. */
  open(name: string, content: string | Uint8Array): Promise<FileHandle>
  /** Close opened handles and remove the directory. */
  cleanup(): Promise<void>
}

export function createTempFiles(prefix: string): TempFiles {
  const dir = mkdtempSync(join(tmpdir(), `chat-ingest-${prefix}-`))
  const handles: FileHandle[] = []

  const write = (name: string, content: string | Uint8Array): string => {
    const path = join(dir, name)
    writeFileSync(path, content)
    return path
  }

  return {
    dir,
    write,
    async open(name, content) {
      const handle = await openFile(write(name, content), 'r')
      handles.push(handle)
      return handle
    },
    async cleanup() {
      // Handles a test already closed reject here, which is fine
      await Promise.allSettled(handles.splice(0).map((handle) => handle.close()))
      rmSync(dir, { recursive: true, force: true })
    }
  }
}
