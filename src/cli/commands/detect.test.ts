import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createTempFiles, type TempFiles } from '../../test-support/index.js'
import type { CLIArgs } from '../args.js'
import type { Logger } from '../logger.js'
import { cmdDetect } from './detect.js'

function recordingLogger(lines: string[], verbose = false): Logger {
  return {
    log: (msg) => lines.push(msg),
    verbose: (msg) => {
      if (verbose) lines.push(`[debug] ${msg}`)
    },
    success: (msg) => lines.push(`✓ ${msg}`),
    warn: (msg) => lines.push(`! ${msg}`),
    error: (msg) => lines.push(`✗ ${msg}`),
    progress: () => {}
  }
}

function detectArgs(input: string): CLIArgs {
  return {
    command: 'detect',
    input,
    platform: undefined,
    jsonOutput: undefined,
    csvOutput: undefined,
    after: undefined,
    before: undefined,
    from: undefined,
    merge: true,
    timestamps: false,
    replies: false,
    ids: false,
    edited: false,
    strict: false,
    maxRecordSize: undefined,
    bufferSize: undefined,
    quiet: false,
    verbose: false,
    configFile: undefined,
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

describe('detect command', () => {
  let files: TempFiles

  beforeEach(() => {
    files = createTempFiles('detect-cmd')
  })

  afterEach(async () => {
    await files.cleanup()
  })

  it('reports a JSON platform', async () => {
    const input = files.write('message_1.json', '{"messages":[{"sender_name":"A","timestamp_ms":1}]}')
    const lines: string[] = []
    await cmdDetect(detectArgs(input), recordingLogger(lines))
    expect(lines).toEqual(['✓ message_1.json: Instagram (instagram)'])
  })

  it('reports the WhatsApp line layout', async () => {
    const input = files.write('chat.txt', '15.01.24, 10:30 - Anna: Hallo\n15.01.24, 10:31 - Ben: Hi\n')
    const lines: string[] = []
    await cmdDetect(detectArgs(input), recordingLogger(lines, true))
    expect(lines.slice(0, 2)).toEqual([
      '✓ chat.txt: WhatsApp (whatsapp)',
      '✓ Line layout: eu_dot_no_bracket'
    ])
    expect(lines).toContain('[debug] eu_dot_no_bracket: 2 matched, 2 parsed')
  })

  it('warns when a text file matches no layout', async () => {
    const input = files.write('notes.txt', 'shopping list\n')
    const lines: string[] = []
    await cmdDetect(detectArgs(input), recordingLogger(lines))
    expect(lines).toEqual([
      '✓ notes.txt: WhatsApp (whatsapp)',
      '! No WhatsApp line layout matched the first lines of the file'
    ])
  })

  it('fails on files it cannot place', async () => {
    const input = files.write('data.json', '{"rows":[]}')
    await expect(cmdDetect(detectArgs(input), recordingLogger([]))).rejects.toThrow(
      'Could not detect the platform of data.json'
    )
  })
})
