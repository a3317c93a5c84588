import { createReadStream } from 'node:fs'
import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'
import { createGunzip } from 'node:zlib'

/**
 * Yields the lines of a text file, gunzipping `.gz` files on the fly.
 *
 * Streams the file so memory use does not grow with its size. Read and
 * decompression errors are rethrown once iteration stops.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  const file = createReadStream(filePath)
  const input: Readable = filePath.endsWith('.gz')
    ? file.pipe(createGunzip())
    : file

  const state: { error?: unknown } = {}
  const rl = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY })
  const fail = (error: unknown) => {
    state.error ??= error
    rl.close()
  }
  file.on('error', fail)
  if (input !== file) input.on('error', fail)

  try {
    for await (const line of rl) {
      if (state.error !== undefined) break
      yield line
    }
  } finally {
    rl.close()
    file.destroy()
    if (input !== file) input.destroy()
  }

  if (state.error !== undefined) {
    throw state.error
  }
}
