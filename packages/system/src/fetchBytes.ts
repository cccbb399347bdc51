/**
 * Fetch bytes for a URL
 *
 * Accepts local paths, file: URLs and http(s) URLs. Anything else is read
 * as a path, so a bad URL fails the same way a missing file does.
 */

import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'

export type FetchBytes = (url: string) => Promise<Uint8Array>

const HTTP_URL = /^https?:\/\//i

export const fetchBytes: FetchBytes = async (url) => {
  if (HTTP_URL.test(url)) {
    const response = await fetch(url)
    if (!response.ok) {
      throw new Error(`GET ${url} failed: ${response.status} ${response.statusText}`)
    }
    return new Uint8Array(await response.arrayBuffer())
  }

  const path = url.startsWith('file:') ? fileURLToPath(url) : url
  return new Uint8Array(await readFile(path))
}
