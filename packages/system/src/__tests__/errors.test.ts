import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'
import { ArgumentError, fetchBytes, validate } from '@sketchloop/system'

describe('validate', () => {
  const widthSchema = z.number().int().positive()

  it('should return the parsed value', () => {
    expect(validate(widthSchema, 3, 'line width')).toBe(3)
  })

  it('should throw an ArgumentError naming the argument', () => {
    expect(() => validate(widthSchema, 0, 'line width')).toThrow(ArgumentError)
    expect(() => validate(widthSchema, 0, 'line width')).toThrow(/^invalid line width: /)
  })

  it('should include the issue path for nested values', () => {
    const pointSchema = z.tuple([z.number(), z.number()])
    expect(() => validate(pointSchema, [1, 'x'], 'point')).toThrow(/^invalid point at \[1\]: /)
  })
})

describe('fetchBytes', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sketchloop-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should read local paths', async () => {
    const path = join(dir, 'data.bin')
    writeFileSync(path, Uint8Array.from([1, 2, 3]))

    expect(Array.from(await fetchBytes(path))).toEqual([1, 2, 3])
  })

  it('should read file URLs', async () => {
    const path = join(dir, 'data.bin')
    writeFileSync(path, Uint8Array.from([4, 5]))

    expect(Array.from(await fetchBytes(pathToFileURL(path).href))).toEqual([4, 5])
  })

  it('should reject for a missing file', async () => {
    await expect(fetchBytes(join(dir, 'missing.png'))).rejects.toThrow()
  })
})
