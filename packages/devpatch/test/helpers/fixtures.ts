/**
 * Access to the generated BSDIFF40 fixtures in test/fixtures/bsdiff.json.
 */
import * as fs from 'node:fs'
import { BinaryImage } from '../../src/image.js'

export type PayloadName =
  | 'branchFlip'
  | 'appendTrailer'
  | 'wrongTarget'
  | 'rotateHalves'
  | 'shortControl'
  | 'controlOverrun'

export interface PayloadFixture {
  bytes: Uint8Array
  outputMd5: string | undefined
  outputLength: number
}

interface FixtureFile {
  source: { md5: string; base64: string }
  payloads: Record<string, { base64: string; outputMd5?: string; outputLength: number }>
}

function isFixtureFile(value: unknown): value is FixtureFile {
  return typeof value === 'object' && value !== null && 'source' in value && 'payloads' in value
}

const raw: unknown = JSON.parse(fs.readFileSync(new URL('../fixtures/bsdiff.json', import.meta.url), 'utf-8'))
if (!isFixtureFile(raw)) {
  throw new Error('bsdiff.json fixture has an unexpected shape')
}
const fixtures = raw

/** MD5 of {@link sourceImage}. */
export const SOURCE_MD5 = fixtures.source.md5

/** The 2048-byte input every payload was generated against. */
export function sourceImage(): BinaryImage {
  return new BinaryImage(Buffer.from(fixtures.source.base64, 'base64'))
}

export function payload(name: PayloadName): PayloadFixture {
  const entry = fixtures.payloads[name]
  if (entry === undefined) {
    throw new Error(`No payload fixture named ${name}`)
  }
  return {
    bytes: new Uint8Array(Buffer.from(entry.base64, 'base64')),
    outputMd5: entry.outputMd5,
    outputLength: entry.outputLength,
  }
}
