/**
 * Immutable byte buffer for an executable image.
 */

import { computeDigest } from './checksum/digest.js'

/**
 * An executable's bytes together with their lazily computed digest.
 *
 * @remarks
 * The constructor copies its input and {@link BinaryImage.bytes} hands out a
 * copy, so nothing outside the instance can change the content behind a
 * digest that has already been computed.
 *
 * @public
 */
export class BinaryImage {
  readonly #bytes: Uint8Array
  #digest: string | undefined

  constructor(bytes: Uint8Array) {
    this.#bytes = Uint8Array.from(bytes)
  }

  get length(): number {
    return this.#bytes.length
  }

  /** Lower-case hex MD5 of the content. */
  get digest(): string {
    this.#digest ??= computeDigest(this.#bytes)
    return this.#digest
  }

  /** A copy of the content. */
  get bytes(): Uint8Array {
    return Uint8Array.from(this.#bytes)
  }

  /** A copy of the content as a Node buffer, for disk or channel writes. */
  toBuffer(): Buffer {
    return Buffer.from(this.#bytes)
  }

  /** Whether both images hold the same bytes. */
  equals(other: BinaryImage): boolean {
    return Buffer.from(this.#bytes).equals(Buffer.from(other.#bytes))
  }
}
