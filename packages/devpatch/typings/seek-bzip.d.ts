// seek-bzip ships no type declarations.
declare module 'seek-bzip' {
  interface Bunzip {
    /**
     * Decompress a complete bzip2 stream. Throws on corrupt input or a CRC
     * mismatch.
     */
    decode(input: Uint8Array, output?: Uint8Array, multistream?: boolean): Buffer
  }

  const bunzip: Bunzip
  export default bunzip
}
