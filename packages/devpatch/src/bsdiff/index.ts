export { applyPatch } from './apply.js'
export { readPatchHeader, readOfftin, BSDIFF_MAGIC, HEADER_SIZE, MAX_OUTPUT_LENGTH } from './header.js'
export type { PatchHeader, PatchError, PatchErrorKind } from './header.js'
