export { computeDigest, isDigest, normalizeDigest, verifyDigest, parseDigestOutput } from './digest.js'
export type { ExpectedDigest, Digestible } from './digest.js'
