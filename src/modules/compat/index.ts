export { MIN_SOLC_VERSION, checkSolcCompat, isSolcCompatible, formatSolcRange } from './solc-compat.js'
export type { SolcRange } from './solc-compat.js'
