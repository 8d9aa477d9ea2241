/**
 * SHA-256 verification of downloaded binaries.
 */

import { createHash } from 'node:crypto'
import { ChecksumValidationError } from '../../core/errors.js'

export function sha256Hex(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex')
}

/**
 * Verify `data` against a hex-encoded SHA-256 digest. Comparison ignores
 * case and an optional `0x` prefix.
 *
 * @throws {ChecksumValidationError} carrying both the expected and computed digests
 */
export function verifyChecksum(data: Uint8Array, expected: string): void {
  const actual = sha256Hex(data)
  const normalized = expected.toLowerCase().replace(/^0x/, '')
  if (normalized !== actual) {
    throw new ChecksumValidationError(expected, actual)
  }
}
