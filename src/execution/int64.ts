/**
 * 64-bit integer transport self-check, run once before binding any BIGINT column.
 * @module sql-table-insert/execution/int64
 */

import type { InsertConnection } from '../connection/index.js';
import { Int64TransportError } from '../errors/index.js';
import { decodeInt64, encodeInt64 } from './binding.js';

/**
 * Values that must survive encoding unchanged: both signs, inside and beyond 32 bits.
 */
export const INT64_PROBE_VALUES: readonly bigint[] = [1n, -1n, 8589934592n, -8589934592n];

/**
 * Round-trips the probe values through the driver encoding.
 */
export function checkInt64Encoding(): boolean {
  return INT64_PROBE_VALUES.every((value) => decodeInt64(encodeInt64(value)) === value);
}

/**
 * Verifies that 64-bit integers reach the connection intact, using the
 * connection's own check when it has one.
 *
 * @throws {Int64TransportError} If the check fails
 */
export async function assertInt64Transport(connection: InsertConnection): Promise<void> {
  const ok = connection.validateInt64Transport
    ? await connection.validateInt64Transport()
    : checkInt64Encoding();
  if (!ok) {
    throw new Int64TransportError();
  }
}
