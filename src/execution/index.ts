/**
 * Insert execution strategies: batched parameterized insert and create-as-select.
 * @module sql-table-insert/execution
 */

export { withAutoCommitSuspended } from './auto-commit.js';
export {
  DEFAULT_BATCH_SIZE,
  partitionRows,
  encodeInt64,
  decodeInt64,
  bindColumn,
  bindBatch,
  type BatchRange,
} from './binding.js';
export { INT64_PROBE_VALUES, checkInt64Encoding, assertInt64Transport } from './int64.js';
export {
  BatchedInsertExecutor,
  type BatchedInsertOptions,
  type BatchedInsertResult,
} from './batched-insert.js';
export { cellLiteral, buildCtasSql, CtasMaterializer, type CtasMaterializerOptions } from './ctas.js';
