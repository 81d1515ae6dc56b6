/**
 * In-process stand-ins for a database connection and the bulk transport.
 * @module sql-table-insert/simulation
 */

export {
  RecordingConnection,
  type ConnectionEvent,
  type RecordingConnectionOptions,
} from './connection.js';
export {
  RecordingBulkTransport,
  type RecordingBulkTransportOptions,
  type RecordedObject,
} from './transport.js';
