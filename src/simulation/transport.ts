/**
 * Recording Bulk Transport
 *
 * In-process bulk transport that keeps staged payloads and loader commands
 * in memory and simulates their outcome.
 * @module sql-table-insert/simulation/transport
 */

import { gunzipSync } from 'zlib';
import type {
  BulkTransport,
  ObjectStoreTarget,
  ProcessRequest,
  ProcessResult,
  PutObjectRequest,
} from '../bulk/index.js';
import type { SseType } from '../config/index.js';

/**
 * Recording transport options.
 */
export interface RecordingBulkTransportOptions {
  /** Whether `bucketExists` succeeds (default: true) */
  bucketExists?: boolean;
  /** Paths reported as existing executables (default: every path) */
  executables?: readonly string[];
  /** Result of every process run (default: exit code 0) */
  processResult?: Partial<ProcessResult>;
  /** Directory prefix of staging file paths (default: '/staging') */
  stagingDir?: string;
}

/**
 * Uploaded object as recorded.
 */
export interface RecordedObject {
  bucket: string;
  key: string;
  body: Uint8Array;
  serverSideEncryption?: SseType;
}

/**
 * Transport that records instead of performing side effects.
 */
export class RecordingBulkTransport implements BulkTransport {
  /** Objects currently stored, by `bucket/key` */
  readonly objects = new Map<string, RecordedObject>();
  /** Every object ever uploaded */
  readonly uploads: RecordedObject[] = [];
  /** Deleted object keys */
  readonly deletedObjects: string[] = [];
  /** Staging files currently present, by path */
  readonly files = new Map<string, Uint8Array | string>();
  /** Every staging file ever written */
  readonly writtenFiles: Array<{ path: string; contents: Uint8Array | string }> = [];
  /** Removed staging file paths */
  readonly removedFiles: string[] = [];
  /** Process runs, in order */
  readonly processes: ProcessRequest[] = [];
  /** Executable lookups, in order */
  readonly executableChecks: string[] = [];

  private readonly options: RecordingBulkTransportOptions;

  constructor(options: RecordingBulkTransportOptions = {}) {
    this.options = options;
  }

  async bucketExists(_target: ObjectStoreTarget): Promise<boolean> {
    return this.options.bucketExists ?? true;
  }

  async putObject(target: ObjectStoreTarget, request: PutObjectRequest): Promise<void> {
    const object: RecordedObject = {
      bucket: target.bucket,
      key: request.key,
      body: request.body,
      serverSideEncryption: request.serverSideEncryption,
    };
    this.objects.set(`${target.bucket}/${request.key}`, object);
    this.uploads.push(object);
  }

  async deleteObject(target: ObjectStoreTarget, key: string): Promise<void> {
    this.objects.delete(`${target.bucket}/${key}`);
    this.deletedObjects.push(key);
  }

  async executableExists(path: string): Promise<boolean> {
    this.executableChecks.push(path);
    return this.options.executables ? this.options.executables.includes(path) : true;
  }

  async writeStagingFile(name: string, contents: Uint8Array | string): Promise<string> {
    const path = `${this.options.stagingDir ?? '/staging'}/${name}`;
    this.files.set(path, contents);
    this.writtenFiles.push({ path, contents });
    return path;
  }

  async removeStagingFile(path: string): Promise<void> {
    this.files.delete(path);
    this.removedFiles.push(path);
  }

  async runProcess(request: ProcessRequest): Promise<ProcessResult> {
    this.processes.push(request);
    return {
      exitCode: this.options.processResult?.exitCode ?? 0,
      stdout: this.options.processResult?.stdout ?? '',
      stderr: this.options.processResult?.stderr ?? '',
    };
  }

  /**
   * Text of an uploaded object or staging payload, gunzipped when compressed.
   */
  static text(payload: Uint8Array | string): string {
    if (typeof payload === 'string') return payload;
    const gzipped = payload.length >= 2 && payload[0] === 0x1f && payload[1] === 0x8b;
    return Buffer.from(gzipped ? gunzipSync(payload) : payload).toString('utf8');
  }
}
