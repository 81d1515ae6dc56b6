/**
 * Bulk Transport
 *
 * Side effects of bulk loading behind one interface: object storage, local
 * staging files and loader processes.
 * @module sql-table-insert/bulk/transport
 */

import { spawn } from 'child_process';
import { access, mkdir, rm, writeFile } from 'fs/promises';
import { constants } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DeleteObjectCommand, HeadBucketCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { SseType } from '../config/index.js';
import { BulkLoadError, toCause } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Object storage location and credentials.
 */
export interface ObjectStoreTarget {
  bucket: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  endpoint?: string;
}

/**
 * Object to upload.
 */
export interface PutObjectRequest {
  key: string;
  body: Uint8Array;
  contentType?: string;
  serverSideEncryption?: SseType;
}

/**
 * Loader process invocation.
 */
export interface ProcessRequest {
  command: string;
  args: readonly string[];
  /** Extra environment variables, merged over the current environment */
  env?: Record<string, string>;
}

/**
 * Outcome of a loader process.
 */
export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Side effects used by bulk loaders.
 */
export interface BulkTransport {
  /** Whether the bucket exists and the credentials can reach it */
  bucketExists(target: ObjectStoreTarget): Promise<boolean>;
  /** Uploads one object */
  putObject(target: ObjectStoreTarget, request: PutObjectRequest): Promise<void>;
  /** Deletes one object */
  deleteObject(target: ObjectStoreTarget, key: string): Promise<void>;
  /** Whether an executable exists at the path */
  executableExists(path: string): Promise<boolean>;
  /** Writes a staging file and returns its full path */
  writeStagingFile(name: string, contents: Uint8Array | string): Promise<string>;
  /** Removes a staging file; missing files are ignored */
  removeStagingFile(path: string): Promise<void>;
  /** Runs a process to completion */
  runProcess(request: ProcessRequest): Promise<ProcessResult>;
}

// ============================================================================
// Node Transport
// ============================================================================

/**
 * Node transport options.
 */
export interface NodeBulkTransportOptions {
  /** Directory for staging files (default: OS temp directory) */
  stagingDir?: string;
}

/**
 * Transport backed by the AWS S3 client, the local file system and child processes.
 */
export class NodeBulkTransport implements BulkTransport {
  private readonly stagingDir: string;
  private readonly clients = new Map<string, S3Client>();

  constructor(options: NodeBulkTransportOptions = {}) {
    this.stagingDir = options.stagingDir ?? tmpdir();
  }

  async bucketExists(target: ObjectStoreTarget): Promise<boolean> {
    try {
      await this.client(target).send(new HeadBucketCommand({ Bucket: target.bucket }));
      return true;
    } catch {
      return false;
    }
  }

  async putObject(target: ObjectStoreTarget, request: PutObjectRequest): Promise<void> {
    await this.client(target).send(
      new PutObjectCommand({
        Bucket: target.bucket,
        Key: request.key,
        Body: request.body,
        ContentType: request.contentType,
        ServerSideEncryption: request.serverSideEncryption,
      })
    );
  }

  async deleteObject(target: ObjectStoreTarget, key: string): Promise<void> {
    await this.client(target).send(new DeleteObjectCommand({ Bucket: target.bucket, Key: key }));
  }

  async executableExists(path: string): Promise<boolean> {
    try {
      await access(path, process.platform === 'win32' ? constants.F_OK : constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  async writeStagingFile(name: string, contents: Uint8Array | string): Promise<string> {
    await mkdir(this.stagingDir, { recursive: true });
    const path = join(this.stagingDir, name);
    await writeFile(path, contents);
    return path;
  }

  async removeStagingFile(path: string): Promise<void> {
    await rm(path, { force: true });
  }

  runProcess(request: ProcessRequest): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn(request.command, [...request.args], {
        env: request.env ? { ...process.env, ...request.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      proc.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      proc.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      proc.on('error', (error) => {
        reject(
          new BulkLoadError(`Failed to start ${request.command}: ${error.message}`, {
            cause: toCause(error),
            context: { command: request.command },
          })
        );
      });
      proc.on('close', (code) => {
        resolve({ exitCode: code ?? -1, stdout, stderr });
      });
    });
  }

  private client(target: ObjectStoreTarget): S3Client {
    const cacheKey = `${target.region}|${target.endpoint ?? ''}|${target.accessKeyId}`;
    let client = this.clients.get(cacheKey);
    if (!client) {
      client = new S3Client({
        region: target.region,
        endpoint: target.endpoint,
        credentials: {
          accessKeyId: target.accessKeyId,
          secretAccessKey: target.secretAccessKey,
        },
      });
      this.clients.set(cacheKey, client);
    }
    return client;
  }
}
