import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { NodeBulkTransport, type ObjectStoreTarget } from '../bulk/index.js';

const s3 = vi.hoisted(() => {
  const sent: Array<{ command: string; input: Record<string, unknown> }> = [];
  const clients: Array<Record<string, unknown>> = [];
  return { sent, clients, failHeadBucket: { value: false } };
});

vi.mock('@aws-sdk/client-s3', () => {
  class Command {
    constructor(readonly input: Record<string, unknown>) {}
  }
  class HeadBucketCommand extends Command {}
  class PutObjectCommand extends Command {}
  class DeleteObjectCommand extends Command {}

  class S3Client {
    constructor(config: Record<string, unknown>) {
      s3.clients.push(config);
    }
    async send(command: Command): Promise<Record<string, unknown>> {
      s3.sent.push({ command: command.constructor.name, input: command.input });
      if (command instanceof HeadBucketCommand && s3.failHeadBucket.value) {
        throw new Error('NotFound');
      }
      return {};
    }
  }

  return { S3Client, HeadBucketCommand, PutObjectCommand, DeleteObjectCommand };
});

const target: ObjectStoreTarget = {
  bucket: 'staging',
  region: 'us-east-1',
  accessKeyId: 'test-key',
  secretAccessKey: 'test-secret',
};

describe('NodeBulkTransport', () => {
  beforeEach(() => {
    s3.sent.length = 0;
    s3.clients.length = 0;
    s3.failHeadBucket.value = false;
  });

  describe('object storage', () => {
    it('should report reachable and unreachable buckets', async () => {
      const transport = new NodeBulkTransport();

      expect(await transport.bucketExists(target)).toBe(true);
      s3.failHeadBucket.value = true;
      expect(await transport.bucketExists(target)).toBe(false);
      expect(s3.sent.map((s) => s.input)).toEqual([{ Bucket: 'staging' }, { Bucket: 'staging' }]);
    });

    it('should upload with server-side encryption and reuse the client', async () => {
      const transport = new NodeBulkTransport();
      const body = new Uint8Array([1, 2, 3]);

      await transport.putObject(target, { key: 'a.csv.gz', body, contentType: 'application/gzip', serverSideEncryption: 'AES256' });
      await transport.deleteObject(target, 'a.csv.gz');

      expect(s3.sent).toEqual([
        {
          command: 'PutObjectCommand',
          input: {
            Bucket: 'staging',
            Key: 'a.csv.gz',
            Body: body,
            ContentType: 'application/gzip',
            ServerSideEncryption: 'AES256',
          },
        },
        { command: 'DeleteObjectCommand', input: { Bucket: 'staging', Key: 'a.csv.gz' } },
      ]);
      expect(s3.clients).toEqual([
        {
          region: 'us-east-1',
          endpoint: undefined,
          credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
        },
      ]);
    });

    it('should upload without encryption when none is configured', async () => {
      await new NodeBulkTransport().putObject(target, { key: 'k', body: new Uint8Array() });
      expect(s3.sent[0]?.input['ServerSideEncryption']).toBeUndefined();
    });

    it('should pass KMS encryption through', async () => {
      await new NodeBulkTransport().putObject(target, { key: 'k', body: new Uint8Array(), serverSideEncryption: 'aws:kms' });
      expect(s3.sent[0]?.input['ServerSideEncryption']).toBe('aws:kms');
    });
  });

  describe('staging files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'table-insert-test-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write and remove staging files', async () => {
      const transport = new NodeBulkTransport({ stagingDir: join(dir, 'nested') });

      const path = await transport.writeStagingFile('load.csv', 'id\n1\n');
      expect(path).toBe(join(dir, 'nested', 'load.csv'));
      expect(await readFile(path, 'utf8')).toBe('id\n1\n');

      await transport.removeStagingFile(path);
      await expect(stat(path)).rejects.toThrow();
    });

    it('should ignore missing files on removal', async () => {
      await expect(new NodeBulkTransport({ stagingDir: dir }).removeStagingFile(join(dir, 'missing.csv'))).resolves.toBeUndefined();
    });

    it('should not find executables that do not exist', async () => {
      expect(await new NodeBulkTransport().executableExists(join(dir, 'dwloader'))).toBe(false);
    });
  });
});
