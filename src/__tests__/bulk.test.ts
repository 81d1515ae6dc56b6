/**
 * Tests for the staged bulk loaders, run against the recording transport.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  buildCopyCommand,
  buildDwloaderArgs,
  createBulkLoadAdapter,
  HiveBulkLoadAdapter,
  PdwBulkLoadAdapter,
  PostgresqlBulkLoadAdapter,
  psqlExecutable,
  RedshiftBulkLoadAdapter,
  redshiftObjectKey,
  tableDataToDelimited,
  type BulkLoadContext,
} from '../bulk/index.js';
import { parsePdwBulkConfig, type BulkLoadConfig } from '../config/index.js';
import { HiveDialect, PdwDialect, PostgresqlDialect, RedshiftDialect, type Dialect } from '../dialect/index.js';
import { RecordingBulkTransport, RecordingConnection } from '../simulation/index.js';
import { describeColumns } from '../inference/index.js';
import { buildInsertPlan } from '../strategy/index.js';
import { tableDataFromRecords } from '../frame/index.js';
import { InMemoryLogger, LogLevel, NoopLogger } from '../observability/index.js';
import { BulkLoadCredentialsError, BulkLoadError, ConfigurationError } from '../errors/index.js';
import { InsertStrategy, type TableData } from '../types/index.js';

vi.mock('uuid', () => ({ v4: () => '11111111-2222-4333-8444-555555555555' }));

const UUID = '11111111-2222-4333-8444-555555555555';

const data = tableDataFromRecords([
  { id: 1, name: 'a,b' },
  { id: 2, name: null },
]);

function setup(dialect: Dialect, config: BulkLoadConfig, transport = new RecordingBulkTransport()) {
  const connection = new RecordingConnection({ dialect });
  const logger = new InMemoryLogger();
  const context: BulkLoadContext = { connection, config, transport, logger };
  const plan = buildInsertPlan(
    dialect,
    { name: 'people', isTemporary: false },
    describeColumns(data),
    InsertStrategy.BulkLoad
  );
  return { connection, transport, logger, context, plan };
}

class StuckFileTransport extends RecordingBulkTransport {
  override async removeStagingFile(_path: string): Promise<void> {
    throw new Error('file is busy');
  }
}

describe('tableDataToDelimited', () => {
  it('should write a header and quote fields that need it', () => {
    const table = tableDataFromRecords([
      { id: 1, note: 'a,b' },
      { id: 2, note: 'say "hi"' },
      { id: 3, note: '' },
      { id: 4, note: null },
    ]);

    expect(tableDataToDelimited(table)).toBe('id,note\n1,"a,b"\n2,"say ""hi"""\n3,""\n4,\n');
  });

  it('should write fields verbatim without a quote character', () => {
    expect(
      tableDataToDelimited(data, { delimiter: '|', includeHeader: false, nullValue: '\\N', quoteChar: null })
    ).toBe('1|a,b\n2|\\N\n');
  });

  it('should return an empty string when there are no lines', () => {
    const empty: TableData = { columns: [{ name: 'x', type: 'text', values: [] }] };
    expect(tableDataToDelimited(empty, { includeHeader: false })).toBe('');
  });
});

describe('RedshiftBulkLoadAdapter', () => {
  const config: BulkLoadConfig = {
    redshift: {
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
      region: 'us-east-1',
      bucketName: 'staging',
      objectKey: '/loads/',
      sseType: 'AES256',
    },
  };

  it('should upload a gzipped CSV, COPY it and delete it', async () => {
    const { connection, transport, context, plan } = setup(new RedshiftDialect(), config);
    const adapter = new RedshiftBulkLoadAdapter(context);

    await adapter.verify();
    const result = await adapter.load(plan, data);

    const key = `loads/${UUID}.csv.gz`;
    expect(result).toEqual({ rowsLoaded: 2 });
    expect(transport.uploads).toHaveLength(1);
    expect(transport.uploads[0]?.key).toBe(key);
    expect(transport.uploads[0]?.serverSideEncryption).toBe('AES256');
    expect(RecordingBulkTransport.text(transport.uploads[0]?.body ?? '')).toBe('id,name\n1,"a,b"\n2,\n');
    expect(connection.statements()).toEqual([
      `COPY people (id,name) FROM 's3://staging/${key}' ` +
        "CREDENTIALS 'aws_access_key_id=test-key;aws_secret_access_key=test-secret' REGION 'us-east-1' " +
        "DELIMITER ',' CSV GZIP IGNOREHEADER 1 EMPTYASNULL;",
    ]);
    expect(transport.deletedObjects).toEqual([key]);
    expect(transport.objects.size).toBe(0);
  });

  it('should delete the staged object when COPY fails', async () => {
    const transport = new RecordingBulkTransport();
    const connection = new RecordingConnection({ dialect: new RedshiftDialect(), failOnStatement: /^COPY/ });
    const { plan } = setup(new RedshiftDialect(), config);
    const adapter = new RedshiftBulkLoadAdapter({ connection, config, transport, logger: new NoopLogger() });

    await expect(adapter.load(plan, data)).rejects.toThrow('Simulated failure executing: COPY people');
    expect(transport.deletedObjects).toEqual([`loads/${UUID}.csv.gz`]);
  });

  it('should fail verification when the bucket is unreachable', async () => {
    const { context } = setup(new RedshiftDialect(), config, new RecordingBulkTransport({ bucketExists: false }));

    await expect(new RedshiftBulkLoadAdapter(context).verify()).rejects.toThrow(
      'Bulk load credentials could not be confirmed: bucket staging is not reachable'
    );
  });

  it('should list every missing credential', () => {
    const { context } = setup(new RedshiftDialect(), { redshift: { region: 'us-east-1' } });

    let caught: unknown;
    try {
      new RedshiftBulkLoadAdapter(context);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(BulkLoadCredentialsError);
    if (caught instanceof BulkLoadCredentialsError) {
      expect(caught.missingFields).toEqual(['redshift.accessKeyId', 'redshift.secretAccessKey', 'redshift.bucketName']);
      expect(caught.message).toBe(
        'Bulk load credentials could not be confirmed. Missing or invalid: ' +
          'redshift.accessKeyId, redshift.secretAccessKey, redshift.bucketName'
      );
    }
  });

  it('should join object key prefixes', () => {
    expect(redshiftObjectKey('', 'a.csv.gz')).toBe('a.csv.gz');
    expect(redshiftObjectKey('/x/y/', 'a.csv.gz')).toBe('x/y/a.csv.gz');
  });
});

describe('PdwBulkLoadAdapter', () => {
  const config: BulkLoadConfig = {
    pdw: { dwloaderPath: 'C:/pdw/dwloader.exe', server: 'pdw-host', user: 'loader', password: 'test-secret' },
  };

  it('should run dwloader on a gzipped staging file', async () => {
    const { transport, context, plan } = setup(new PdwDialect(), config);
    const adapter = new PdwBulkLoadAdapter(context);

    await adapter.verify();
    await adapter.load(plan, data);

    const input = `/staging/${UUID}.gz`;
    expect(transport.executableChecks).toEqual(['C:/pdw/dwloader.exe']);
    expect(RecordingBulkTransport.text(transport.writtenFiles[0]?.contents ?? '')).toBe('1~*~a,b\r\n2~*~\r\n');
    expect(transport.processes).toEqual([
      {
        command: 'C:/pdw/dwloader.exe',
        args: [
          '-M', 'append', '-e', 'UTF8', '-i', input, '-T', 'people', '-R', `${input}.rejects`,
          '-fh', '0', '-t', '~*~', '-r', '\\r\\n', '-D', 'ymd', '-E', '-se', '-rv', '1',
          '-S', 'pdw-host', '-U', 'loader', '-P', 'test-secret',
        ],
      },
    ]);
    expect(transport.removedFiles).toEqual([input, `${input}.rejects`]);
  });

  it('should raise the loader output on a non-zero exit and still clean up', async () => {
    const transport = new RecordingBulkTransport({ processResult: { exitCode: 2, stderr: 'bad rows\n' } });
    const { context, plan } = setup(new PdwDialect(), config, transport);

    let caught: unknown;
    try {
      await new PdwBulkLoadAdapter(context).load(plan, data);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(BulkLoadError);
    if (caught instanceof BulkLoadError) {
      expect(caught.message).toBe('dwloader exited with code 2: bad rows');
      expect(caught.exitCode).toBe(2);
    }
    expect(transport.files.size).toBe(0);
  });

  it('should fail verification when dwloader is missing', async () => {
    const { context } = setup(new PdwDialect(), config, new RecordingBulkTransport({ executables: [] }));

    await expect(new PdwBulkLoadAdapter(context).verify()).rejects.toMatchObject({
      missingFields: ['pdw.dwloaderPath'],
    });
  });

  it('should use Windows authentication without a login', () => {
    const parsed = parsePdwBulkConfig({ pdw: { dwloaderPath: 'dwloader', server: 'pdw-host', windowsAuth: true } });
    expect(buildDwloaderArgs('people', 'in.gz', 'in.gz.rejects', parsed).slice(-3)).toEqual(['-S', 'pdw-host', '-W']);
  });

  it('should require a login without Windows authentication', () => {
    expect(() => parsePdwBulkConfig({ pdw: { dwloaderPath: 'dwloader', server: 'pdw-host' } })).toThrow(
      'Bulk load credentials could not be confirmed. Missing or invalid: pdw.user, pdw.password'
    );
  });
});

describe('PostgresqlBulkLoadAdapter', () => {
  const binPath = '/usr/lib/postgresql/bin';
  const config: BulkLoadConfig = {
    postgresql: { binPath, host: 'localhost', database: 'analytics', user: 'loader', password: 'test-secret' },
  };

  it('should load a staged CSV with psql', async () => {
    const { transport, context, plan } = setup(new PostgresqlDialect(), config);
    const adapter = new PostgresqlBulkLoadAdapter(context);

    await adapter.verify();
    await adapter.load(plan, data);

    const file = `/staging/${UUID}.csv`;
    expect(transport.writtenFiles[0]?.contents).toBe('id,name\n1,"a,b"\n2,\n');
    expect(transport.processes).toEqual([
      {
        command: psqlExecutable(binPath),
        args: [
          '-h', 'localhost',
          '-p', '5432',
          '-d', 'analytics',
          '-U', 'loader',
          '-c', `\\copy people (id,name) FROM '${file}' NULL AS '' DELIMITER ',' CSV HEADER;`,
        ],
        env: { PGPASSWORD: 'test-secret' },
      },
    ]);
    expect(transport.removedFiles).toEqual([file]);
  });

  it('should log staging files it cannot remove', async () => {
    const { logger, context, plan } = setup(new PostgresqlDialect(), config, new StuckFileTransport());

    await new PostgresqlBulkLoadAdapter(context).load(plan, data);

    const warnings = logger.getEntriesByLevel(LogLevel.WARN);
    expect(warnings.map((w) => w.message)).toEqual(['Failed to remove bulk load staging artifact']);
    expect(warnings[0]?.context).toEqual({ error: 'file is busy' });
  });

  it('should use forward slashes in copy paths', () => {
    const { plan } = setup(new PostgresqlDialect(), config);
    expect(buildCopyCommand(plan, 'C:\\tmp\\load.csv')).toBe(
      "\\copy people (id,name) FROM 'C:/tmp/load.csv' NULL AS '' DELIMITER ',' CSV HEADER;"
    );
  });

  it('should pick the executable name per platform', () => {
    expect(psqlExecutable('/opt/pg/bin', 'linux')).toBe('/opt/pg/bin/psql');
  });
});

describe('HiveBulkLoadAdapter', () => {
  const config: BulkLoadConfig = {
    hive: { hadoopPath: '/opt/hadoop/bin', stagingDir: '/warehouse/staging/', hadoopUser: 'etl' },
  };

  it('should put the file into HDFS and create the table over it', async () => {
    const { connection, transport, context, plan } = setup(new HiveDialect(), config);
    const adapter = new HiveBulkLoadAdapter(context);

    await adapter.verify();
    await adapter.load(plan, data);

    const location = `/warehouse/staging/${UUID}`;
    const file = `/staging/${UUID}.txt`;
    const env = { HADOOP_USER_NAME: 'etl' };
    expect(transport.writtenFiles[0]?.contents).toBe('1\u0001a,b\n2\u0001\\N\n');
    expect(transport.processes).toEqual([
      { command: '/opt/hadoop/bin/hdfs', args: ['dfs', '-mkdir', '-p', location], env },
      { command: '/opt/hadoop/bin/hdfs', args: ['dfs', '-put', file, `${location}/`], env },
    ]);
    expect(transport.removedFiles).toEqual([file]);
    expect(connection.statements()).toEqual([
      "CREATE TABLE people (id INTEGER, name VARCHAR(255)) ROW FORMAT DELIMITED FIELDS TERMINATED BY '\\001' " +
        `STORED AS TEXTFILE LOCATION '${location}'`,
    ]);
  });

  it('should not create the table when the copy fails', async () => {
    const transport = new RecordingBulkTransport({ processResult: { exitCode: 1, stderr: 'permission denied' } });
    const { connection, logger, context, plan } = setup(new HiveDialect(), config, transport);

    await expect(new HiveBulkLoadAdapter(context).load(plan, data)).rejects.toThrow(
      'hdfs exited with code 1: permission denied'
    );
    const location = `/warehouse/staging/${UUID}`;
    expect(transport.processes.map((p) => p.args)).toEqual([
      ['dfs', '-mkdir', '-p', location],
      ['dfs', '-rm', '-r', '-f', location],
    ]);
    expect(transport.files.size).toBe(0);
    expect(connection.statements()).toEqual([]);
    expect(logger.getEntriesByLevel(LogLevel.WARN).map((e) => e.context)).toEqual([
      { error: 'hdfs exited with code 1: permission denied' },
    ]);
  });

  it('should remove the HDFS directory when the table cannot be created', async () => {
    const transport = new RecordingBulkTransport();
    const connection = new RecordingConnection({ dialect: new HiveDialect(), failOnStatement: /^CREATE/ });
    const { plan } = setup(new HiveDialect(), config);
    const adapter = new HiveBulkLoadAdapter({ connection, config, transport, logger: new NoopLogger() });

    await expect(adapter.load(plan, data)).rejects.toThrow('Simulated failure executing: CREATE TABLE people');

    const location = `/warehouse/staging/${UUID}`;
    expect(transport.processes.map((p) => p.args)).toEqual([
      ['dfs', '-mkdir', '-p', location],
      ['dfs', '-put', `/staging/${UUID}.txt`, `${location}/`],
      ['dfs', '-rm', '-r', '-f', location],
    ]);
    expect(transport.removedFiles).toEqual([`/staging/${UUID}.txt`]);
  });
});

describe('createBulkLoadAdapter', () => {
  it('should create the loader for the backend', () => {
    const { context } = setup(new HiveDialect(), { hive: { hadoopPath: '/opt/hadoop/bin' } });
    expect(createBulkLoadAdapter('hive', context)).toBeInstanceOf(HiveBulkLoadAdapter);
  });

  it('should reject backends without a loader', () => {
    const { context } = setup(new PostgresqlDialect(), {});
    expect(() => createBulkLoadAdapter('sql server', context)).toThrow(ConfigurationError);
    expect(() => createBulkLoadAdapter('sql server', context)).toThrow('No bulk loader for dialect: sql server');
  });
});
