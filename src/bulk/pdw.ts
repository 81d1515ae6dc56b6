/**
 * PDW Bulk Loader
 *
 * Stages a gzipped `~*~`-delimited file and loads it with dwloader.
 * @module sql-table-insert/bulk/pdw
 */

import { gzipSync } from 'zlib';
import type { InsertPlan, TableData } from '../types/index.js';
import type { DialectName } from '../dialect/index.js';
import { parsePdwBulkConfig, type PdwBulkConfig } from '../config/index.js';
import { BulkLoadCredentialsError } from '../errors/index.js';
import { validateTableData } from '../frame/index.js';
import {
  assertProcessSucceeded,
  cleanUp,
  stagingName,
  type BulkLoadAdapter,
  type BulkLoadContext,
  type BulkLoadResult,
} from './adapter.js';
import { tableDataToDelimited } from './csv.js';

/** Field terminator understood by dwloader */
export const PDW_FIELD_DELIMITER = '~*~';

/**
 * Arguments of one dwloader run.
 */
export function buildDwloaderArgs(
  table: string,
  inputFile: string,
  rejectFile: string,
  config: PdwBulkConfig
): string[] {
  const auth = config.windowsAuth ? ['-W'] : ['-U', config.user ?? '', '-P', config.password ?? ''];
  return [
    '-M', 'append',
    '-e', 'UTF8',
    '-i', inputFile,
    '-T', table,
    '-R', rejectFile,
    '-fh', '0',
    '-t', PDW_FIELD_DELIMITER,
    // escape text, expanded by dwloader
    '-r', '\\r\\n',
    '-D', 'ymd',
    '-E',
    '-se',
    '-rv', '1',
    '-S', config.server,
    ...auth,
  ];
}

/**
 * Bulk loader for Parallel Data Warehouse.
 */
export class PdwBulkLoadAdapter implements BulkLoadAdapter {
  readonly dialect: DialectName = 'pdw';
  private readonly context: BulkLoadContext;
  private readonly config: PdwBulkConfig;

  /**
   * @throws {BulkLoadCredentialsError} If the PDW section is incomplete
   */
  constructor(context: BulkLoadContext) {
    this.context = context;
    this.config = parsePdwBulkConfig(context.config);
  }

  async verify(): Promise<void> {
    if (!(await this.context.transport.executableExists(this.config.dwloaderPath))) {
      throw new BulkLoadCredentialsError(
        `Bulk load credentials could not be confirmed: dwloader not found at ${this.config.dwloaderPath}`,
        ['pdw.dwloaderPath']
      );
    }
  }

  async load(plan: InsertPlan, data: TableData): Promise<BulkLoadResult> {
    const rows = validateTableData(data);
    const { transport, logger } = this.context;
    const contents = tableDataToDelimited(data, {
      delimiter: PDW_FIELD_DELIMITER,
      includeHeader: false,
      quoteChar: null,
      lineEnding: '\r\n',
    });

    const inputFile = await transport.writeStagingFile(stagingName('.gz'), gzipSync(Buffer.from(contents, 'utf8')));
    const rejectFile = `${inputFile}.rejects`;
    try {
      logger.debug('Running dwloader', { table: plan.qualifiedName, inputFile });
      const result = await transport.runProcess({
        command: this.config.dwloaderPath,
        args: buildDwloaderArgs(plan.qualifiedName, inputFile, rejectFile, this.config),
      });
      assertProcessSucceeded('dwloader', result);
    } finally {
      await cleanUp(logger, [
        () => transport.removeStagingFile(inputFile),
        () => transport.removeStagingFile(rejectFile),
      ]);
    }

    return { rowsLoaded: rows };
  }
}
