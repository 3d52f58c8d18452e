import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import { PipelineEnv } from '../config/pipeline.config';
import {
  RAW_ENTITIES,
  RAW_TABLE_NAMES,
  RawDataset,
  RawEntity,
  RawSourceTables,
  RawTable,
} from '../standardization/interfaces/raw-table.interface';
import { SourceDataError } from '../standardization/interfaces/source-adapter.interface';

/**
 * RawDataLoader - reads the landing area into raw tables
 *
 * Layout: <RAW_DATA_DIR>/<source>/<source>_<table>.csv, one file per
 * source system and table (service_points, meters, intervals). Every run
 * re-reads the files; nothing is cached.
 */
@Injectable()
export class RawDataLoader {
  private readonly logger = new Logger(RawDataLoader.name);

  constructor(private readonly configService: ConfigService<PipelineEnv, true>) {}

  /**
   * Load all three tables for each source
   *
   * @throws SourceDataError if any file is missing
   */
  async loadDataset(sources: readonly string[]): Promise<RawDataset> {
    const dataset: RawDataset = {};
    for (const source of sources) {
      dataset[source] = await this.loadSource(source);
    }
    return dataset;
  }

  async loadSource(source: string): Promise<RawSourceTables> {
    const tables: RawSourceTables = {};
    for (const entity of RAW_ENTITIES) {
      tables[entity] = await this.loadTable(source, entity);
    }
    return tables;
  }

  async loadTable(source: string, entity: RawEntity): Promise<RawTable> {
    const path = this.resolvePath(source, entity);

    let content: Buffer;
    try {
      content = await readFile(path);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new SourceDataError(
          source,
          `Raw table "${RAW_TABLE_NAMES[entity]}" not found at ${path}`,
          error,
        );
      }
      throw error;
    }

    const table = await parseCsv(content);
    this.logger.log(
      `Loaded ${table.rows.length} rows from ${source}/${RAW_TABLE_NAMES[entity]}`,
    );
    return table;
  }

  resolvePath(source: string, entity: RawEntity): string {
    const root = resolve(this.configService.get('RAW_DATA_DIR', { infer: true }));
    return join(root, source, `${source}_${RAW_TABLE_NAMES[entity]}.csv`);
  }
}

/**
 * Parse CSV content into a raw table. Header names are trimmed; a file
 * holding only a header yields its columns and no rows.
 */
export async function parseCsv(content: Buffer | string): Promise<RawTable> {
  let columns: string[] = [];
  const rows: RawTable['rows'] = [];

  const stream = Readable.from([content]).pipe(
    csvParser({
      mapHeaders: ({ header }) => header.trim(),
    }),
  );
  stream.on('headers', (headers: string[]) => {
    columns = headers;
  });

  for await (const row of stream) {
    if (isCsvRow(row)) {
      rows.push(row);
    }
  }

  return { columns, rows };
}

function isCsvRow(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((cell) => typeof cell === 'string')
  );
}

/**
 * fs errors may come from another realm (Jest), so no instanceof Error
 */
function isMissingFile(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
