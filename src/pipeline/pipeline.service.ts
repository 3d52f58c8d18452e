import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Row, Table } from '../common/table';
import { PipelineEnv } from '../config/pipeline.config';
import { RawDataLoader } from '../landing/raw-data.loader';
import {
  StandardizationService,
  StandardizedTables,
} from '../standardization/standardization.service';
import { AccessLevel, resolveAccessLevel } from '../usage/access-filter';
import { buildUsageRecords } from '../usage/fact-joiner';
import {
  DEFAULT_USAGE_WINDOW,
  summarizeUsage,
  UsageSummaryRecord,
  UsageWindow,
} from '../usage/window-aggregator';
import { buildDataQualityReport, DataQualityReport } from './data-quality';

export interface PipelineRunOptions {
  /** Defaults to PII_ACCESS_LEVEL; a repeated query parameter arrives as an array */
  accessLevel?: string | string[];
  /** Defaults to USAGE_WINDOW */
  window?: UsageWindow;
}

/**
 * Every table of one full-refresh run
 */
export interface PipelineRun extends StandardizedTables {
  accessLevel: AccessLevel;
  window: UsageWindow;
  usage: Table<Row>;
  summary: Table<UsageSummaryRecord>;
}

/**
 * PipelineService - runs landing -> standardized -> usage -> summary
 *
 * Each call is a full rebuild from the raw files; no state is kept
 * between runs.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly rawDataLoader: RawDataLoader,
    private readonly standardizationService: StandardizationService,
    private readonly configService: ConfigService<PipelineEnv, true>,
  ) {}

  getSupportedSources() {
    return this.standardizationService.getSupportedSources();
  }

  /**
   * Load the raw files of every registered source and standardize them
   *
   * @throws SourceDataError on a missing file, table or required column
   */
  async buildStandardized(): Promise<StandardizedTables> {
    const sources = this.getSupportedSources().map((s) => s.name);
    const raw = await this.rawDataLoader.loadDataset(sources);
    return this.standardizationService.standardize(raw);
  }

  async run(options: PipelineRunOptions = {}): Promise<PipelineRun> {
    const accessLevel = resolveAccessLevel(
      options.accessLevel ??
        this.configService.get('PII_ACCESS_LEVEL', { infer: true }),
    );
    const window =
      options.window ??
      this.configService.get('USAGE_WINDOW', { infer: true }) ??
      DEFAULT_USAGE_WINDOW;
    const startTime = Date.now();

    try {
      const { servicePoints, meters, intervals } = await this.buildStandardized();
      const usage = buildUsageRecords(servicePoints, meters, intervals, accessLevel);
      const summary = summarizeUsage(usage, window);

      this.logger.log(
        `Pipeline run complete in ${Date.now() - startTime}ms: ` +
          `${intervals.rows.length} intervals, ${usage.rows.length} usage rows, ` +
          `${summary.rows.length} ${window} summary rows (${accessLevel} access)`,
      );

      return {
        servicePoints,
        meters,
        intervals,
        usage,
        summary,
        accessLevel,
        window,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Pipeline run aborted: ${message}`);
      throw error;
    }
  }

  async getDataQualityReport(): Promise<DataQualityReport> {
    const result = await this.run();
    return buildDataQualityReport(
      result.servicePoints,
      result.meters,
      result.intervals,
      result.summary,
    );
  }
}
