import {
  BadRequestException,
  Controller,
  Get,
  Logger,
  Query,
  UnprocessableEntityException,
} from '@nestjs/common';
import { Row, Table } from '../common/table';
import {
  IntervalRecord,
  MeterRecord,
  ServicePointRecord,
} from '../standardization/dto/canonical.dto';
import { SourceDataError } from '../standardization/interfaces/source-adapter.interface';
import { AccessLevel, getPiiColumns } from '../usage/access-filter';
import {
  parseUsageWindow,
  USAGE_WINDOWS,
  UsageSummaryRecord,
  UsageWindow,
} from '../usage/window-aggregator';
import { DataQualityReport } from './data-quality';
import { PipelineService } from './pipeline.service';

/**
 * Query parameters for usage endpoints
 */
interface UsageQuery {
  access?: string | string[];
  window?: string | string[];
}

export interface UsageResponse extends Table<Row> {
  accessLevel: AccessLevel;
}

export interface SummaryResponse extends Table<UsageSummaryRecord> {
  accessLevel: AccessLevel;
  window: UsageWindow;
}

/**
 * PipelineController
 *
 * Read API for reporting/QA consumers. Every request triggers a
 * full-refresh run over the raw files.
 *
 * Endpoints:
 * - GET /pipeline/sources - Registered source systems
 * - GET /pipeline/service-points - Standardized service points
 * - GET /pipeline/meters - Standardized meters
 * - GET /pipeline/intervals - Standardized interval readings
 * - GET /pipeline/usage?access= - Joined, masked usage records
 * - GET /pipeline/summary?window=&access= - Windowed usage summary
 * - GET /pipeline/data-quality - Data-quality snapshot
 * - GET /pipeline/pii-columns - Columns masked for external access
 */
@Controller('pipeline')
export class PipelineController {
  private readonly logger = new Logger(PipelineController.name);

  constructor(private readonly pipelineService: PipelineService) {}

  @Get('sources')
  getSources() {
    return { sources: this.pipelineService.getSupportedSources() };
  }

  @Get('service-points')
  async getServicePoints(): Promise<Table<ServicePointRecord>> {
    const { servicePoints } = await this.runStandardized();
    return servicePoints;
  }

  @Get('meters')
  async getMeters(): Promise<Table<MeterRecord>> {
    const { meters } = await this.runStandardized();
    return meters;
  }

  @Get('intervals')
  async getIntervals(): Promise<Table<IntervalRecord>> {
    const { intervals } = await this.runStandardized();
    return intervals;
  }

  /**
   * @example
   * GET /pipeline/usage?access=internal
   */
  @Get('usage')
  async getUsage(@Query() query: UsageQuery): Promise<UsageResponse> {
    this.logger.log(`GET /pipeline/usage with query: ${JSON.stringify(query)}`);
    const { usage, accessLevel } = await this.runPipeline(query);
    return { accessLevel, columns: usage.columns, rows: usage.rows };
  }

  /**
   * @example
   * GET /pipeline/summary?window=hourly&access=external
   */
  @Get('summary')
  async getSummary(@Query() query: UsageQuery): Promise<SummaryResponse> {
    this.logger.log(`GET /pipeline/summary with query: ${JSON.stringify(query)}`);
    const { summary, accessLevel, window } = await this.runPipeline(query);
    return { accessLevel, window, columns: summary.columns, rows: summary.rows };
  }

  @Get('data-quality')
  async getDataQuality(): Promise<DataQualityReport> {
    return this.translateErrors(() => this.pipelineService.getDataQualityReport());
  }

  @Get('pii-columns')
  getPiiColumns(): { columns: string[] } {
    return { columns: getPiiColumns() };
  }

  private runStandardized() {
    return this.translateErrors(() => this.pipelineService.buildStandardized());
  }

  private runPipeline(query: UsageQuery) {
    let window: UsageWindow | undefined;
    if (query.window !== undefined) {
      const parsed = parseUsageWindow(query.window);
      if (!parsed) {
        throw new BadRequestException(
          `Invalid window: ${String(query.window)}. Supported: ${USAGE_WINDOWS.join(', ')}`,
        );
      }
      window = parsed;
    }

    return this.translateErrors(() =>
      this.pipelineService.run({ accessLevel: query.access, window }),
    );
  }

  /**
   * SourceDataError -> 422 Unprocessable Entity
   */
  private async translateErrors<T>(action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof SourceDataError) {
        throw new UnprocessableEntityException(error.message);
      }
      throw error;
    }
  }
}
