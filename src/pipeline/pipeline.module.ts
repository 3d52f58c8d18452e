import { Module } from '@nestjs/common';
import { LandingModule } from '../landing/landing.module';
import { StandardizationModule } from '../standardization/standardization.module';
import { PipelineController } from './pipeline.controller';
import { PipelineService } from './pipeline.service';

/**
 * PipelineModule
 *
 * Wires the landing loader and the standardization adapters into a
 * full-refresh pipeline and exposes its tables over HTTP.
 */
@Module({
  imports: [LandingModule, StandardizationModule],
  controllers: [PipelineController],
  providers: [PipelineService],
})
export class PipelineModule {}
