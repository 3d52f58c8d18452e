import { Module } from '@nestjs/common';
import { StandardizationService } from './standardization.service';
import { Utility1Adapter } from './adapters/utility1.adapter';
import { Utility2Adapter } from './adapters/utility2.adapter';

/**
 * StandardizationModule
 *
 * Maps per-utility raw exports into the canonical model.
 *
 * Components:
 * - StandardizationService: combines, links and reconciles adapter output
 * - Utility1Adapter: SERVICE_POINT_* layout, direct interval linkage
 * - Utility2Adapter: premise layout, interval linkage via meters
 */
@Module({
  providers: [StandardizationService, Utility1Adapter, Utility2Adapter],
  exports: [StandardizationService],
})
export class StandardizationModule {}
