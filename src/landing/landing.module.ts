import { Module } from '@nestjs/common';
import { RawDataLoader } from './raw-data.loader';

@Module({
  providers: [RawDataLoader],
  exports: [RawDataLoader],
})
export class LandingModule {}
