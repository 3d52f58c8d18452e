import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/pipeline.config';
import { HealthController } from './health/health.controller';
import { PipelineModule } from './pipeline/pipeline.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    PipelineModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
