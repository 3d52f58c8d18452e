import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PipelineEnv } from './config/pipeline.config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const configService = app.get<ConfigService<PipelineEnv, true>>(ConfigService);

  const port = configService.get('PORT', { infer: true });
  await app.listen(port);

  Logger.log(
    `Meter harmonizer listening on port ${port} (raw data: ${configService.get('RAW_DATA_DIR', { infer: true })})`,
    'Bootstrap',
  );
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
    'Bootstrap',
  );
  process.exit(1);
});
