import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('PORT', 3000);
  await app.listen(port);

  new Logger('Bootstrap').log(`Audio track selector listening on port ${port}`);
}

bootstrap().catch(error => {
  new Logger('Bootstrap').error(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
