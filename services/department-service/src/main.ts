import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configuration } from './config/configuration';

async function bootstrap() {
  const config = configuration();
  const app = await NestFactory.create(AppModule.forRoot(config));

  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
  }));

  app.enableCors({
    origin: config.corsOrigin,
    credentials: true,
  });
  app.enableShutdownHooks();

  await app.listen(config.port);
  Logger.log(`Department service running on port ${config.port} (storage: ${config.storage})`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Department service failed to start', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
