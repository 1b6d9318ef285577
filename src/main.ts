import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConfigService } from './config/config.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  await app.listen(configService.port);
  Logger.log(`Raffle API listening on port ${configService.port}`, 'Bootstrap');
}

bootstrap().catch((error) => {
  Logger.error('Failed to start Raffle API', error, 'Bootstrap');
  process.exit(1);
});
