import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ValidationPipe } from '@nestjs/common';
import { Logger } from 'nestjs-pino';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './core/common/exceptions/global-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  const logger = app.get(Logger);
  app.useLogger(logger);

  const configService = app.get(ConfigService);
  const port = parseInt(configService.get('PORT', '3000'), 10);
  const nodeEnv = configService.get('NODE_ENV', 'development');

  app.use(helmet());

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
      disableErrorMessages: nodeEnv === 'production',
    }),
  );
  app.useGlobalFilters(new GlobalExceptionFilter(logger));

  // Closes the TypeORM connection pool on SIGTERM/SIGINT
  app.enableShutdownHooks();

  process.on('unhandledRejection', reason => {
    logger.error('Unhandled Rejection', reason, 'Bootstrap');
    process.exit(1);
  });

  await app.listen(port);
  logger.log(
    `Application is running on port ${port} in ${nodeEnv} mode`,
    'Bootstrap',
  );
}

bootstrap().catch(err => {
  // The pino logger may not exist yet if module initialisation failed
  console.error('Error during application bootstrap:', err);
  process.exit(1);
});
