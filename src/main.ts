import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { validateEnvironmentVariables } from './common/config/env.validation';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { LoggingService } from './modules/logging';
import { buildSwaggerConfig, swaggerCustomOptions } from './modules/swagger/swagger.config';

async function bootstrap() {
  validateEnvironmentVariables();

  // Create Winston-based logger before NestFactory to capture bootstrap logs
  const loggingService = new LoggingService();

  const app = await NestFactory.create(AppModule, {
    logger: loggingService,
  });

  // Closes the Postgres pool on SIGTERM
  app.enableShutdownHooks();

  app.useGlobalFilters(new HttpExceptionFilter());

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.enableCors({
    origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
    credentials: true,
  });

  const document = SwaggerModule.createDocument(app, buildSwaggerConfig());
  SwaggerModule.setup('api/docs', app, document, swaggerCustomOptions);

  const port = process.env.PORT || 3001;
  await app.listen(port);
  loggingService.log(`Identity API is running on: http://localhost:${port}`, 'Bootstrap');
  loggingService.log(`Swagger UI available at: http://localhost:${port}/api/docs`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start Identity API', error);
  process.exit(1);
});
