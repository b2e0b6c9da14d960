import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { API_KEY_HEADER } from './common/api-key.guard';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Training Center Bot API')
    .setDescription('Courses, registrations, payments and scheduled posts')
    .setVersion('1.0')
    .addApiKey({ type: 'apiKey', name: API_KEY_HEADER, in: 'header' }, API_KEY_HEADER)
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = app.get<ConfigService<AppConfig, true>>(ConfigService).get('http', { infer: true }).port;
  await app.listen(port);

  logger.log('='.repeat(50));
  logger.log('🚀 APPLICATION SUCCESSFULLY STARTED!');
  logger.log(`📚 Swagger: http://localhost:${port}/api`);
  logger.log('='.repeat(50));
}

bootstrap().catch(error => {
  new Logger('Bootstrap').error(`❌ Failed to start application: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
