import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { API_VERSION } from './infrastructure/http/controllers/health.controller';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });

  // Validación global (class-validator)
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );

  app.enableCors({
    origin: '*',
    methods: 'GET,POST',
  });

  // Swagger
  const config = new DocumentBuilder()
    .setTitle('Company Profile Outreach API')
    .setDescription(
      'Microservicio que arma el perfil de una empresa a partir de su web y redacta emails en frío. Sin browser engines.\n\n' +
      '- `POST /scrape` — perfil (nombre, about, servicios, contacto, industria, valores)\n' +
      '- `POST /email/generate` — perfil + email redactado\n' +
      '- `POST /email/send` / `POST /email/generate-and-send` — entrega SMTP\n\n' +
      '**Autenticación:** Header `x-api-key` requerido en todos los endpoints excepto `/health`.',
    )
    .setVersion(API_VERSION)
    .addApiKey({ type: 'apiKey', name: 'x-api-key', in: 'header' }, 'x-api-key')
    .addTag('Scrape', 'Extracción de perfiles')
    .addTag('Email', 'Redacción y envío de emails')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  const port = app.get(ConfigService).get<number>('scraper.port', 3457);
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(`🚀 Company Profile Outreach API corriendo en http://localhost:${port}`);
  logger.log(`📚 Swagger docs en http://localhost:${port}/docs`);
}

bootstrap().catch((error: Error) => {
  new Logger('Bootstrap').error(`❌ No se pudo iniciar: ${error.message}`);
  process.exit(1);
});
