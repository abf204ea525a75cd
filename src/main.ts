import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { MongoExceptionFilter } from './common/filters/mongo-exception.filter';
import { PORT } from './config/config.env';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService);

  app.setGlobalPrefix('api');
  app.enableCors();
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.useGlobalFilters(new MongoExceptionFilter());

  const docs = new DocumentBuilder()
    .setTitle('LMS Progress API')
    .setDescription('Matrículas y progreso de cursos por tenant')
    .setVersion('1.0')
    .addBearerAuth()
    .build();
  SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, docs));

  const port = config.get<number>(PORT) ?? 4000;
  await app.listen(port);
  logger.log(`Escuchando en el puerto ${port}`);
}

bootstrap().catch((err: unknown) => {
  logger.error('No se pudo iniciar la aplicación', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
