import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { ResponseInterceptor } from './common/response.interceptor';
import { HttpExceptionFilter } from './common/http-exception.filter';
import { I18nService } from './i18n/i18n.service';
import { reportBootstrapFailure } from './common/bootstrap-failure';

const DEFAULT_PORT = 3000;

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  app.useGlobalInterceptors(new ResponseInterceptor());

  // Exception filter translates error keys through the i18n service
  app.useGlobalFilters(new HttpExceptionFilter(app.get(I18nService)));

  const port = Number(app.get(ConfigService).get<string>('PORT') ?? DEFAULT_PORT);
  await app.listen(port);
}

bootstrap().catch(reportBootstrapFailure);
