import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './infrastructure/configuration/app.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  // DTO 검증: 선언되지 않은 필드는 제거하고 문자열 값은 DTO 타입으로 변환
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );
  app.enableShutdownHooks();

  const { port } = app.get(ConfigService).getOrThrow<AppConfig>('app');
  await app.listen(port);
}

const logger = new Logger('Bootstrap');

bootstrap().catch((error) => {
  logger.error('Failed to bootstrap application', error);
  process.exit(1);
});
