import { Module } from '@nestjs/common';
import { RedisModule as NestRedisModule } from '@nestjs-modules/ioredis';
import { ConfigService } from '@nestjs/config';
import { RedisConfig } from './redis.config';

@Module({
  imports: [
    NestRedisModule.forRootAsync({
      useFactory: (configService: ConfigService) => {
        const config = configService.getOrThrow<RedisConfig>('redis');
        return {
          type: 'single',
          url: `redis://${config.host}:${config.port}`,
        };
      },
      inject: [ConfigService],
    }),
  ],
  exports: [NestRedisModule],
})
export class RedisConfigModule {}
