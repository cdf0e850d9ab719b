import { Injectable, Logger } from '@nestjs/common';
import { InjectRedis } from '@nestjs-modules/ioredis';
import Redis from 'ioredis';

@Injectable()
export class CacheService {
  private static readonly KEY_PREFIX = 'cache:';

  private readonly logger = new Logger(CacheService.name);

  constructor(
    @InjectRedis() private readonly redis: Redis,
  ) {}

  /** 캐시 미스 시 null을 반환합니다. */
  async get<T>(key: string): Promise<T | null> {
    const data = await this.redis.get(CacheService.KEY_PREFIX + key);
    if (!data) return null;
    return JSON.parse(data) as T;
  }

  /**
   * @param ttlMs 캐시 만료 시간 (밀리초)
   */
  async set(key: string, value: unknown, ttlMs: number): Promise<void> {
    await this.redis.set(
      CacheService.KEY_PREFIX + key,
      JSON.stringify(value),
      'PX',
      ttlMs,
    );
  }

  async del(key: string): Promise<void> {
    await this.redis.del(CacheService.KEY_PREFIX + key);
  }

  /** 쓰기 직후 호출. 이미 커밋된 쓰기를 실패로 만들지 않도록 Redis 오류는 경고로 남긴다. */
  async invalidate(key: string): Promise<void> {
    try {
      await this.del(key);
    } catch (error) {
      this.logger.warn(`캐시 무효화 실패 (${key}): ${String(error)}`);
    }
  }

  /**
   * Cache-Aside: 캐시 조회 → 미스 시 loader 실행 → 결과 저장.
   * Redis 장애 시에는 loader 결과를 그대로 돌려준다 (원본은 항상 DB).
   */
  async getOrLoad<T>(
    key: string,
    loader: () => Promise<T>,
    ttlMs: number,
  ): Promise<T> {
    try {
      const cached = await this.get<T>(key);
      if (cached !== null) {
        return cached;
      }
    } catch (error) {
      this.logger.warn(`캐시 조회 실패, DB에서 조회합니다 (${key}): ${String(error)}`);
      return loader();
    }

    const data = await loader();
    try {
      await this.set(key, data, ttlMs);
    } catch (error) {
      this.logger.warn(`캐시 저장 실패 (${key}): ${String(error)}`);
    }
    return data;
  }
}
