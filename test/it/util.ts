import { Global, Injectable, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheService } from '../../src/infrastructure/cache/cache.service';

/** 테스트용 DB: 프로세스 안에서 뜨는 SQLite 메모리 DB. 스키마는 엔티티에서 생성한다. */
export const sqliteTypeOrmModule = () =>
  TypeOrmModule.forRoot({
    type: 'better-sqlite3',
    database: ':memory:',
    autoLoadEntities: true,
    synchronize: true,
    dropSchema: true,
    logging: false,
  });

/** Redis 대신 Map에 저장하는 캐시. TTL은 무시한다. */
@Injectable()
export class InMemoryCacheService
  implements Pick<CacheService, 'get' | 'set' | 'del' | 'invalidate' | 'getOrLoad'>
{
  private readonly store = new Map<string, string>();

  async get<T>(key: string): Promise<T | null> {
    const data = this.store.get(key);
    return data === undefined ? null : (JSON.parse(data) as T);
  }

  async set(key: string, value: unknown): Promise<void> {
    this.store.set(key, JSON.stringify(value));
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }

  async invalidate(key: string): Promise<void> {
    await this.del(key);
  }

  async getOrLoad<T>(key: string, loader: () => Promise<T>): Promise<T> {
    const cached = await this.get<T>(key);
    if (cached !== null) return cached;

    const data = await loader();
    await this.set(key, data);
    return data;
  }
}

@Global()
@Module({
  providers: [{ provide: CacheService, useClass: InMemoryCacheService }],
  exports: [CacheService],
})
export class TestCacheModule {}
