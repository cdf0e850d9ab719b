import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Genre } from './domain/genre.entity';
import { Artist } from './domain/artist.entity';
import { Play } from './domain/play.entity';
import { CatalogService } from './catalog.service';
import { CatalogRepositoryImpl } from '../infrastructure/persistence/catalog/catalog.repository.impl';
import { CatalogController } from '../interfaces/controllers/catalog.controller';
import { DI_TOKENS } from '../common/di-tokens';

@Module({
  imports: [TypeOrmModule.forFeature([Genre, Artist, Play])],
  controllers: [CatalogController],
  providers: [
    CatalogService,
    {
      provide: DI_TOKENS.CATALOG_REPOSITORY,
      useClass: CatalogRepositoryImpl,
    },
  ],
  exports: [CatalogService, DI_TOKENS.CATALOG_REPOSITORY],
})
export class CatalogModule {}
