import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TheatreHall } from './domain/theatre-hall.entity';
import { Performance } from './domain/performance.entity';
import { Ticket } from '../reservation/domain/ticket.entity';
import { PerformanceService } from './performance.service';
import { PerformanceRepositoryImpl } from '../infrastructure/persistence/performance/performance.repository.impl';
import { CatalogModule } from '../catalog/catalog.module';
import { PerformanceController } from '../interfaces/controllers/performance.controller';
import { TheatreHallController } from '../interfaces/controllers/theatre-hall.controller';
import { DI_TOKENS } from '../common/di-tokens';

@Module({
  imports: [TypeOrmModule.forFeature([TheatreHall, Performance, Ticket]), CatalogModule],
  controllers: [PerformanceController, TheatreHallController],
  providers: [
    PerformanceService,
    {
      provide: DI_TOKENS.PERFORMANCE_REPOSITORY,
      useClass: PerformanceRepositoryImpl,
    },
  ],
  exports: [PerformanceService, DI_TOKENS.PERFORMANCE_REPOSITORY],
})
export class PerformanceModule {}
