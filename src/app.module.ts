import { Module } from "@nestjs/common";
import { EventEmitterModule } from "@nestjs/event-emitter";
import { ConfigurationModule } from "./infrastructure/configuration/configuration.module";
import { DatabaseModule } from "./database/database.module";
import { CacheModule } from "./infrastructure/cache/cache.module";
import { CatalogModule } from "./catalog/catalog.module";
import { PerformanceModule } from "./performance/performance.module";
import { ReservationModule } from "./reservation/reservation.module";

@Module({
  imports: [
    ConfigurationModule,
    EventEmitterModule.forRoot(),
    DatabaseModule,
    CacheModule,
    CatalogModule,
    PerformanceModule,
    ReservationModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
