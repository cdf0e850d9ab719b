import {
  PerformanceColumns,
  PerformanceRepository,
  SeatPosition,
  SoldSeatGuard,
} from '../../../src/performance/performance.repository';
import { TheatreHall } from '../../../src/performance/domain/theatre-hall.entity';
import { Performance } from '../../../src/performance/domain/performance.entity';
import { InMemoryTheatreStore } from './in-memory-theatre.store';

export class InMemoryPerformanceRepository implements PerformanceRepository {
  constructor(private readonly store: InMemoryTheatreStore) {}

  async saveTheatreHall(hall: TheatreHall): Promise<TheatreHall> {
    if (!hall.theatreHallId) {
      hall.theatreHallId = this.store.nextId('hall');
    }
    this.store.halls.set(hall.theatreHallId, hall);
    return hall;
  }

  async findAllTheatreHalls(): Promise<TheatreHall[]> {
    return [...this.store.halls.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  async findTheatreHallById(theatreHallId: string): Promise<TheatreHall | null> {
    return this.store.halls.get(theatreHallId) ?? null;
  }

  async savePerformance(performance: Performance): Promise<Performance> {
    if (!performance.performanceId) {
      performance.performanceId = this.store.nextId('performance');
    }
    this.store.performances.set(performance.performanceId, performance);
    return performance;
  }

  // 중간에 await가 없으므로 검사와 갱신 사이에 다른 요청이 끼어들지 않는다
  async updatePerformance(
    performanceId: string,
    columns: PerformanceColumns,
    guard?: SoldSeatGuard,
  ): Promise<void> {
    const performance = this.store.performances.get(performanceId);
    if (!performance) return;
    guard?.(this.takenSeats(performanceId));
    Object.assign(performance, columns);
    const hall = columns.theatreHallId ? this.store.halls.get(columns.theatreHallId) : undefined;
    if (hall) {
      performance.theatreHall = hall;
    }
  }

  async findAllPerformances(): Promise<Performance[]> {
    return [...this.store.performances.values()].sort(
      (a, b) => b.showTime.getTime() - a.showTime.getTime(),
    );
  }

  async findPerformanceById(performanceId: string): Promise<Performance | null> {
    return this.store.performances.get(performanceId) ?? null;
  }

  async findPerformancesWithHall(performanceIds: string[]): Promise<Performance[]> {
    return performanceIds.flatMap((id) => this.store.performances.get(id) ?? []);
  }

  async deletePerformance(performanceId: string): Promise<void> {
    this.store.performances.delete(performanceId);
    for (const [key, ticket] of this.store.tickets) {
      if (ticket.performanceId === performanceId) {
        this.store.tickets.delete(key);
      }
    }
  }

  async countSoldTickets(performanceId: string): Promise<number> {
    return this.store.ticketsOf(performanceId).length;
  }

  async countSoldTicketsByPerformance(performanceIds: string[]): Promise<Map<string, number>> {
    return new Map(performanceIds.map((id) => [id, this.store.ticketsOf(id).length]));
  }

  async findTakenSeats(performanceId: string): Promise<SeatPosition[]> {
    return this.takenSeats(performanceId);
  }

  private takenSeats(performanceId: string): SeatPosition[] {
    return this.store
      .ticketsOf(performanceId)
      .map(({ row, seat }) => ({ row, seat }))
      .sort((a, b) => a.row - b.row || a.seat - b.seat);
  }
}
