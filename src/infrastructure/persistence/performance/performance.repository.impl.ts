import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import {
  PerformanceColumns,
  PerformanceRepository,
  SeatPosition,
  SoldSeatGuard,
} from '../../../performance/performance.repository';
import { TheatreHall } from '../../../performance/domain/theatre-hall.entity';
import { Performance } from '../../../performance/domain/performance.entity';
import { Ticket } from '../../../reservation/domain/ticket.entity';
import { translateStorageError } from '../storage-error.classifier';
import { sharedRowLock } from '../row-lock';

interface SoldCountRow {
  performanceId: string;
  sold: number | string;
}

@Injectable()
export class PerformanceRepositoryImpl implements PerformanceRepository {
  constructor(
    @InjectRepository(TheatreHall)
    private readonly hallRepo: Repository<TheatreHall>,
    @InjectRepository(Performance)
    private readonly performanceRepo: Repository<Performance>,
    @InjectRepository(Ticket)
    private readonly ticketRepo: Repository<Ticket>,
    private readonly dataSource: DataSource,
  ) {}

  async saveTheatreHall(hall: TheatreHall): Promise<TheatreHall> {
    return this.hallRepo.save(hall);
  }

  async findAllTheatreHalls(): Promise<TheatreHall[]> {
    return this.hallRepo.find({ order: { name: 'ASC' } });
  }

  async findTheatreHallById(theatreHallId: string): Promise<TheatreHall | null> {
    return this.hallRepo.findOne({ where: { theatreHallId } });
  }

  async savePerformance(performance: Performance): Promise<Performance> {
    return this.performanceRepo.save(performance);
  }

  async updatePerformance(
    performanceId: string,
    columns: PerformanceColumns,
    guard?: SoldSeatGuard,
  ): Promise<void> {
    try {
      await this.dataSource.transaction(async (manager) => {
        // 공연 행을 먼저 갱신해 락(SQLite는 DB 쓰기 락)을 쥔다. 이후 새 티켓은 공연 FK 검사에서 이 락을 기다린다.
        await manager.update(Performance, { performanceId }, columns);
        if (guard) {
          const tickets = await manager.find(Ticket, {
            select: { row: true, seat: true },
            where: { performanceId },
            order: { row: 'ASC', seat: 'ASC' },
            ...sharedRowLock(manager),
          });
          guard(tickets.map(({ row, seat }) => ({ row, seat })));
        }
      });
    } catch (error) {
      throw translateStorageError(error);
    }
  }

  async findAllPerformances(): Promise<Performance[]> {
    return this.performanceRepo.find({
      relations: { play: true, theatreHall: true },
      order: { showTime: 'DESC' },
    });
  }

  async findPerformanceById(performanceId: string): Promise<Performance | null> {
    return this.performanceRepo.findOne({
      where: { performanceId },
      relations: { play: { genres: true }, theatreHall: true },
    });
  }

  async findPerformancesWithHall(performanceIds: string[]): Promise<Performance[]> {
    if (performanceIds.length === 0) return [];
    return this.performanceRepo.find({
      where: { performanceId: In(performanceIds) },
      relations: { theatreHall: true },
    });
  }

  async deletePerformance(performanceId: string): Promise<void> {
    await this.performanceRepo.delete({ performanceId });
  }

  async countSoldTickets(performanceId: string): Promise<number> {
    return this.ticketRepo.count({ where: { performanceId } });
  }

  async countSoldTicketsByPerformance(performanceIds: string[]): Promise<Map<string, number>> {
    const counts = new Map<string, number>();
    if (performanceIds.length === 0) return counts;

    // 목록 조회 시 N+1을 피하기 위해 한 번의 GROUP BY로 집계
    const rows = await this.ticketRepo
      .createQueryBuilder('ticket')
      .select('ticket.performanceId', 'performanceId')
      .addSelect('COUNT(*)', 'sold')
      .where('ticket.performanceId IN (:...performanceIds)', { performanceIds })
      .groupBy('ticket.performanceId')
      .getRawMany<SoldCountRow>();

    for (const row of rows) {
      counts.set(row.performanceId, Number(row.sold));
    }
    return counts;
  }

  async findTakenSeats(performanceId: string): Promise<SeatPosition[]> {
    const tickets = await this.ticketRepo.find({
      select: { row: true, seat: true },
      where: { performanceId },
      order: { row: 'ASC', seat: 'ASC' },
    });
    return tickets.map(({ row, seat }) => ({ row, seat }));
  }
}
