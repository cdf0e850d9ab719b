import { Injectable, Inject, NotFoundException, BadRequestException } from '@nestjs/common';
import {
  PerformanceColumns,
  PerformanceRepository,
  SeatPosition,
  SoldSeatGuard,
} from './performance.repository';
import { CatalogRepository } from '../catalog/catalog.repository';
import { Play } from '../catalog/domain/play.entity';
import { TheatreHall } from './domain/theatre-hall.entity';
import { Performance } from './domain/performance.entity';
import { availableSeats, hallCapacity } from './domain/availability';
import { validateSeat } from './domain/seat-validator';
import { HallChangeConflictException } from './domain/performance.exceptions';
import { StorageUnavailableException } from '../reservation/domain/reservation.exceptions';
import { StorageUnavailableError, TransactionConflictError } from '../common/errors/storage.errors';
import { DI_TOKENS } from '../common/di-tokens';

export interface CreateTheatreHallInput {
  name: string;
  rows: number;
  seatsInRow: number;
}

export interface CreatePerformanceInput {
  playId: string;
  theatreHallId: string;
  showTime: Date;
}

export type UpdatePerformanceInput = Partial<CreatePerformanceInput>;

export interface Availability {
  performanceId: string;
  capacity: number;
  ticketsAvailable: number;
}

export interface PerformanceListing {
  performance: Performance;
  capacity: number;
  ticketsAvailable: number;
}

export interface PerformanceDetail {
  performance: Performance;
  takenPlaces: SeatPosition[];
}

@Injectable()
export class PerformanceService {
  constructor(
    @Inject(DI_TOKENS.PERFORMANCE_REPOSITORY)
    private readonly performanceRepository: PerformanceRepository,
    @Inject(DI_TOKENS.CATALOG_REPOSITORY)
    private readonly catalogRepository: CatalogRepository,
  ) {}

  async createTheatreHall(input: CreateTheatreHallInput): Promise<TheatreHall> {
    if (!Number.isInteger(input.rows) || input.rows < 1) {
      throw new BadRequestException('행 수는 1 이상의 정수여야 합니다.');
    }
    if (!Number.isInteger(input.seatsInRow) || input.seatsInRow < 1) {
      throw new BadRequestException('행당 좌석 수는 1 이상의 정수여야 합니다.');
    }

    const hall = new TheatreHall();
    hall.name = input.name;
    hall.rows = input.rows;
    hall.seatsInRow = input.seatsInRow;
    return this.performanceRepository.saveTheatreHall(hall);
  }

  async listTheatreHalls(): Promise<TheatreHall[]> {
    return this.performanceRepository.findAllTheatreHalls();
  }

  async getTheatreHall(theatreHallId: string): Promise<TheatreHall> {
    const hall = await this.performanceRepository.findTheatreHallById(theatreHallId);
    if (!hall) {
      throw new NotFoundException('공연장을 찾을 수 없습니다.');
    }
    return hall;
  }

  async createPerformance(input: CreatePerformanceInput): Promise<Performance> {
    await this.findPlayOrThrow(input.playId);
    await this.getTheatreHall(input.theatreHallId);

    const performance = new Performance();
    performance.playId = input.playId;
    performance.theatreHallId = input.theatreHallId;
    performance.showTime = input.showTime;
    return this.performanceRepository.savePerformance(performance);
  }

  /** 잔여 좌석은 조회 시점의 판매 티켓 수로 매번 계산한다 (캐시하지 않음). */
  async listPerformances(): Promise<PerformanceListing[]> {
    const performances = await this.performanceRepository.findAllPerformances();
    const soldCounts = await this.performanceRepository.countSoldTicketsByPerformance(
      performances.map((p) => p.performanceId),
    );

    return performances.map((performance) => ({
      performance,
      capacity: hallCapacity(performance.theatreHall),
      ticketsAvailable: availableSeats(
        performance.theatreHall,
        soldCounts.get(performance.performanceId) ?? 0,
      ),
    }));
  }

  async getPerformance(performanceId: string): Promise<PerformanceDetail> {
    const performance = await this.findPerformanceOrThrow(performanceId);
    const takenPlaces = await this.performanceRepository.findTakenSeats(performanceId);
    return { performance, takenPlaces };
  }

  async getAvailability(performanceId: string): Promise<Availability> {
    const performance = await this.findPerformanceOrThrow(performanceId);
    const sold = await this.performanceRepository.countSoldTickets(performanceId);

    return {
      performanceId,
      capacity: hallCapacity(performance.theatreHall),
      ticketsAvailable: availableSeats(performance.theatreHall, sold),
    };
  }

  /**
   * 홀 변경은 판매 좌석 검사와 같은 트랜잭션에서 이뤄진다.
   * 새 홀 밖으로 밀려나는 판매 좌석이 있으면 HallChangeConflictException(409)으로 롤백한다.
   */
  async updatePerformance(performanceId: string, changes: UpdatePerformanceInput): Promise<Performance> {
    const performance = await this.findPerformanceOrThrow(performanceId);
    const columns: PerformanceColumns = {};
    let guard: SoldSeatGuard | undefined;

    if (changes.playId !== undefined && changes.playId !== performance.playId) {
      columns.playId = (await this.findPlayOrThrow(changes.playId)).playId;
    }
    if (changes.theatreHallId !== undefined && changes.theatreHallId !== performance.theatreHallId) {
      const hall = await this.getTheatreHall(changes.theatreHallId);
      columns.theatreHallId = hall.theatreHallId;
      guard = (taken) => this.assertSoldSeatsFit(performanceId, hall, taken);
    }
    if (changes.showTime !== undefined) {
      columns.showTime = changes.showTime;
    }
    if (Object.keys(columns).length === 0) {
      return performance;
    }

    try {
      await this.performanceRepository.updatePerformance(performanceId, columns, guard);
    } catch (error) {
      if (error instanceof TransactionConflictError || error instanceof StorageUnavailableError) {
        throw new StorageUnavailableException(error);
      }
      throw error;
    }
    return this.findPerformanceOrThrow(performanceId);
  }

  async deletePerformance(performanceId: string): Promise<void> {
    await this.findPerformanceOrThrow(performanceId);
    await this.performanceRepository.deletePerformance(performanceId);
  }

  private async findPerformanceOrThrow(performanceId: string): Promise<Performance> {
    const performance = await this.performanceRepository.findPerformanceById(performanceId);
    if (!performance) {
      throw new NotFoundException('공연을 찾을 수 없습니다.');
    }
    return performance;
  }

  private async findPlayOrThrow(playId: string): Promise<Play> {
    const play = await this.catalogRepository.findPlayById(playId);
    if (!play) {
      throw new NotFoundException('작품을 찾을 수 없습니다.');
    }
    return play;
  }

  // 판매된 좌석이 새 홀 밖으로 밀려나는 변경은 거부한다
  private assertSoldSeatsFit(performanceId: string, hall: TheatreHall, taken: SeatPosition[]): void {
    for (const ticket of taken) {
      const result = validateSeat(ticket.row, ticket.seat, hall);
      if (!result.valid) {
        throw new HallChangeConflictException(performanceId, ticket, result.violation);
      }
    }
  }
}
