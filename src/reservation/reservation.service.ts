import { Injectable, Inject, Logger, NotFoundException, ForbiddenException } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ReservationRepository, TicketRequest } from './reservation.repository';
import { PerformanceRepository } from '../performance/performance.repository';
import { Performance } from '../performance/domain/performance.entity';
import { validateSeat } from '../performance/domain/seat-validator';
import { Reservation } from './domain/reservation.entity';
import {
  EmptyReservationException,
  SeatAlreadyTakenException,
  SeatOutOfRangeException,
  StorageUnavailableException,
} from './domain/reservation.exceptions';
import {
  MissingReferenceError,
  SeatConflictError,
  SeatKey,
  StorageUnavailableError,
  TransactionConflictError,
} from '../common/errors/storage.errors';
import { ReservationCreatedEvent } from './events/reservation-created.event';
import { ReservationCancelledEvent } from './events/reservation-cancelled.event';
import { DI_TOKENS } from '../common/di-tokens';

const seatKeyOf = ({ performanceId, row, seat }: TicketRequest): string =>
  `${performanceId}:${row}:${seat}`;

const toSeatKey = ({ performanceId, row, seat }: SeatKey): SeatKey => ({ performanceId, row, seat });

@Injectable()
export class ReservationService {
  // 데드락 등으로 롤백된 트랜잭션의 최대 시도 횟수 (최초 시도 포함)
  static readonly MAX_TRANSACTION_ATTEMPTS = 3;
  // 재시도 간격: 시도 횟수 × 기준 간격
  static readonly RETRY_BACKOFF_MS = 50;

  private readonly logger = new Logger(ReservationService.name);

  constructor(
    @Inject(DI_TOKENS.RESERVATION_REPOSITORY)
    private readonly reservationRepository: ReservationRepository,
    @Inject(DI_TOKENS.PERFORMANCE_REPOSITORY)
    private readonly performanceRepository: PerformanceRepository,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async createReservation(userId: string, tickets: TicketRequest[]): Promise<Reservation> {
    if (tickets.length === 0) {
      throw new EmptyReservationException();
    }
    // 범위 검사가 먼저다: 범위를 벗어난 좌석은 중복이어도 400
    await this.assertSeatsWithinHalls(tickets);
    this.assertNoDuplicateSeats(tickets);

    const reservation = await this.persistWithRetry(userId, tickets);

    // 커밋 이후에만 이벤트 발행. 롤백된 예약은 외부에 노출되지 않는다
    this.eventEmitter.emit(
      ReservationCreatedEvent.EVENT_NAME,
      new ReservationCreatedEvent(
        reservation.reservationId,
        userId,
        reservation.tickets.map(toSeatKey),
        reservation.createdAt,
      ),
    );
    this.logger.log(
      `예약 ${reservation.reservationId} 생성 (userId: ${userId}, 티켓 ${reservation.tickets.length}장)`,
    );

    return reservation;
  }

  async listReservations(userId: string): Promise<Reservation[]> {
    return this.reservationRepository.findByUserId(userId);
  }

  async cancelReservation(userId: string, reservationId: string): Promise<void> {
    const reservation = await this.reservationRepository.findById(reservationId);
    if (!reservation) {
      throw new NotFoundException('예약을 찾을 수 없습니다.');
    }
    if (reservation.userId !== userId) {
      throw new ForbiddenException('본인의 예약만 취소할 수 있습니다.');
    }

    // 동시에 들어온 취소 중 실제로 행을 지운 요청만 이벤트를 발행한다
    const deleted = await this.reservationRepository.delete(reservationId);
    if (deleted === 0) {
      throw new NotFoundException('예약을 찾을 수 없습니다.');
    }

    this.eventEmitter.emit(
      ReservationCancelledEvent.EVENT_NAME,
      new ReservationCancelledEvent(reservationId, userId, reservation.tickets.map(toSeatKey)),
    );
    this.logger.log(`예약 ${reservationId} 취소 (좌석 ${reservation.tickets.length}개 반환)`);
  }

  // 한 요청 안의 중복 좌석은 유니크 인덱스 위반과 같은 409로 응답한다
  private assertNoDuplicateSeats(tickets: TicketRequest[]): void {
    const seen = new Set<string>();
    for (const ticket of tickets) {
      const key = seatKeyOf(ticket);
      if (seen.has(key)) {
        throw new SeatAlreadyTakenException(toSeatKey(ticket));
      }
      seen.add(key);
    }
  }

  private async assertSeatsWithinHalls(tickets: TicketRequest[]): Promise<void> {
    const performanceIds = [...new Set(tickets.map((t) => t.performanceId))];
    this.assertSeatsFit(tickets, await this.performanceRepository.findPerformancesWithHall(performanceIds));
  }

  private assertSeatsFit(tickets: TicketRequest[], performances: Performance[]): void {
    const byId = new Map<string, Performance>(performances.map((p) => [p.performanceId, p]));

    for (const ticket of tickets) {
      const performance = byId.get(ticket.performanceId);
      if (!performance) {
        throw new NotFoundException(`공연을 찾을 수 없습니다. (${ticket.performanceId})`);
      }

      const result = validateSeat(ticket.row, ticket.seat, performance.theatreHall);
      if (!result.valid) {
        throw new SeatOutOfRangeException(ticket.performanceId, result.violation);
      }
    }
  }

  /**
   * 유니크 인덱스가 좌석 경합의 승자를 정한다. 진 쪽은 SeatConflictError로 롤백되며 재시도하지 않는다.
   * 교착·직렬화 실패로 롤백된 경우에만 트랜잭션 전체를 다시 시도한다.
   * 검증 후 홀이 바뀌었을 수 있으므로 트랜잭션 안에서 좌석 범위를 한 번 더 확인한다.
   */
  private async persistWithRetry(userId: string, tickets: TicketRequest[]): Promise<Reservation> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.reservationRepository.createWithTickets(userId, tickets, (performances) =>
          this.assertSeatsFit(tickets, performances),
        );
      } catch (error) {
        if (error instanceof SeatConflictError) {
          throw new SeatAlreadyTakenException(error.seatKey);
        }
        if (error instanceof MissingReferenceError) {
          // 검증 이후 공연이 삭제된 경우
          throw new NotFoundException(`공연을 찾을 수 없습니다. (${error.referenceId})`);
        }
        if (error instanceof TransactionConflictError) {
          if (attempt < ReservationService.MAX_TRANSACTION_ATTEMPTS) {
            this.logger.warn(`예약 트랜잭션 충돌, 재시도 ${attempt}/${ReservationService.MAX_TRANSACTION_ATTEMPTS}`);
            await this.sleep(attempt * ReservationService.RETRY_BACKOFF_MS);
            continue;
          }
          throw new StorageUnavailableException(error);
        }
        if (error instanceof StorageUnavailableError) {
          this.logger.error('예약 저장소에 연결할 수 없습니다.', error.stack);
          throw new StorageUnavailableException(error);
        }
        throw error;
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
