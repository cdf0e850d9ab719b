import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import {
  ReservationRepository,
  SeatRecheck,
  TicketRequest,
  compareSeatKeys,
} from '../../../reservation/reservation.repository';
import { Performance } from '../../../performance/domain/performance.entity';
import { Reservation } from '../../../reservation/domain/reservation.entity';
import { Ticket } from '../../../reservation/domain/ticket.entity';
import { MissingReferenceError, SeatConflictError } from '../../../common/errors/storage.errors';
import { classifyStorageError, translateStorageError } from '../storage-error.classifier';
import { sharedRowLock } from '../row-lock';

@Injectable()
export class ReservationRepositoryImpl implements ReservationRepository {
  constructor(
    @InjectRepository(Reservation)
    private readonly repo: Repository<Reservation>,
    private readonly dataSource: DataSource,
  ) {}

  async createWithTickets(
    userId: string,
    tickets: TicketRequest[],
    recheck?: SeatRecheck,
  ): Promise<Reservation> {
    try {
      return await this.dataSource.transaction(async (manager) => {
        const reservation = new Reservation();
        reservation.userId = userId;
        const saved = await manager.save(reservation);

        // 모든 트랜잭션이 같은 순서로 인덱스 락을 잡도록 정렬 후 삽입 (교착 회피)
        for (const request of [...tickets].sort(compareSeatKeys)) {
          await this.insertTicket(manager, saved.reservationId, request);
        }

        // 티켓 삽입의 FK 검사가 공연 행을 잡은 뒤에 읽으므로 그 사이 커밋된 홀 변경까지 보인다
        if (recheck) {
          const performanceIds = [...new Set(tickets.map((t) => t.performanceId))];
          recheck(
            await manager.find(Performance, {
              where: { performanceId: In(performanceIds) },
              relations: { theatreHall: true },
              ...sharedRowLock(manager),
            }),
          );
        }

        return manager.findOneOrFail(Reservation, {
          where: { reservationId: saved.reservationId },
          relations: { tickets: true },
          order: { tickets: { row: 'ASC', seat: 'ASC' } },
        });
      });
    } catch (error) {
      throw translateStorageError(error);
    }
  }

  private async insertTicket(
    manager: EntityManager,
    reservationId: string,
    request: TicketRequest,
  ): Promise<void> {
    const ticket = new Ticket();
    ticket.performanceId = request.performanceId;
    ticket.row = request.row;
    ticket.seat = request.seat;
    ticket.reservationId = reservationId;

    try {
      await manager.insert(Ticket, ticket);
    } catch (error) {
      switch (classifyStorageError(error)) {
        case 'unique-violation':
          throw new SeatConflictError({
            performanceId: request.performanceId,
            row: request.row,
            seat: request.seat,
          });
        // 예약 행은 같은 트랜잭션에서 만들었으므로 없는 쪽은 공연이다
        case 'foreign-key-violation':
          throw new MissingReferenceError('performance', request.performanceId, error);
        default:
          throw error;
      }
    }
  }

  async findByUserId(userId: string): Promise<Reservation[]> {
    return this.repo.find({
      where: { userId },
      relations: { tickets: { performance: { play: true, theatreHall: true } } },
      order: { createdAt: 'DESC', tickets: { row: 'ASC', seat: 'ASC' } },
    });
  }

  async findById(reservationId: string): Promise<Reservation | null> {
    return this.repo.findOne({
      where: { reservationId },
      relations: { tickets: true },
    });
  }

  async delete(reservationId: string): Promise<number> {
    const result = await this.repo.delete({ reservationId });
    return result.affected ?? 0;
  }
}
