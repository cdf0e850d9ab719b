import { NotFoundException, ForbiddenException } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ReservationService } from './reservation.service';
import { ReservationRepository } from './reservation.repository';
import { PerformanceRepository } from '../performance/performance.repository';
import { Performance } from '../performance/domain/performance.entity';
import { TheatreHall } from '../performance/domain/theatre-hall.entity';
import { Reservation } from './domain/reservation.entity';
import { Ticket } from './domain/ticket.entity';
import {
  EmptyReservationException,
  SeatAlreadyTakenException,
  SeatOutOfRangeException,
  StorageUnavailableException,
} from './domain/reservation.exceptions';
import {
  MissingReferenceError,
  SeatConflictError,
  StorageUnavailableError,
  TransactionConflictError,
} from '../common/errors/storage.errors';
import { ReservationCreatedEvent } from './events/reservation-created.event';
import { ReservationCancelledEvent } from './events/reservation-cancelled.event';

const createHall = (overrides: Partial<TheatreHall> = {}): TheatreHall =>
  Object.assign(new TheatreHall(), {
    theatreHallId: 'hall-1',
    name: 'Main Stage',
    rows: 10,
    seatsInRow: 15,
    createdAt: new Date(),
    ...overrides,
  });

const createPerformance = (overrides: Partial<Performance> = {}): Performance =>
  Object.assign(new Performance(), {
    performanceId: 'performance-1',
    playId: 'play-1',
    theatreHallId: 'hall-1',
    showTime: new Date('2026-11-01T19:00:00Z'),
    theatreHall: createHall(),
    ...overrides,
  });

const createTicket = (row: number, seat: number, performanceId = 'performance-1'): Ticket =>
  Object.assign(new Ticket(), {
    ticketId: `ticket-${row}-${seat}`,
    row,
    seat,
    performanceId,
    reservationId: 'reservation-1',
  });

const createReservation = (tickets: Ticket[], overrides: Partial<Reservation> = {}): Reservation =>
  Object.assign(new Reservation(), {
    reservationId: 'reservation-1',
    userId: 'user-1',
    createdAt: new Date('2026-10-18T10:00:00Z'),
    tickets,
    ...overrides,
  });

describe('ReservationService', () => {
  let service: ReservationService;
  let mockReservationRepository: jest.Mocked<ReservationRepository>;
  let mockPerformanceRepository: jest.Mocked<PerformanceRepository>;
  let eventEmitter: EventEmitter2;
  let emitSpy: jest.SpyInstance;

  beforeEach(() => {
    mockReservationRepository = {
      createWithTickets: jest.fn(),
      findByUserId: jest.fn(),
      findById: jest.fn(),
      delete: jest.fn(),
    };

    mockPerformanceRepository = {
      saveTheatreHall: jest.fn(),
      findAllTheatreHalls: jest.fn(),
      findTheatreHallById: jest.fn(),
      savePerformance: jest.fn(),
      updatePerformance: jest.fn(),
      findAllPerformances: jest.fn(),
      findPerformanceById: jest.fn(),
      findPerformancesWithHall: jest.fn(),
      deletePerformance: jest.fn(),
      countSoldTickets: jest.fn(),
      countSoldTicketsByPerformance: jest.fn(),
      findTakenSeats: jest.fn(),
    };

    eventEmitter = new EventEmitter2();
    emitSpy = jest.spyOn(eventEmitter, 'emit');

    service = new ReservationService(mockReservationRepository, mockPerformanceRepository, eventEmitter);
  });

  describe('createReservation', () => {
    it('좌석 검증을 통과하면 예약과 티켓을 한 번에 저장하고 생성 이벤트를 발행한다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);
      const saved = createReservation([createTicket(2, 3), createTicket(2, 4)]);
      mockReservationRepository.createWithTickets.mockResolvedValue(saved);

      // when
      const result = await service.createReservation('user-1', [
        { performanceId: 'performance-1', row: 2, seat: 3 },
        { performanceId: 'performance-1', row: 2, seat: 4 },
      ]);

      // then
      expect(result).toBe(saved);
      expect(mockPerformanceRepository.findPerformancesWithHall).toHaveBeenCalledWith(['performance-1']);
      expect(mockReservationRepository.createWithTickets).toHaveBeenCalledWith(
        'user-1',
        [
          { performanceId: 'performance-1', row: 2, seat: 3 },
          { performanceId: 'performance-1', row: 2, seat: 4 },
        ],
        expect.any(Function),
      );
      expect(emitSpy).toHaveBeenCalledWith(
        ReservationCreatedEvent.EVENT_NAME,
        expect.objectContaining({
          reservationId: 'reservation-1',
          userId: 'user-1',
          tickets: [
            { performanceId: 'performance-1', row: 2, seat: 3 },
            { performanceId: 'performance-1', row: 2, seat: 4 },
          ],
        }),
      );
    });

    it('티켓이 없으면 EmptyReservationException을 던지고 아무것도 저장하지 않는다', async () => {
      // when & then
      await expect(service.createReservation('user-1', [])).rejects.toThrow(EmptyReservationException);
      expect(mockPerformanceRepository.findPerformancesWithHall).not.toHaveBeenCalled();
      expect(mockReservationRepository.createWithTickets).not.toHaveBeenCalled();
      expect(emitSpy).not.toHaveBeenCalled();
    });

    it('10행 15석 홀에서 11행을 예약하면 SeatOutOfRangeException을 던진다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);

      // when
      const attempt = service.createReservation('user-1', [
        { performanceId: 'performance-1', row: 11, seat: 1 },
      ]);

      // then
      await expect(attempt).rejects.toThrow(SeatOutOfRangeException);
      await attempt.catch((error: SeatOutOfRangeException) => {
        expect(error.getResponse()).toEqual(
          expect.objectContaining({
            code: 'SEAT_OUT_OF_RANGE',
            performanceId: 'performance-1',
            coordinate: 'row',
            value: 11,
            min: 1,
            max: 10,
          }),
        );
      });
      expect(mockReservationRepository.createWithTickets).not.toHaveBeenCalled();
    });

    it('여러 티켓 중 하나라도 범위를 벗어나면 아무 티켓도 저장하지 않는다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);

      // when & then
      await expect(
        service.createReservation('user-1', [
          { performanceId: 'performance-1', row: 1, seat: 1 },
          { performanceId: 'performance-1', row: 1, seat: 16 },
        ]),
      ).rejects.toThrow(SeatOutOfRangeException);
      expect(mockReservationRepository.createWithTickets).not.toHaveBeenCalled();
    });

    it('한 요청에 같은 좌석이 두 번 있으면 그 좌석으로 SeatAlreadyTakenException(409)을 던진다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);

      // when
      const attempt = service.createReservation('user-1', [
        { performanceId: 'performance-1', row: 2, seat: 3 },
        { performanceId: 'performance-1', row: 2, seat: 3 },
      ]);

      // then
      await expect(attempt).rejects.toThrow(SeatAlreadyTakenException);
      await attempt.catch((error: SeatAlreadyTakenException) => {
        expect(error.getStatus()).toBe(409);
        expect(error.seatKey).toEqual({ performanceId: 'performance-1', row: 2, seat: 3 });
        expect(error.getResponse()).toEqual(expect.objectContaining({ code: 'SEAT_ALREADY_TAKEN' }));
      });
      expect(mockReservationRepository.createWithTickets).not.toHaveBeenCalled();
    });

    it('범위를 벗어난 좌석이 중복되어 있으면 중복보다 범위 오류가 먼저다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);

      // when & then
      await expect(
        service.createReservation('user-1', [
          { performanceId: 'performance-1', row: 11, seat: 1 },
          { performanceId: 'performance-1', row: 11, seat: 1 },
        ]),
      ).rejects.toThrow(SeatOutOfRangeException);
      expect(mockReservationRepository.createWithTickets).not.toHaveBeenCalled();
    });

    it('존재하지 않는 공연의 좌석을 예약하면 NotFoundException을 던진다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([]);

      // when & then
      await expect(
        service.createReservation('user-1', [{ performanceId: 'missing', row: 1, seat: 1 }]),
      ).rejects.toThrow(NotFoundException);
    });

    it('유니크 인덱스 위반은 재시도 없이 SeatAlreadyTakenException으로 변환한다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);
      mockReservationRepository.createWithTickets.mockRejectedValue(
        new SeatConflictError({ performanceId: 'performance-1', row: 2, seat: 3 }),
      );

      // when
      const attempt = service.createReservation('user-2', [
        { performanceId: 'performance-1', row: 2, seat: 3 },
      ]);

      // then
      await expect(attempt).rejects.toThrow(SeatAlreadyTakenException);
      await attempt.catch((error: SeatAlreadyTakenException) => {
        expect(error.getStatus()).toBe(409);
        expect(error.seatKey).toEqual({ performanceId: 'performance-1', row: 2, seat: 3 });
      });
      expect(mockReservationRepository.createWithTickets).toHaveBeenCalledTimes(1);
      expect(emitSpy).not.toHaveBeenCalled();
    });

    it('트랜잭션 충돌로 롤백되면 트랜잭션 전체를 다시 시도한다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);
      const saved = createReservation([createTicket(1, 1)]);
      mockReservationRepository.createWithTickets
        .mockRejectedValueOnce(new TransactionConflictError(new Error('deadlock')))
        .mockResolvedValueOnce(saved);

      // when
      const result = await service.createReservation('user-1', [
        { performanceId: 'performance-1', row: 1, seat: 1 },
      ]);

      // then
      expect(result).toBe(saved);
      expect(mockReservationRepository.createWithTickets).toHaveBeenCalledTimes(2);
    });

    it('재시도 후에도 좌석이 선점되었다면 SeatAlreadyTakenException을 던진다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);
      mockReservationRepository.createWithTickets
        .mockRejectedValueOnce(new TransactionConflictError(new Error('deadlock')))
        .mockRejectedValueOnce(new SeatConflictError({ performanceId: 'performance-1', row: 1, seat: 1 }));

      // when & then
      await expect(
        service.createReservation('user-1', [{ performanceId: 'performance-1', row: 1, seat: 1 }]),
      ).rejects.toThrow(SeatAlreadyTakenException);
      expect(mockReservationRepository.createWithTickets).toHaveBeenCalledTimes(2);
    });

    it('최대 시도 횟수를 넘기면 StorageUnavailableException을 던진다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);
      mockReservationRepository.createWithTickets.mockRejectedValue(
        new TransactionConflictError(new Error('lock wait timeout')),
      );

      // when & then
      await expect(
        service.createReservation('user-1', [{ performanceId: 'performance-1', row: 1, seat: 1 }]),
      ).rejects.toThrow(StorageUnavailableException);
      expect(mockReservationRepository.createWithTickets).toHaveBeenCalledTimes(
        ReservationService.MAX_TRANSACTION_ATTEMPTS,
      );
    });

    it('저장소에 연결할 수 없으면 재시도 가능한 StorageUnavailableException을 던진다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);
      mockReservationRepository.createWithTickets.mockRejectedValue(
        new StorageUnavailableError(new Error('connect ECONNREFUSED')),
      );

      // when
      const attempt = service.createReservation('user-1', [
        { performanceId: 'performance-1', row: 1, seat: 1 },
      ]);

      // then
      await expect(attempt).rejects.toThrow(StorageUnavailableException);
      await attempt.catch((error: StorageUnavailableException) => {
        expect(error.getStatus()).toBe(503);
        expect(error.getResponse()).toEqual(expect.objectContaining({ retryable: true }));
      });
      expect(mockReservationRepository.createWithTickets).toHaveBeenCalledTimes(1);
    });

    it('검증 이후 홀이 작아졌다면 트랜잭션 안의 재검증에서 SeatOutOfRangeException으로 롤백한다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);
      const moved = createPerformance({
        theatreHallId: 'hall-2',
        theatreHall: createHall({ theatreHallId: 'hall-2', rows: 2, seatsInRow: 15 }),
      });
      mockReservationRepository.createWithTickets.mockImplementation(async (_userId, _tickets, recheck) => {
        recheck?.([moved]);
        return createReservation([createTicket(5, 1)]);
      });

      // when
      const attempt = service.createReservation('user-1', [{ performanceId: 'performance-1', row: 5, seat: 1 }]);

      // then
      await expect(attempt).rejects.toThrow(SeatOutOfRangeException);
      await attempt.catch((error: SeatOutOfRangeException) => {
        expect(error.getResponse()).toEqual(expect.objectContaining({ coordinate: 'row', value: 5, max: 2 }));
      });
      expect(mockReservationRepository.createWithTickets).toHaveBeenCalledTimes(1);
      expect(emitSpy).not.toHaveBeenCalled();
    });

    it('검증 이후 공연이 삭제되어 FK 위반이 나면 NotFoundException을 던진다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);
      mockReservationRepository.createWithTickets.mockRejectedValue(
        new MissingReferenceError('performance', 'performance-1'),
      );

      // when & then
      await expect(
        service.createReservation('user-1', [{ performanceId: 'performance-1', row: 1, seat: 1 }]),
      ).rejects.toThrow(NotFoundException);
      expect(mockReservationRepository.createWithTickets).toHaveBeenCalledTimes(1);
      expect(emitSpy).not.toHaveBeenCalled();
    });

    it('분류되지 않은 오류는 그대로 전파한다', async () => {
      // given
      mockPerformanceRepository.findPerformancesWithHall.mockResolvedValue([createPerformance()]);
      const unexpected = new Error('unexpected');
      mockReservationRepository.createWithTickets.mockRejectedValue(unexpected);

      // when & then
      await expect(
        service.createReservation('user-1', [{ performanceId: 'performance-1', row: 1, seat: 1 }]),
      ).rejects.toBe(unexpected);
    });
  });

  describe('cancelReservation', () => {
    it('본인 예약을 취소하면 삭제 후 반환된 좌석과 함께 취소 이벤트를 발행한다', async () => {
      // given
      mockReservationRepository.findById.mockResolvedValue(createReservation([createTicket(4, 5)]));
      mockReservationRepository.delete.mockResolvedValue(1);

      // when
      await service.cancelReservation('user-1', 'reservation-1');

      // then
      expect(mockReservationRepository.delete).toHaveBeenCalledWith('reservation-1');
      expect(emitSpy).toHaveBeenCalledWith(
        ReservationCancelledEvent.EVENT_NAME,
        new ReservationCancelledEvent('reservation-1', 'user-1', [
          { performanceId: 'performance-1', row: 4, seat: 5 },
        ]),
      );
    });

    it('조회 후 다른 요청이 먼저 삭제했다면 NotFoundException을 던지고 이벤트를 발행하지 않는다', async () => {
      // given
      mockReservationRepository.findById.mockResolvedValue(createReservation([createTicket(4, 5)]));
      mockReservationRepository.delete.mockResolvedValue(0);

      // when & then
      await expect(service.cancelReservation('user-1', 'reservation-1')).rejects.toThrow(NotFoundException);
      expect(emitSpy).not.toHaveBeenCalled();
    });

    it('같은 예약을 동시에 두 번 취소하면 이벤트는 한 번만 발행된다', async () => {
      // given
      mockReservationRepository.findById.mockResolvedValue(createReservation([createTicket(4, 5)]));
      mockReservationRepository.delete.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

      // when
      const results = await Promise.allSettled([
        service.cancelReservation('user-1', 'reservation-1'),
        service.cancelReservation('user-1', 'reservation-1'),
      ]);

      // then
      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      expect(results.filter((r) => r.status === 'rejected')).toHaveLength(1);
      expect(emitSpy).toHaveBeenCalledTimes(1);
    });

    it('존재하지 않는 예약을 취소하면 NotFoundException을 던진다', async () => {
      // given
      mockReservationRepository.findById.mockResolvedValue(null);

      // when & then
      await expect(service.cancelReservation('user-1', 'missing')).rejects.toThrow(NotFoundException);
    });

    it('다른 유저의 예약을 취소하면 ForbiddenException을 던진다', async () => {
      // given
      mockReservationRepository.findById.mockResolvedValue(createReservation([createTicket(1, 1)]));

      // when & then
      await expect(service.cancelReservation('user-2', 'reservation-1')).rejects.toThrow(ForbiddenException);
      expect(mockReservationRepository.delete).not.toHaveBeenCalled();
    });
  });

  describe('listReservations', () => {
    it('유저의 예약 목록을 조회한다', async () => {
      // given
      const reservations = [createReservation([createTicket(1, 1)])];
      mockReservationRepository.findByUserId.mockResolvedValue(reservations);

      // when
      const result = await service.listReservations('user-1');

      // then
      expect(result).toBe(reservations);
      expect(mockReservationRepository.findByUserId).toHaveBeenCalledWith('user-1');
    });
  });
});
