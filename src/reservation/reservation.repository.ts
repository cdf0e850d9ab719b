import { Reservation } from './domain/reservation.entity';
import { Performance } from '../performance/domain/performance.entity';
import { SeatKey } from '../common/errors/storage.errors';

export type TicketRequest = SeatKey;

/** 트랜잭션 안에서 다시 읽은 공연(홀 포함)으로 좌석을 재검증한다. 던지면 롤백된다. */
export type SeatRecheck = (performances: Performance[]) => void;

export interface ReservationRepository {
  /**
   * 예약 1건과 티켓 N건을 하나의 트랜잭션으로 저장한다.
   * 티켓을 넣은 뒤 같은 트랜잭션에서 공연·홀을 다시 읽어 recheck에 넘긴다.
   * 실패 시 아무것도 남기지 않으며 다음 오류를 던진다.
   * - SeatConflictError: (performanceId, row, seat) 유니크 위반
   * - MissingReferenceError: 공연이 없어 FK 위반
   * - TransactionConflictError: 데드락 등으로 롤백됨 (재시도 가능)
   * - StorageUnavailableError: DB 연결 불가
   */
  createWithTickets(userId: string, tickets: TicketRequest[], recheck?: SeatRecheck): Promise<Reservation>;
  /** 티켓 → 공연 → 작품·홀까지 함께 로드하고 최신 예약 순으로 정렬한다. */
  findByUserId(userId: string): Promise<Reservation[]>;
  findById(reservationId: string): Promise<Reservation | null>;
  /** 티켓은 FK cascade로 함께 삭제된다. 실제로 삭제된 예약 행 수를 돌려준다. */
  delete(reservationId: string): Promise<number>;
}

export const compareSeatKeys = (a: SeatKey, b: SeatKey): number =>
  a.performanceId.localeCompare(b.performanceId) || a.row - b.row || a.seat - b.seat;
