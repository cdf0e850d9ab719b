import { TheatreHall } from './domain/theatre-hall.entity';
import { Performance } from './domain/performance.entity';

export interface SeatPosition {
  row: number;
  seat: number;
}

export type PerformanceColumns = Partial<Pick<Performance, 'playId' | 'theatreHallId' | 'showTime'>>;

/** 판매 좌석을 보고 변경을 거부하려면 예외를 던진다. */
export type SoldSeatGuard = (taken: SeatPosition[]) => void;

export interface PerformanceRepository {
  saveTheatreHall(hall: TheatreHall): Promise<TheatreHall>;
  findAllTheatreHalls(): Promise<TheatreHall[]>;
  findTheatreHallById(theatreHallId: string): Promise<TheatreHall | null>;

  savePerformance(performance: Performance): Promise<Performance>;
  /**
   * 공연 행을 먼저 갱신해 쓰기 락을 잡은 뒤 같은 트랜잭션에서 판매 좌석을 읽어 guard에 넘긴다.
   * guard가 던지면 갱신은 롤백된다. 락을 쥔 동안 커밋되는 티켓은 없다.
   */
  updatePerformance(performanceId: string, columns: PerformanceColumns, guard?: SoldSeatGuard): Promise<void>;
  /** 공연 목록: 작품·홀을 함께 로드하고 최신 공연 시각 순으로 정렬한다. */
  findAllPerformances(): Promise<Performance[]>;
  /** 작품(장르 포함)·홀을 함께 로드한다. */
  findPerformanceById(performanceId: string): Promise<Performance | null>;
  findPerformancesWithHall(performanceIds: string[]): Promise<Performance[]>;
  /** 티켓은 FK cascade로 함께 삭제된다. */
  deletePerformance(performanceId: string): Promise<void>;

  countSoldTickets(performanceId: string): Promise<number>;
  countSoldTicketsByPerformance(performanceIds: string[]): Promise<Map<string, number>>;
  findTakenSeats(performanceId: string): Promise<SeatPosition[]>;
}
