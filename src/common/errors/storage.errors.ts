/**
 * 저장소 구현(TypeORM 등)에 의존하지 않는 저장 계층 오류.
 * 리포지토리 구현체가 드라이버 오류를 이 타입으로 바꿔 던지고, 서비스가 HTTP 오류로 변환한다.
 */
export class UniqueConstraintError extends Error {
  constructor(
    readonly constraint: string,
    message = `유니크 제약 위반: ${constraint}`,
  ) {
    super(message);
    this.name = 'UniqueConstraintError';
  }
}

export interface SeatKey {
  performanceId: string;
  row: number;
  seat: number;
}

export class SeatConflictError extends UniqueConstraintError {
  constructor(readonly seatKey: SeatKey) {
    super(
      'UQ_ticket_performance_row_seat',
      `이미 판매된 좌석: ${seatKey.performanceId} (${seatKey.row}행 ${seatKey.seat}번)`,
    );
    this.name = 'SeatConflictError';
  }
}

/** 참조 대상 행이 없어 FK 제약을 위반했다. */
export class MissingReferenceError extends Error {
  constructor(
    readonly reference: string,
    readonly referenceId: string,
    cause?: unknown,
  ) {
    super(`참조 대상이 없습니다: ${reference} ${referenceId}`, { cause });
    this.name = 'MissingReferenceError';
  }
}

/** 데드락·락 대기 시간 초과·직렬화 실패. 트랜잭션 전체를 다시 시도해도 된다. */
export class TransactionConflictError extends Error {
  constructor(cause: unknown) {
    super('트랜잭션 충돌로 롤백되었습니다.', { cause });
    this.name = 'TransactionConflictError';
  }
}

export class StorageUnavailableError extends Error {
  constructor(cause: unknown) {
    super('저장소에 연결할 수 없습니다.', { cause });
    this.name = 'StorageUnavailableError';
  }
}
