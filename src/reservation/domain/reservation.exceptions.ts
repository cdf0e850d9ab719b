import {
  BadRequestException,
  ConflictException,
  HttpStatus,
  ServiceUnavailableException,
} from '@nestjs/common';
import { SeatKey } from '../../common/errors/storage.errors';
import { SeatRangeViolation } from '../../performance/domain/seat-validator';

export enum ReservationErrorCode {
  SEAT_OUT_OF_RANGE = 'SEAT_OUT_OF_RANGE',
  SEAT_ALREADY_TAKEN = 'SEAT_ALREADY_TAKEN',
  EMPTY_RESERVATION = 'EMPTY_RESERVATION',
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
}

const COORDINATE_LABEL = { row: '행', seat: '좌석' } as const;

export class SeatOutOfRangeException extends BadRequestException {
  constructor(
    readonly performanceId: string,
    readonly violation: SeatRangeViolation,
  ) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      code: ReservationErrorCode.SEAT_OUT_OF_RANGE,
      message: `${COORDINATE_LABEL[violation.coordinate]} 번호 ${violation.value}은(는) ${violation.min}~${violation.max} 범위여야 합니다.`,
      performanceId,
      ...violation,
    });
  }
}

// 판매된 좌석과 한 요청 안에서 두 번 담긴 좌석 모두 이 오류로 응답한다
export class SeatAlreadyTakenException extends ConflictException {
  constructor(readonly seatKey: SeatKey) {
    super({
      statusCode: HttpStatus.CONFLICT,
      code: ReservationErrorCode.SEAT_ALREADY_TAKEN,
      message: `이미 판매된 좌석입니다. (${seatKey.row}행 ${seatKey.seat}번)`,
      ...seatKey,
    });
  }
}

export class EmptyReservationException extends BadRequestException {
  constructor() {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      code: ReservationErrorCode.EMPTY_RESERVATION,
      message: '예약에는 티켓이 한 장 이상 있어야 합니다.',
    });
  }
}

export class StorageUnavailableException extends ServiceUnavailableException {
  constructor(cause?: unknown) {
    super(
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        code: ReservationErrorCode.STORAGE_UNAVAILABLE,
        message: '일시적으로 예약을 처리할 수 없습니다. 잠시 후 다시 시도해 주세요.',
        retryable: true,
      },
      { cause },
    );
  }
}
