import { ConflictException, HttpStatus } from '@nestjs/common';
import { SeatPosition } from '../performance.repository';
import { SeatRangeViolation } from './seat-validator';

export class HallChangeConflictException extends ConflictException {
  constructor(
    readonly performanceId: string,
    readonly ticket: SeatPosition,
    readonly violation: SeatRangeViolation,
  ) {
    super({
      statusCode: HttpStatus.CONFLICT,
      code: 'HALL_CHANGE_CONFLICT',
      message: `이미 판매된 좌석(${ticket.row}행 ${ticket.seat}번)이 새 홀의 범위를 벗어납니다.`,
      performanceId,
      row: ticket.row,
      seat: ticket.seat,
      coordinate: violation.coordinate,
      max: violation.max,
    });
  }
}
