import { TheatreHall } from './theatre-hall.entity';

export type SeatCoordinate = 'row' | 'seat';

export interface SeatRangeViolation {
  coordinate: SeatCoordinate;
  value: number;
  min: number;
  max: number;
}

export type SeatValidationResult =
  | { valid: true }
  | { valid: false; violation: SeatRangeViolation };

export type HallGrid = Pick<TheatreHall, 'rows' | 'seatsInRow'>;

const MIN_INDEX = 1;

const outOfRange = (value: number, max: number): boolean =>
  !Number.isInteger(value) || value < MIN_INDEX || value > max;

/**
 * (row, seat)가 홀의 좌석 배치 안에 있는지 검사한다.
 * 행을 먼저 검사하므로 둘 다 벗어난 경우 row 위반이 보고된다.
 */
export function validateSeat(row: number, seat: number, hall: HallGrid): SeatValidationResult {
  if (outOfRange(row, hall.rows)) {
    return {
      valid: false,
      violation: { coordinate: 'row', value: row, min: MIN_INDEX, max: hall.rows },
    };
  }
  if (outOfRange(seat, hall.seatsInRow)) {
    return {
      valid: false,
      violation: { coordinate: 'seat', value: seat, min: MIN_INDEX, max: hall.seatsInRow },
    };
  }
  return { valid: true };
}
