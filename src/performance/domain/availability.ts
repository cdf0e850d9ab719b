import { HallGrid } from './seat-validator';

export const hallCapacity = (hall: HallGrid): number => hall.rows * hall.seatsInRow;

/** 확정(커밋)된 티켓 수만 넘겨야 한다. 결과는 캐시하지 않는다. */
export const availableSeats = (hall: HallGrid, soldCount: number): number =>
  hallCapacity(hall) - soldCount;
