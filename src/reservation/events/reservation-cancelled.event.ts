import { SeatKey } from '../../common/errors/storage.errors';

export class ReservationCancelledEvent {
  static readonly EVENT_NAME = 'reservation.cancelled';

  constructor(
    public readonly reservationId: string,
    public readonly userId: string,
    public readonly releasedSeats: SeatKey[],
  ) {}
}
