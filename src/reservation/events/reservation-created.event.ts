import { SeatKey } from '../../common/errors/storage.errors';

export class ReservationCreatedEvent {
  static readonly EVENT_NAME = 'reservation.created';

  constructor(
    public readonly reservationId: string,
    public readonly userId: string,
    public readonly tickets: SeatKey[],
    public readonly createdAt: Date,
  ) {}
}
