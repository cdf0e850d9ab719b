import { Reservation } from '../../reservation/domain/reservation.entity';
import { Ticket } from '../../reservation/domain/ticket.entity';
import { ReservationListResponse, ReservationResponse, TicketListResponse } from '../dto/reservation.dto';

const presentTicketWithPerformance = (ticket: Ticket): TicketListResponse => ({
  ticketId: ticket.ticketId,
  row: ticket.row,
  seat: ticket.seat,
  performance: {
    performanceId: ticket.performance.performanceId,
    showTime: ticket.performance.showTime,
    playTitle: ticket.performance.play.title,
    theatreHallName: ticket.performance.theatreHall.name,
  },
});

/** 요청 종류(write/list)별 응답 형태 */
export const reservationPresenters = {
  write: (reservation: Reservation): ReservationResponse => ({
    reservationId: reservation.reservationId,
    userId: reservation.userId,
    createdAt: reservation.createdAt,
    tickets: reservation.tickets.map((ticket) => ({
      ticketId: ticket.ticketId,
      row: ticket.row,
      seat: ticket.seat,
      performanceId: ticket.performanceId,
    })),
  }),
  list: (reservation: Reservation): ReservationListResponse => ({
    reservationId: reservation.reservationId,
    createdAt: reservation.createdAt,
    tickets: reservation.tickets.map(presentTicketWithPerformance),
  }),
} as const;
