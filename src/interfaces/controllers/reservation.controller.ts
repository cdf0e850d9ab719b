import { Controller, Post, Get, Delete, Body, Query, Param, HttpCode, HttpStatus } from '@nestjs/common';
import { ReservationService } from '../../reservation/reservation.service';
import {
  CreateReservationRequest,
  ReservationListResponse,
  ReservationOwnerQuery,
  ReservationResponse,
} from '../dto/reservation.dto';
import { reservationPresenters } from '../presenters/reservation.presenter';

@Controller('api/reservations')
export class ReservationController {
  constructor(private readonly reservationService: ReservationService) {}

  @Post()
  async createReservation(@Body() body: CreateReservationRequest): Promise<ReservationResponse> {
    const reservation = await this.reservationService.createReservation(
      body.userId,
      body.tickets.map(({ performanceId, row, seat }) => ({ performanceId, row, seat })),
    );
    return reservationPresenters.write(reservation);
  }

  @Get()
  async listReservations(@Query() query: ReservationOwnerQuery): Promise<{ reservations: ReservationListResponse[] }> {
    const reservations = await this.reservationService.listReservations(query.userId);
    return { reservations: reservations.map(reservationPresenters.list) };
  }

  @Delete(':reservationId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async cancelReservation(
    @Param('reservationId') reservationId: string,
    @Query() query: ReservationOwnerQuery,
  ): Promise<void> {
    await this.reservationService.cancelReservation(query.userId, reservationId);
  }
}
