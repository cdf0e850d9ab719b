import { Type } from 'class-transformer';
import { IsArray, IsInt, IsNotEmpty, IsString, ValidateNested } from 'class-validator';

// row/seat의 범위(1..홀 크기)는 좌석 검증기에서 홀 기준으로 확인한다
export class TicketRequestDto {
  @IsString()
  @IsNotEmpty()
  performanceId!: string;

  @IsInt()
  row!: number;

  @IsInt()
  seat!: number;
}

// 빈 tickets 배열은 파이프에서 막지 않는다. 서비스가 EMPTY_RESERVATION으로 응답한다.
export class CreateReservationRequest {
  @IsString()
  @IsNotEmpty()
  userId!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TicketRequestDto)
  tickets!: TicketRequestDto[];
}

export class ReservationOwnerQuery {
  @IsString()
  @IsNotEmpty()
  userId!: string;
}

export class TicketResponse {
  ticketId!: string;
  row!: number;
  seat!: number;
  performanceId!: string;
}

export class TicketPerformanceSummary {
  performanceId!: string;
  showTime!: Date;
  playTitle!: string;
  theatreHallName!: string;
}

export class TicketListResponse {
  ticketId!: string;
  row!: number;
  seat!: number;
  performance!: TicketPerformanceSummary;
}

export class ReservationResponse {
  reservationId!: string;
  userId!: string;
  createdAt!: Date;
  tickets!: TicketResponse[];
}

export class ReservationListResponse {
  reservationId!: string;
  createdAt!: Date;
  tickets!: TicketListResponse[];
}
