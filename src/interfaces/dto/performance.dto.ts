import { Type } from 'class-transformer';
import { IsDate, IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { GenreResponse } from './catalog.dto';

export class CreateTheatreHallRequest {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsInt()
  @Min(1)
  rows!: number;

  @IsInt()
  @Min(1)
  seatsInRow!: number;
}

export class TheatreHallResponse {
  theatreHallId!: string;
  name!: string;
  rows!: number;
  seatsInRow!: number;
  capacity!: number;
}

export class CreatePerformanceRequest {
  @IsString()
  @IsNotEmpty()
  playId!: string;

  @IsString()
  @IsNotEmpty()
  theatreHallId!: string;

  @Type(() => Date)
  @IsDate()
  showTime!: Date;
}

export class UpdatePerformanceRequest {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  playId?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  theatreHallId?: string;

  @IsOptional()
  @Type(() => Date)
  @IsDate()
  showTime?: Date;
}

export class PerformanceResponse {
  performanceId!: string;
  playId!: string;
  theatreHallId!: string;
  showTime!: Date;
}

export class PerformanceListItemResponse {
  performanceId!: string;
  showTime!: Date;
  playTitle!: string;
  theatreHallName!: string;
  theatreHallCapacity!: number;
  ticketsAvailable!: number;
}

export class PerformancePlaySummary {
  playId!: string;
  title!: string;
  genres!: GenreResponse[];
  acts!: number;
}

export class SeatResponse {
  row!: number;
  seat!: number;
}

export class PerformanceDetailResponse {
  performanceId!: string;
  showTime!: Date;
  play!: PerformancePlaySummary;
  theatreHall!: TheatreHallResponse;
  takenPlaces!: SeatResponse[];
}

export class AvailabilityResponse {
  performanceId!: string;
  capacity!: number;
  ticketsAvailable!: number;
}
