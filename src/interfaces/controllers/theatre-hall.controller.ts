import { Controller, Get, Post, Body, Param } from '@nestjs/common';
import { PerformanceService } from '../../performance/performance.service';
import { CreateTheatreHallRequest, TheatreHallResponse } from '../dto/performance.dto';
import { presentTheatreHall } from '../presenters/performance.presenter';

@Controller('api/theatre-halls')
export class TheatreHallController {
  constructor(private readonly performanceService: PerformanceService) {}

  @Get()
  async listTheatreHalls(): Promise<{ theatreHalls: TheatreHallResponse[] }> {
    const halls = await this.performanceService.listTheatreHalls();
    return { theatreHalls: halls.map(presentTheatreHall) };
  }

  @Get(':theatreHallId')
  async getTheatreHall(@Param('theatreHallId') theatreHallId: string): Promise<TheatreHallResponse> {
    return presentTheatreHall(await this.performanceService.getTheatreHall(theatreHallId));
  }

  @Post()
  async createTheatreHall(@Body() body: CreateTheatreHallRequest): Promise<TheatreHallResponse> {
    const hall = await this.performanceService.createTheatreHall({
      name: body.name,
      rows: body.rows,
      seatsInRow: body.seatsInRow,
    });
    return presentTheatreHall(hall);
  }
}
