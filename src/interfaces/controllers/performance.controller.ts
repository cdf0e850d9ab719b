import { Controller, Get, Post, Patch, Delete, Body, Param, HttpCode, HttpStatus } from '@nestjs/common';
import { PerformanceService } from '../../performance/performance.service';
import {
  AvailabilityResponse,
  CreatePerformanceRequest,
  PerformanceDetailResponse,
  PerformanceListItemResponse,
  PerformanceResponse,
  UpdatePerformanceRequest,
} from '../dto/performance.dto';
import { performancePresenters } from '../presenters/performance.presenter';

@Controller('api/performances')
export class PerformanceController {
  constructor(private readonly performanceService: PerformanceService) {}

  @Get()
  async listPerformances(): Promise<{ performances: PerformanceListItemResponse[] }> {
    const listings = await this.performanceService.listPerformances();
    return { performances: listings.map(performancePresenters.list) };
  }

  @Get(':performanceId')
  async getPerformance(@Param('performanceId') performanceId: string): Promise<PerformanceDetailResponse> {
    return performancePresenters.detail(await this.performanceService.getPerformance(performanceId));
  }

  @Get(':performanceId/availability')
  async getAvailability(@Param('performanceId') performanceId: string): Promise<AvailabilityResponse> {
    return this.performanceService.getAvailability(performanceId);
  }

  @Post()
  async createPerformance(@Body() body: CreatePerformanceRequest): Promise<PerformanceResponse> {
    const performance = await this.performanceService.createPerformance({
      playId: body.playId,
      theatreHallId: body.theatreHallId,
      showTime: body.showTime,
    });
    return performancePresenters.write(performance);
  }

  @Patch(':performanceId')
  async updatePerformance(
    @Param('performanceId') performanceId: string,
    @Body() body: UpdatePerformanceRequest,
  ): Promise<PerformanceResponse> {
    const performance = await this.performanceService.updatePerformance(performanceId, {
      playId: body.playId,
      theatreHallId: body.theatreHallId,
      showTime: body.showTime,
    });
    return performancePresenters.write(performance);
  }

  @Delete(':performanceId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deletePerformance(@Param('performanceId') performanceId: string): Promise<void> {
    await this.performanceService.deletePerformance(performanceId);
  }
}
