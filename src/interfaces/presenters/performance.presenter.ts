import { TheatreHall } from '../../performance/domain/theatre-hall.entity';
import { Performance } from '../../performance/domain/performance.entity';
import { hallCapacity } from '../../performance/domain/availability';
import { PerformanceDetail, PerformanceListing } from '../../performance/performance.service';
import {
  PerformanceDetailResponse,
  PerformanceListItemResponse,
  PerformanceResponse,
  TheatreHallResponse,
} from '../dto/performance.dto';
import { presentGenre } from './catalog.presenter';

export const presentTheatreHall = (hall: TheatreHall): TheatreHallResponse => ({
  theatreHallId: hall.theatreHallId,
  name: hall.name,
  rows: hall.rows,
  seatsInRow: hall.seatsInRow,
  capacity: hallCapacity(hall),
});

/** 요청 종류(write/list/detail)별 응답 형태 */
export const performancePresenters = {
  write: (performance: Performance): PerformanceResponse => ({
    performanceId: performance.performanceId,
    playId: performance.playId,
    theatreHallId: performance.theatreHallId,
    showTime: performance.showTime,
  }),
  list: ({ performance, capacity, ticketsAvailable }: PerformanceListing): PerformanceListItemResponse => ({
    performanceId: performance.performanceId,
    showTime: performance.showTime,
    playTitle: performance.play.title,
    theatreHallName: performance.theatreHall.name,
    theatreHallCapacity: capacity,
    ticketsAvailable,
  }),
  detail: ({ performance, takenPlaces }: PerformanceDetail): PerformanceDetailResponse => ({
    performanceId: performance.performanceId,
    showTime: performance.showTime,
    play: {
      playId: performance.play.playId,
      title: performance.play.title,
      genres: (performance.play.genres ?? []).map(presentGenre),
      acts: performance.play.acts,
    },
    theatreHall: presentTheatreHall(performance.theatreHall),
    takenPlaces: takenPlaces.map(({ row, seat }) => ({ row, seat })),
  }),
} as const;
