import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { ReservationCreatedEvent } from './reservation-created.event';
import { ReservationCancelledEvent } from './reservation-cancelled.event';
import { KafkaProducerService } from '../../infrastructure/kafka/kafka.producer.service';

/**
 * 커밋된 예약 이벤트를 Kafka로 중계한다.
 * 예약은 이미 확정된 상태이므로 전송 실패는 로그만 남긴다.
 */
@Injectable()
export class ReservationEventHandler {
  private readonly logger = new Logger(ReservationEventHandler.name);

  constructor(private readonly kafkaProducer: KafkaProducerService) {}

  @OnEvent(ReservationCreatedEvent.EVENT_NAME, { async: true })
  async handleReservationCreated(event: ReservationCreatedEvent): Promise<void> {
    try {
      await this.kafkaProducer.sendReservationCreatedEvent({
        reservationId: event.reservationId,
        userId: event.userId,
        tickets: event.tickets,
        createdAt: event.createdAt,
      });
    } catch (error) {
      this.logger.error(`예약 생성 이벤트 전송 실패 (${event.reservationId})`, error instanceof Error ? error.stack : error);
    }
  }

  @OnEvent(ReservationCancelledEvent.EVENT_NAME, { async: true })
  async handleReservationCancelled(event: ReservationCancelledEvent): Promise<void> {
    try {
      await this.kafkaProducer.sendReservationCancelledEvent({
        reservationId: event.reservationId,
        userId: event.userId,
        releasedSeats: event.releasedSeats,
      });
    } catch (error) {
      this.logger.error(`예약 취소 이벤트 전송 실패 (${event.reservationId})`, error instanceof Error ? error.stack : error);
    }
  }
}
