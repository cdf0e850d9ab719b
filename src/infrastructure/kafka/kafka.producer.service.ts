import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { Kafka, Producer, ProducerRecord } from 'kafkajs';
import { KAFKA_CONFIG, KAFKA_TOPICS } from './kafka.config';
import { SeatKey } from '../../common/errors/storage.errors';

export interface ReservationCreatedPayload {
  reservationId: string;
  userId: string;
  tickets: SeatKey[];
  createdAt: Date;
}

export interface ReservationCancelledPayload {
  reservationId: string;
  userId: string;
  releasedSeats: SeatKey[];
}

@Injectable()
export class KafkaProducerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(KafkaProducerService.name);
  private readonly kafka: Kafka;
  private readonly producer: Producer;
  private isConnected = false;

  constructor() {
    this.kafka = new Kafka(KAFKA_CONFIG);
    this.producer = this.kafka.producer();
  }

  async onModuleInit() {
    try {
      await this.producer.connect();
      this.isConnected = true;
      this.logger.log('Kafka Producer connected successfully');
    } catch (error) {
      // Kafka 없이도 예약 기능은 동작해야 하므로 기동은 계속한다. 이후 send는 건너뛴다.
      this.logger.error('Failed to connect Kafka Producer', error instanceof Error ? error.stack : error);
    }
  }

  async onModuleDestroy() {
    if (this.isConnected) {
      await this.producer.disconnect();
      this.logger.log('Kafka Producer disconnected');
    }
  }

  async send(record: ProducerRecord): Promise<void> {
    if (!this.isConnected) {
      this.logger.warn(`Kafka Producer is not connected, skipping message send (${record.topic})`);
      return;
    }

    try {
      await this.producer.send(record);
      this.logger.log(`Message sent to topic: ${record.topic}`);
    } catch (error) {
      this.logger.error(`Failed to send message to topic: ${record.topic}`, error instanceof Error ? error.stack : error);
      throw error;
    }
  }

  async sendReservationCreatedEvent(event: ReservationCreatedPayload): Promise<void> {
    await this.sendEvent(KAFKA_TOPICS.RESERVATION_CREATED, event.userId, event);
  }

  async sendReservationCancelledEvent(event: ReservationCancelledPayload): Promise<void> {
    await this.sendEvent(KAFKA_TOPICS.RESERVATION_CANCELLED, event.userId, event);
  }

  private async sendEvent(topic: string, key: string, payload: object): Promise<void> {
    const message = {
      eventId: `evt_${Date.now()}`,
      eventType: topic,
      eventTime: new Date().toISOString(),
      payload,
    };

    await this.send({
      topic,
      messages: [
        {
          key, // 같은 사용자의 이벤트는 같은 파티션으로 (순서 보장)
          value: JSON.stringify(message),
        },
      ],
    });
  }
}
