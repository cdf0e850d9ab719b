import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Unique } from 'typeorm';
import { Performance } from '../../performance/domain/performance.entity';
import { Reservation } from './reservation.entity';

export const TICKET_SEAT_UNIQUE_INDEX = 'UQ_ticket_performance_row_seat';

/**
 * 좌석 한 칸에 대한 판매 기록.
 * (performanceId, row, seat) 유니크 인덱스가 이중 판매를 막는 최종 방어선이다.
 */
@Entity('ticket')
@Unique(TICKET_SEAT_UNIQUE_INDEX, ['performanceId', 'row', 'seat'])
export class Ticket {
  @PrimaryGeneratedColumn('uuid')
  ticketId!: string;

  @Column({ type: 'int' })
  row!: number;

  @Column({ type: 'int' })
  seat!: number;

  @Column()
  performanceId!: string;

  @Column()
  reservationId!: string;

  @ManyToOne(() => Performance, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'performanceId' })
  performance!: Performance;

  @ManyToOne(() => Reservation, (reservation) => reservation.tickets, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'reservationId' })
  reservation!: Reservation;
}
