import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, OneToMany, Index } from 'typeorm';
import { Ticket } from './ticket.entity';

@Entity('reservation')
export class Reservation {
  @PrimaryGeneratedColumn('uuid')
  reservationId!: string;

  @Index()
  @Column()
  userId!: string;

  @CreateDateColumn({ update: false })
  createdAt!: Date;

  @OneToMany(() => Ticket, (ticket) => ticket.reservation)
  tickets!: Ticket[];
}
