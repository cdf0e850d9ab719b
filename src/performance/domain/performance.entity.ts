import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Play } from '../../catalog/domain/play.entity';
import { TheatreHall } from './theatre-hall.entity';

@Entity('performance')
export class Performance {
  @PrimaryGeneratedColumn('uuid')
  performanceId!: string;

  @Column()
  playId!: string;

  @Column()
  theatreHallId!: string;

  @Index()
  @Column({ type: 'datetime' })
  showTime!: Date;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToOne(() => Play, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'playId' })
  play!: Play;

  @ManyToOne(() => TheatreHall, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'theatreHallId' })
  theatreHall!: TheatreHall;
}
