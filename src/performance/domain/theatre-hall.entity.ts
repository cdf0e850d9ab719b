import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity('theatre_hall')
export class TheatreHall {
  @PrimaryGeneratedColumn('uuid')
  theatreHallId!: string;

  @Column({ length: 255 })
  name!: string;

  @Column({ type: 'int' })
  rows!: number;

  @Column({ type: 'int' })
  seatsInRow!: number;

  @CreateDateColumn()
  createdAt!: Date;
}
