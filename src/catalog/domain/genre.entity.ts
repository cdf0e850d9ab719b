import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity('genre')
export class Genre {
  @PrimaryGeneratedColumn('uuid')
  genreId!: string;

  @Column({ length: 255, unique: true })
  name!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
