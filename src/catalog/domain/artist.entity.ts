import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToMany } from 'typeorm';
import { Play } from './play.entity';

@Entity('artist')
export class Artist {
  @PrimaryGeneratedColumn('uuid')
  artistId!: string;

  @Column({ length: 255 })
  firstName!: string;

  @Column({ length: 255 })
  lastName!: string;

  @Column({ type: 'text', nullable: true })
  about!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToMany(() => Play, (play) => play.artists)
  plays!: Play[];
}

export const artistFullName = (artist: Pick<Artist, 'firstName' | 'lastName'>): string =>
  `${artist.firstName} ${artist.lastName}`;
