import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToMany,
  JoinTable,
} from 'typeorm';
import { Genre } from './genre.entity';
import { Artist } from './artist.entity';

@Entity('play')
export class Play {
  @PrimaryGeneratedColumn('uuid')
  playId!: string;

  @Column({ length: 255 })
  title!: string;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'int', default: 1 })
  acts!: number;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToMany(() => Genre)
  @JoinTable({
    name: 'play_genre',
    joinColumn: { name: 'playId', referencedColumnName: 'playId' },
    inverseJoinColumn: { name: 'genreId', referencedColumnName: 'genreId' },
  })
  genres!: Genre[];

  @ManyToMany(() => Artist, (artist) => artist.plays)
  @JoinTable({
    name: 'play_artist',
    joinColumn: { name: 'playId', referencedColumnName: 'playId' },
    inverseJoinColumn: { name: 'artistId', referencedColumnName: 'artistId' },
  })
  artists!: Artist[];
}
