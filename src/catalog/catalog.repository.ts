import { Genre } from './domain/genre.entity';
import { Artist } from './domain/artist.entity';
import { Play } from './domain/play.entity';

export interface CatalogRepository {
  /** 이름이 중복되면 UniqueConstraintError를 던진다. */
  saveGenre(genre: Genre): Promise<Genre>;
  findAllGenres(): Promise<Genre[]>;
  findGenresByIds(genreIds: string[]): Promise<Genre[]>;

  saveArtist(artist: Artist): Promise<Artist>;
  findAllArtists(): Promise<Artist[]>;
  findArtistsByIds(artistIds: string[]): Promise<Artist[]>;
  findArtistWithPlays(artistId: string): Promise<Artist | null>;

  savePlay(play: Play): Promise<Play>;
  findAllPlays(): Promise<Play[]>;
  findPlayById(playId: string): Promise<Play | null>;
  findPlayWithRelations(playId: string): Promise<Play | null>;
}
