import { Genre } from '../../catalog/domain/genre.entity';
import { Artist, artistFullName } from '../../catalog/domain/artist.entity';
import { Play } from '../../catalog/domain/play.entity';
import {
  ArtistDetailResponse,
  ArtistListItemResponse,
  ArtistResponse,
  GenreResponse,
  PlayDetailResponse,
  PlayListItemResponse,
  PlayResponse,
} from '../dto/catalog.dto';

export const presentGenre = (genre: Genre): GenreResponse => ({
  genreId: genre.genreId,
  name: genre.name,
});

/** 요청 종류(write/list/detail)별 응답 형태 */
export const artistPresenters = {
  write: (artist: Artist): ArtistResponse => ({
    artistId: artist.artistId,
    firstName: artist.firstName,
    lastName: artist.lastName,
    fullName: artistFullName(artist),
    about: artist.about,
  }),
  list: (artist: Artist): ArtistListItemResponse => ({
    artistId: artist.artistId,
    fullName: artistFullName(artist),
  }),
  detail: (artist: Artist): ArtistDetailResponse => ({
    artistId: artist.artistId,
    firstName: artist.firstName,
    lastName: artist.lastName,
    about: artist.about,
    plays: (artist.plays ?? []).map((play) => ({ playId: play.playId, title: play.title })),
  }),
} as const;

export const playPresenters = {
  write: (play: Play): PlayResponse => ({
    playId: play.playId,
    title: play.title,
    description: play.description,
    acts: play.acts,
    genreIds: (play.genres ?? []).map((genre) => genre.genreId),
    artistIds: (play.artists ?? []).map((artist) => artist.artistId),
  }),
  list: (play: Play): PlayListItemResponse => ({
    playId: play.playId,
    title: play.title,
    genres: (play.genres ?? []).map((genre) => genre.name),
    acts: play.acts,
  }),
  detail: (play: Play): PlayDetailResponse => ({
    playId: play.playId,
    title: play.title,
    description: play.description,
    acts: play.acts,
    genres: (play.genres ?? []).map(presentGenre),
    artists: (play.artists ?? []).map(artistFullName),
  }),
} as const;
