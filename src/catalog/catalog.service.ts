import { Injectable, Inject, NotFoundException, ConflictException, HttpStatus } from '@nestjs/common';
import { CatalogRepository } from './catalog.repository';
import { Genre } from './domain/genre.entity';
import { Artist } from './domain/artist.entity';
import { Play } from './domain/play.entity';
import { DI_TOKENS } from '../common/di-tokens';
import { UniqueConstraintError } from '../common/errors/storage.errors';
import { CacheService } from '../infrastructure/cache/cache.service';

export interface CreateArtistInput {
  firstName: string;
  lastName: string;
  about?: string;
}

export interface CreatePlayInput {
  title: string;
  description: string;
  acts?: number;
  genreIds?: string[];
  artistIds?: string[];
}

@Injectable()
export class CatalogService {
  // 카탈로그는 관리자만 변경하고, 변경 시 캐시를 즉시 무효화한다
  private static readonly LIST_CACHE_TTL_MS = 10 * 60 * 1000; // 10분
  static readonly CACHE_KEYS = {
    GENRES: 'catalog:genres',
    ARTISTS: 'catalog:artists',
    PLAYS: 'catalog:plays',
  } as const;

  constructor(
    @Inject(DI_TOKENS.CATALOG_REPOSITORY)
    private readonly catalogRepository: CatalogRepository,
    private readonly cacheService: CacheService,
  ) {}

  async createGenre(name: string): Promise<Genre> {
    const genre = new Genre();
    genre.name = name;

    try {
      const saved = await this.catalogRepository.saveGenre(genre);
      await this.cacheService.invalidate(CatalogService.CACHE_KEYS.GENRES);
      return saved;
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw new ConflictException({
          statusCode: HttpStatus.CONFLICT,
          code: 'GENRE_ALREADY_EXISTS',
          message: `이미 존재하는 장르입니다. (${name})`,
        });
      }
      throw error;
    }
  }

  async listGenres(): Promise<Genre[]> {
    return this.cacheService.getOrLoad(
      CatalogService.CACHE_KEYS.GENRES,
      () => this.catalogRepository.findAllGenres(),
      CatalogService.LIST_CACHE_TTL_MS,
    );
  }

  async createArtist(input: CreateArtistInput): Promise<Artist> {
    const artist = new Artist();
    artist.firstName = input.firstName;
    artist.lastName = input.lastName;
    artist.about = input.about ?? null;

    const saved = await this.catalogRepository.saveArtist(artist);
    await this.cacheService.invalidate(CatalogService.CACHE_KEYS.ARTISTS);
    return saved;
  }

  async listArtists(): Promise<Artist[]> {
    return this.cacheService.getOrLoad(
      CatalogService.CACHE_KEYS.ARTISTS,
      () => this.catalogRepository.findAllArtists(),
      CatalogService.LIST_CACHE_TTL_MS,
    );
  }

  async getArtist(artistId: string): Promise<Artist> {
    const artist = await this.catalogRepository.findArtistWithPlays(artistId);
    if (!artist) {
      throw new NotFoundException('배우를 찾을 수 없습니다.');
    }
    return artist;
  }

  async createPlay(input: CreatePlayInput): Promise<Play> {
    const genreIds = [...new Set(input.genreIds ?? [])];
    const artistIds = [...new Set(input.artistIds ?? [])];

    const genres = await this.catalogRepository.findGenresByIds(genreIds);
    if (genres.length !== genreIds.length) {
      throw new NotFoundException('존재하지 않는 장르가 포함되어 있습니다.');
    }
    const artists = await this.catalogRepository.findArtistsByIds(artistIds);
    if (artists.length !== artistIds.length) {
      throw new NotFoundException('존재하지 않는 배우가 포함되어 있습니다.');
    }

    const play = new Play();
    play.title = input.title;
    play.description = input.description;
    play.acts = input.acts ?? 1;
    play.genres = genres;
    play.artists = artists;

    const saved = await this.catalogRepository.savePlay(play);
    await this.cacheService.invalidate(CatalogService.CACHE_KEYS.PLAYS);
    return saved;
  }

  async listPlays(): Promise<Play[]> {
    return this.cacheService.getOrLoad(
      CatalogService.CACHE_KEYS.PLAYS,
      () => this.catalogRepository.findAllPlays(),
      CatalogService.LIST_CACHE_TTL_MS,
    );
  }

  async getPlay(playId: string): Promise<Play> {
    const play = await this.catalogRepository.findPlayWithRelations(playId);
    if (!play) {
      throw new NotFoundException('작품을 찾을 수 없습니다.');
    }
    return play;
  }
}
