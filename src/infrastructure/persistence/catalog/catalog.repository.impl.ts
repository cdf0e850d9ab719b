import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { CatalogRepository } from '../../../catalog/catalog.repository';
import { Genre } from '../../../catalog/domain/genre.entity';
import { Artist } from '../../../catalog/domain/artist.entity';
import { Play } from '../../../catalog/domain/play.entity';
import { UniqueConstraintError } from '../../../common/errors/storage.errors';
import { classifyStorageError, translateStorageError } from '../storage-error.classifier';

@Injectable()
export class CatalogRepositoryImpl implements CatalogRepository {
  constructor(
    @InjectRepository(Genre)
    private readonly genreRepo: Repository<Genre>,
    @InjectRepository(Artist)
    private readonly artistRepo: Repository<Artist>,
    @InjectRepository(Play)
    private readonly playRepo: Repository<Play>,
  ) {}

  async saveGenre(genre: Genre): Promise<Genre> {
    try {
      return await this.genreRepo.save(genre);
    } catch (error) {
      if (classifyStorageError(error) === 'unique-violation') {
        throw new UniqueConstraintError('genre.name');
      }
      throw translateStorageError(error);
    }
  }

  async findAllGenres(): Promise<Genre[]> {
    return this.genreRepo.find({ order: { name: 'ASC' } });
  }

  async findGenresByIds(genreIds: string[]): Promise<Genre[]> {
    if (genreIds.length === 0) return [];
    return this.genreRepo.find({ where: { genreId: In(genreIds) } });
  }

  async saveArtist(artist: Artist): Promise<Artist> {
    return this.artistRepo.save(artist);
  }

  async findAllArtists(): Promise<Artist[]> {
    return this.artistRepo.find({ order: { lastName: 'ASC', firstName: 'ASC' } });
  }

  async findArtistsByIds(artistIds: string[]): Promise<Artist[]> {
    if (artistIds.length === 0) return [];
    return this.artistRepo.find({ where: { artistId: In(artistIds) } });
  }

  async findArtistWithPlays(artistId: string): Promise<Artist | null> {
    return this.artistRepo.findOne({
      where: { artistId },
      relations: { plays: true },
      order: { plays: { title: 'ASC' } },
    });
  }

  async savePlay(play: Play): Promise<Play> {
    return this.playRepo.save(play);
  }

  async findAllPlays(): Promise<Play[]> {
    return this.playRepo.find({
      relations: { genres: true },
      order: { title: 'ASC' },
    });
  }

  async findPlayById(playId: string): Promise<Play | null> {
    return this.playRepo.findOne({ where: { playId } });
  }

  async findPlayWithRelations(playId: string): Promise<Play | null> {
    return this.playRepo.findOne({
      where: { playId },
      relations: { genres: true, artists: true },
    });
  }
}
