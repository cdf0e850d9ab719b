import { Controller, Get, Post, Body, Param } from '@nestjs/common';
import { CatalogService } from '../../catalog/catalog.service';
import {
  ArtistDetailResponse,
  ArtistListItemResponse,
  ArtistResponse,
  CreateArtistRequest,
  CreateGenreRequest,
  CreatePlayRequest,
  GenreResponse,
  PlayDetailResponse,
  PlayListItemResponse,
  PlayResponse,
} from '../dto/catalog.dto';
import { artistPresenters, playPresenters, presentGenre } from '../presenters/catalog.presenter';

@Controller('api')
export class CatalogController {
  constructor(private readonly catalogService: CatalogService) {}

  @Get('genres')
  async listGenres(): Promise<{ genres: GenreResponse[] }> {
    const genres = await this.catalogService.listGenres();
    return { genres: genres.map(presentGenre) };
  }

  @Post('genres')
  async createGenre(@Body() body: CreateGenreRequest): Promise<GenreResponse> {
    return presentGenre(await this.catalogService.createGenre(body.name));
  }

  @Get('artists')
  async listArtists(): Promise<{ artists: ArtistListItemResponse[] }> {
    const artists = await this.catalogService.listArtists();
    return { artists: artists.map(artistPresenters.list) };
  }

  @Get('artists/:artistId')
  async getArtist(@Param('artistId') artistId: string): Promise<ArtistDetailResponse> {
    return artistPresenters.detail(await this.catalogService.getArtist(artistId));
  }

  @Post('artists')
  async createArtist(@Body() body: CreateArtistRequest): Promise<ArtistResponse> {
    const artist = await this.catalogService.createArtist({
      firstName: body.firstName,
      lastName: body.lastName,
      about: body.about,
    });
    return artistPresenters.write(artist);
  }

  @Get('plays')
  async listPlays(): Promise<{ plays: PlayListItemResponse[] }> {
    const plays = await this.catalogService.listPlays();
    return { plays: plays.map(playPresenters.list) };
  }

  @Get('plays/:playId')
  async getPlay(@Param('playId') playId: string): Promise<PlayDetailResponse> {
    return playPresenters.detail(await this.catalogService.getPlay(playId));
  }

  @Post('plays')
  async createPlay(@Body() body: CreatePlayRequest): Promise<PlayResponse> {
    const play = await this.catalogService.createPlay({
      title: body.title,
      description: body.description,
      acts: body.acts,
      genreIds: body.genreIds,
      artistIds: body.artistIds,
    });
    return playPresenters.write(play);
  }
}
