import { ArrayUnique, IsArray, IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class CreateGenreRequest {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;
}

export class GenreResponse {
  genreId!: string;
  name!: string;
}

export class CreateArtistRequest {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  firstName!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  lastName!: string;

  @IsOptional()
  @IsString()
  about?: string;
}

export class ArtistResponse {
  artistId!: string;
  firstName!: string;
  lastName!: string;
  fullName!: string;
  about!: string | null;
}

export class ArtistListItemResponse {
  artistId!: string;
  fullName!: string;
}

export class ArtistPlaySummary {
  playId!: string;
  title!: string;
}

export class ArtistDetailResponse {
  artistId!: string;
  firstName!: string;
  lastName!: string;
  about!: string | null;
  plays!: ArtistPlaySummary[];
}

export class CreatePlayRequest {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  title!: string;

  @IsString()
  description!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  acts?: number;

  @IsOptional()
  @IsArray()
  @ArrayUnique()
  @IsString({ each: true })
  genreIds?: string[];

  @IsOptional()
  @IsArray()
  @ArrayUnique()
  @IsString({ each: true })
  artistIds?: string[];
}

export class PlayResponse {
  playId!: string;
  title!: string;
  description!: string;
  acts!: number;
  genreIds!: string[];
  artistIds!: string[];
}

export class PlayListItemResponse {
  playId!: string;
  title!: string;
  genres!: string[];
  acts!: number;
}

export class PlayDetailResponse {
  playId!: string;
  title!: string;
  description!: string;
  acts!: number;
  genres!: GenreResponse[];
  artists!: string[];
}
