import type { TitleContext } from "../pipeline/types";

export type MediaType = "movie" | "series";

export interface MetaPreview {
  id: string;
  type: MediaType;
  name: string;
  poster: string;
  logo?: string;
  description?: string;
  releaseInfo?: string;
  imdbRating?: string;
  genres?: string[];
  cast?: string[];
  director?: string[];
  runtime?: string;
}

export interface MetaVideo {
  id: string;
  title: string;
  released: string;
  thumbnail?: string;
  episode: number;
  season: number;
  overview?: string;
}

export interface Meta extends MetaPreview {
  background?: string;
  videos?: MetaVideo[];
}

export interface CatalogQuery {
  page: number;
  search?: string;
}

export interface EpisodeRef {
  season: number;
  episode: number;
}

export interface MetadataSource {
  getTitleContext(type: MediaType, tmdbId: string, episode?: EpisodeRef): Promise<TitleContext>;
  listCatalog(type: MediaType, query: CatalogQuery): Promise<MetaPreview[]>;
  getMeta(type: MediaType, tmdbId: string): Promise<Meta>;
}
