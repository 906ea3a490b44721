import type { z } from "zod";
import { createLogger, type Logger } from "../core/logging";
import { errorFromStatus, toUpstreamError, UpstreamError } from "../pipeline/errors";
import { runBounded } from "../pipeline/executor";
import type { TitleContext } from "../pipeline/types";
import { formatContentId } from "./ids";
import { imageUrl, LOGO_LANGUAGES, pickImagePath, POSTER_LANGUAGES } from "./images";
import {
  detailSchema,
  genreListSchema,
  listSchema,
  seasonSchema,
  type TmdbDetail,
  type TmdbListItem
} from "./schemas";
import type { CatalogQuery, EpisodeRef, MediaType, Meta, MetadataSource, MetaPreview, MetaVideo } from "./types";

export interface TmdbClientOptions {
  apiKey: string;
  language: string;
  timeoutMs: number;
  concurrency: number;
  baseUrl?: string;
  logger?: Logger;
}

type QueryParams = Record<string, string | number | boolean>;

const DEFAULT_BASE_URL = "https://api.themoviedb.org/3";
const PREVIEW_CAST_LIMIT = 3;
const META_CAST_LIMIT = 10;
const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;

const tmdbType = (type: MediaType): "movie" | "tv" => (type === "series" ? "tv" : "movie");

const yearOf = (date: string | null | undefined): string => {
  return date && date.length >= 4 ? date.slice(0, 4) : "";
};

const displayTitle = (type: MediaType, item: { title?: string; name?: string }): string => {
  return (type === "series" ? item.name : item.title) ?? "";
};

const runtimeOf = (type: MediaType, detail: TmdbDetail): string | undefined => {
  if (type === "movie") {
    return detail.runtime && detail.runtime > 0 ? `${detail.runtime} min` : undefined;
  }
  const first = detail.episode_run_time[0];
  return typeof first === "number" ? `${first} min` : undefined;
};

const directorsOf = (detail: TmdbDetail): string[] => {
  return (detail.credits?.crew ?? [])
    .filter((member) => member.job === "Director")
    .map((member) => member.name);
};

const castOf = (detail: TmdbDetail, limit: number): string[] => {
  return (detail.credits?.cast ?? []).slice(0, limit).map((member) => member.name);
};

const releaseInfoOf = (type: MediaType, detail: TmdbDetail): string => {
  if (type === "movie") {
    return yearOf(detail.release_date);
  }
  const start = yearOf(detail.first_air_date);
  const end = yearOf(detail.last_air_date);
  if (!start) return "";
  return end && end !== start ? `${start}-${end}` : `${start}-`;
};

const toReleased = (airDate: string | null | undefined): string => {
  if (!airDate) return "";
  return DATE_ONLY_RE.test(airDate) ? `${airDate}T00:00:00Z` : airDate;
};

const nonEmpty = <T>(values: T[]): T[] | undefined => (values.length > 0 ? values : undefined);

export class TmdbClient implements MetadataSource {
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private genres: Promise<Map<number, string>> | null = null;

  constructor(private readonly options: TmdbClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.logger = options.logger ?? createLogger("tmdb");
  }

  async getTitleContext(type: MediaType, tmdbId: string, episode?: EpisodeRef): Promise<TitleContext> {
    const detail = await this.request(`/${tmdbType(type)}/${tmdbId}`, {}, detailSchema);
    const name = displayTitle(type, detail);
    const originalName = (type === "series" ? detail.original_name : detail.original_title) ?? "";
    const year = yearOf(type === "series" ? detail.first_air_date : detail.release_date);
    return {
      name,
      originalName,
      year,
      ...(episode ? { season: episode.season, episode: episode.episode } : {})
    };
  }

  async listCatalog(type: MediaType, query: CatalogQuery): Promise<MetaPreview[]> {
    const kind = tmdbType(type);
    const search = query.search?.trim();
    const list = search
      ? await this.request(`/search/${kind}`, { query: search, page: query.page, include_adult: false }, listSchema)
      : await this.request(`/discover/${kind}`, { sort_by: "popularity.desc", include_adult: false, page: query.page }, listSchema);
    const genres = await this.loadGenres();

    const run = await runBounded<TmdbListItem, MetaPreview>({
      items: list.results,
      concurrency: this.options.concurrency,
      operation: async (item) => [await this.enrichPreview(type, item, genres)]
    });
    return run.results;
  }

  async getMeta(type: MediaType, tmdbId: string): Promise<Meta> {
    const detail = await this.request(`/${tmdbType(type)}/${tmdbId}`, {
      append_to_response: "credits,images",
      include_image_language: "cs,sk,en,null"
    }, detailSchema);

    const posters = detail.images?.posters ?? [];
    const logos = detail.images?.logos ?? [];
    const background = imageUrl(detail.backdrop_path, "original");
    const logo = imageUrl(pickImagePath(logos, LOGO_LANGUAGES, true));
    const runtime = runtimeOf(type, detail);
    const releaseInfo = releaseInfoOf(type, detail);
    const videos = type === "series" ? await this.listEpisodes(tmdbId, detail, background) : [];

    return {
      id: formatContentId(tmdbId),
      type,
      name: displayTitle(type, detail),
      poster: imageUrl(pickImagePath(posters, POSTER_LANGUAGES) ?? detail.poster_path),
      ...(logo ? { logo } : {}),
      ...(background ? { background } : {}),
      ...(detail.overview ? { description: detail.overview } : {}),
      ...(releaseInfo ? { releaseInfo } : {}),
      imdbRating: (detail.vote_average ?? 0).toFixed(1),
      genres: nonEmpty(detail.genres.map((genre) => genre.name)),
      cast: nonEmpty(castOf(detail, META_CAST_LIMIT)),
      director: nonEmpty(directorsOf(detail)),
      ...(runtime ? { runtime } : {}),
      ...(videos.length > 0 ? { videos } : {})
    };
  }

  private async enrichPreview(type: MediaType, item: TmdbListItem, genres: Map<number, string>): Promise<MetaPreview> {
    const releaseDate = type === "series" ? item.first_air_date : item.release_date;
    const year = yearOf(releaseDate);
    const base: MetaPreview = {
      id: formatContentId(item.id),
      type,
      name: displayTitle(type, item),
      poster: imageUrl(item.poster_path),
      ...(item.overview ? { description: item.overview } : {}),
      genres: nonEmpty(item.genre_ids.flatMap((id) => genres.get(id) ?? [])),
      ...(year ? { releaseInfo: type === "series" ? `${year}-` : year } : {}),
      imdbRating: (item.vote_average ?? 0).toFixed(1)
    };

    let detail: TmdbDetail;
    try {
      detail = await this.request(`/${tmdbType(type)}/${item.id}`, {
        append_to_response: "credits,images",
        include_image_language: "cs,sk,en,null"
      }, detailSchema);
    } catch (error) {
      const failure = toUpstreamError(error, { source: "metadata" });
      this.logger.warn("tmdb.preview.detail_failed", { data: { id: item.id, code: failure.code } });
      return base;
    }

    const posterPath = pickImagePath(detail.images?.posters ?? [], POSTER_LANGUAGES);
    const logo = imageUrl(pickImagePath(detail.images?.logos ?? [], LOGO_LANGUAGES, true));
    const runtime = runtimeOf(type, detail);
    return {
      ...base,
      ...(posterPath ? { poster: imageUrl(posterPath) } : {}),
      ...(logo ? { logo } : {}),
      ...(runtime ? { runtime } : {}),
      cast: nonEmpty(castOf(detail, PREVIEW_CAST_LIMIT)),
      director: nonEmpty(directorsOf(detail))
    };
  }

  private async listEpisodes(tmdbId: string, detail: TmdbDetail, background: string): Promise<MetaVideo[]> {
    // Season 0 holds specials, which the stream search cannot match.
    const seasons = detail.seasons
      .map((season) => season.season_number)
      .filter((season) => season > 0);

    const run = await runBounded<number, MetaVideo>({
      items: seasons,
      concurrency: this.options.concurrency,
      operation: async (seasonNumber) => {
        const season = await this.request(`/tv/${tmdbId}/season/${seasonNumber}`, {}, seasonSchema);
        return season.episodes.map((episode): MetaVideo => {
          const thumbnail = imageUrl(episode.still_path) || background;
          return {
            id: formatContentId(tmdbId, { season: seasonNumber, episode: episode.episode_number }),
            title: episode.name ?? "",
            released: toReleased(episode.air_date),
            ...(thumbnail ? { thumbnail } : {}),
            episode: episode.episode_number,
            season: seasonNumber,
            ...(episode.overview ? { overview: episode.overview } : {})
          };
        });
      },
      onFailure: (seasonNumber, error) => {
        const failure = toUpstreamError(error, { source: "metadata" });
        this.logger.warn("tmdb.season_failed", { data: { id: tmdbId, season: seasonNumber, code: failure.code } });
      }
    });

    return run.results.sort((left, right) => left.season - right.season || left.episode - right.episode);
  }

  private loadGenres(): Promise<Map<number, string>> {
    if (!this.genres) {
      this.genres = this.fetchGenres();
    }
    return this.genres;
  }

  private async fetchGenres(): Promise<Map<number, string>> {
    const genres = new Map<number, string>();
    for (const kind of ["movie", "tv"] as const) {
      try {
        const list = await this.request(`/genre/${kind}/list`, {}, genreListSchema);
        for (const genre of list.genres) {
          genres.set(genre.id, genre.name);
        }
      } catch (error) {
        const failure = toUpstreamError(error, { source: "metadata" });
        this.logger.warn("tmdb.genres_failed", { data: { kind, code: failure.code } });
      }
    }
    this.logger.info("tmdb.genres_loaded", { data: { count: genres.size } });
    return genres;
  }

  private async request<T>(path: string, params: QueryParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = new URL(`${this.baseUrl}${path}`);
    url.searchParams.set("api_key", this.options.apiKey);
    url.searchParams.set("language", this.options.language);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { accept: "application/json" },
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
    } catch (error) {
      throw toUpstreamError(error, { source: "metadata", defaultCode: "network" });
    }

    const statusError = errorFromStatus(response.status, path, "metadata");
    if (statusError) {
      throw statusError;
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError("upstream", `Unexpected TMDB response for ${path}`, {
        source: "metadata",
        retryable: false,
        details: { issues: parsed.error.issues.length }
      });
    }
    return parsed.data;
  }
}
