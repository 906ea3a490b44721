import type { EpisodeRef, MediaType } from "./types";

export const ID_PREFIX = "sstmdb:";

const NUMERIC_ID_RE = /^\d+$/;
const POSITIVE_INT_RE = /^[1-9]\d*$/;

export interface ParsedContentId {
  tmdbId: string;
  episode?: EpisodeRef;
}

export const formatContentId = (tmdbId: number | string, episode?: EpisodeRef): string => {
  return episode
    ? `${ID_PREFIX}${tmdbId}:${episode.season}:${episode.episode}`
    : `${ID_PREFIX}${tmdbId}`;
};

/**
 * Accepts `sstmdb:<id>` and `sstmdb:<id>:<season>:<episode>` with season and
 * episode from 1; anything else is foreign.
 */
export const parseContentId = (value: string): ParsedContentId | null => {
  if (!value.startsWith(ID_PREFIX)) return null;
  const parts = value.slice(ID_PREFIX.length).split(":");
  const [tmdbId, season, episode] = parts;
  if (!tmdbId || !NUMERIC_ID_RE.test(tmdbId)) return null;
  if (parts.length === 1) return { tmdbId };
  if (parts.length !== 3 || !season || !episode || !POSITIVE_INT_RE.test(season) || !POSITIVE_INT_RE.test(episode)) {
    return null;
  }
  return { tmdbId, episode: { season: Number(season), episode: Number(episode) } };
};

export const isMediaType = (value: string): value is MediaType => value === "movie" || value === "series";
