import { z } from "zod";

const optionalText = z.string().nullable().optional();

export const imageSchema = z.object({
  file_path: z.string(),
  iso_639_1: z.string().nullable().optional()
});

export const detailSchema = z.object({
  id: z.number(),
  title: z.string().optional(),
  name: z.string().optional(),
  original_title: z.string().optional(),
  original_name: z.string().optional(),
  poster_path: optionalText,
  backdrop_path: optionalText,
  overview: z.string().nullable().optional(),
  vote_average: z.number().optional(),
  release_date: optionalText,
  first_air_date: optionalText,
  last_air_date: optionalText,
  runtime: z.number().nullable().optional(),
  episode_run_time: z.array(z.number()).default([]),
  genres: z.array(z.object({ name: z.string() })).default([]),
  seasons: z.array(z.object({ season_number: z.number() })).default([]),
  credits: z.object({
    cast: z.array(z.object({ name: z.string() })).default([]),
    crew: z.array(z.object({ name: z.string(), job: z.string().optional() })).default([])
  }).optional(),
  images: z.object({
    posters: z.array(imageSchema).default([]),
    logos: z.array(imageSchema).default([])
  }).optional()
});

export const listSchema = z.object({
  results: z.array(z.object({
    id: z.number(),
    title: z.string().optional(),
    name: z.string().optional(),
    poster_path: optionalText,
    overview: z.string().nullable().optional(),
    vote_average: z.number().optional(),
    release_date: optionalText,
    first_air_date: optionalText,
    genre_ids: z.array(z.number()).default([])
  })).default([])
});

export const genreListSchema = z.object({
  genres: z.array(z.object({ id: z.number(), name: z.string() })).default([])
});

export const seasonSchema = z.object({
  episodes: z.array(z.object({
    episode_number: z.number(),
    name: z.string().optional(),
    overview: z.string().nullable().optional(),
    still_path: optionalText,
    air_date: optionalText
  })).default([])
});

export type TmdbImage = z.infer<typeof imageSchema>;
export type TmdbDetail = z.infer<typeof detailSchema>;
export type TmdbListItem = z.infer<typeof listSchema>["results"][number];
export type TmdbSeason = z.infer<typeof seasonSchema>;
