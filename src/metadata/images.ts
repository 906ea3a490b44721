import type { TmdbImage } from "./schemas";

export const IMAGE_BASE_URL = "https://image.tmdb.org/t/p";

// `null` stands for textless artwork, which TMDB reports as null, "" or "null".
export type ImageLanguage = string | null;

const matchesLanguage = (image: TmdbImage, language: ImageLanguage): boolean => {
  if (language === null) {
    return image.iso_639_1 === null || image.iso_639_1 === undefined || image.iso_639_1 === "" || image.iso_639_1 === "null";
  }
  return image.iso_639_1 === language;
};

export const pickImagePath = (
  images: readonly TmdbImage[],
  preference: readonly ImageLanguage[],
  fallbackToFirst = false
): string | undefined => {
  for (const language of preference) {
    const match = images.find((image) => matchesLanguage(image, language));
    if (match) return match.file_path;
  }
  return fallbackToFirst ? images[0]?.file_path : undefined;
};

export const POSTER_LANGUAGES: readonly ImageLanguage[] = ["cs", "sk"];
export const LOGO_LANGUAGES: readonly ImageLanguage[] = ["cs", "sk", "en", null];

export const imageUrl = (filePath: string | null | undefined, size: "w500" | "original" = "w500"): string => {
  return filePath ? `${IMAGE_BASE_URL}/${size}${filePath}` : "";
};
