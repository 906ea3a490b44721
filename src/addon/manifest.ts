import { ID_PREFIX } from "../metadata/ids";
import type { MediaType } from "../metadata/types";

export type ManifestExtra = {
  name: "search" | "skip";
  isRequired?: boolean;
};

export type ManifestCatalog = {
  type: MediaType;
  id: string;
  name: string;
  extra: ManifestExtra[];
};

export type AddonManifest = {
  id: string;
  version: string;
  name: string;
  description: string;
  resources: string[];
  types: MediaType[];
  catalogs: ManifestCatalog[];
  idPrefixes: string[];
};

export const CATALOG_PAGE_SIZE = 20;

const catalogExtras: ManifestExtra[] = [
  { name: "search", isRequired: false },
  { name: "skip", isRequired: false }
];

export function createManifest(version: string): AddonManifest {
  return {
    id: "org.streamscout.addon",
    version,
    name: "StreamScout",
    description: "Ranked Prehraj.to streams for movies and series, with Czech metadata.",
    resources: ["catalog", "meta", "stream"],
    types: ["movie", "series"],
    catalogs: [
      { type: "movie", id: "streamscout-movies", name: "StreamScout Movies", extra: catalogExtras },
      { type: "series", id: "streamscout-series", name: "StreamScout Series", extra: catalogExtras }
    ],
    idPrefixes: [ID_PREFIX]
  };
}
