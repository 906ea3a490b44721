import type { StreamScoutConfig } from "../config";
import type { MetadataSource } from "../metadata/types";
import type { DetailsCollaborator, RankedStream, SearchCollaborator, TitleContext } from "../pipeline/types";

export type CoreOptions = {
  config: StreamScoutConfig;
  search?: SearchCollaborator & { close?: () => Promise<void> };
  details?: DetailsCollaborator;
  metadata?: MetadataSource | null;
};

export type StreamScoutCore = {
  config: StreamScoutConfig;
  search: SearchCollaborator;
  details: DetailsCollaborator;
  metadata: MetadataSource | null;
  findStreams: (context: TitleContext, requestId?: string) => Promise<RankedStream[]>;
  cleanup: () => Promise<void>;
};
