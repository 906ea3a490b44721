import { UpstreamError } from "../pipeline/errors";
import { extractStreams } from "../pipeline/extract";
import type { DetailsCollaborator, StreamDescriptor } from "../pipeline/types";
import { fetchPage } from "./fetch-page";

export interface DetailsClientOptions {
  timeoutMs: number;
}

export const createDetailsClient = (options: DetailsClientOptions): DetailsCollaborator => {
  return {
    async fetchDetails(address: string): Promise<StreamDescriptor[]> {
      const html = await fetchPage(address, { source: "details", timeoutMs: options.timeoutMs });
      const streams = extractStreams(html);
      if (streams.length === 0) {
        throw new UpstreamError("no_sources", `No playable sources found at ${address}`, {
          source: "details",
          retryable: false,
          details: { url: address }
        });
      }
      return streams;
    }
  };
};
