import type { Candidate, MergedStream, RankedStream, StreamDescriptor } from "./types";

export const SITE_LABEL = "Prehraj.to";
export const LABEL_MARKER = "⚡";

const STREAM_RESOLUTION_RE = /⚡\s+(\d{3,4})p/;
const RAW_HEIGHT_RE = /.*x\s*(\d+)/;
const SIZE_RE = /^\s*(\d+(?:\.\d+)?)\s*(GB|MB|kB)/;

export const mergeWithCandidate = (stream: StreamDescriptor, candidate: Candidate): MergedStream => ({
  ...stream,
  originTitle: candidate.title,
  originSize: candidate.size,
  originDuration: candidate.duration
});

/** "3840 x 2160 px" reads as 4K, "1920 x 1080 px" as 1080p; anything else is shown as scraped. */
export const summarizeResolution = (hint: string): string => {
  if (hint.includes("3840") || hint.includes("2160")) return "4K";
  if (hint.includes("1920") || hint.includes("1080")) return "1080p";
  return hint;
};

export const composeName = (label: string): string => `${SITE_LABEL} ${LABEL_MARKER} ${label}`;

export const composeDescription = (stream: MergedStream): string => {
  const lines = [
    `📂 ${stream.originTitle}`,
    `💾 ${stream.originSize} • ⏱️ ${stream.originDuration}`
  ];
  if (stream.sourceResolutionHint) {
    lines.push(`⚙️ Source: ${summarizeResolution(stream.sourceResolutionHint)}`);
  }
  return lines.join("\n");
};

export const sourceResolutionHeight = (hint: string | undefined): number => {
  if (!hint) return 0;
  const summary = summarizeResolution(hint);
  if (summary.startsWith("4K")) return 2160;
  if (summary.startsWith("1080p")) return 1080;
  const match = RAW_HEIGHT_RE.exec(summary);
  return match?.[1] ? Number(match[1]) : 0;
};

export const streamResolution = (name: string): number => {
  const match = STREAM_RESOLUTION_RE.exec(name);
  return match?.[1] ? Number(match[1]) : 0;
};

export const sizeInMegabytes = (size: string): number => {
  const match = SIZE_RE.exec(size);
  if (!match?.[1]) return 0;
  const value = Number(match[1]);
  switch (match[2]) {
    case "GB":
      return value * 1024;
    case "kB":
      return value / 1024;
    default:
      return value;
  }
};

interface RankingEntry {
  stream: RankedStream;
  sourceHeight: number;
  streamHeight: number;
  sizeMb: number;
  hasYear: boolean;
}

const compareEntries = (left: RankingEntry, right: RankingEntry): number => {
  if (left.sourceHeight !== right.sourceHeight) {
    return right.sourceHeight - left.sourceHeight;
  }
  if (left.streamHeight !== right.streamHeight) {
    return right.streamHeight - left.streamHeight;
  }
  if (left.sizeMb !== right.sizeMb) {
    return right.sizeMb - left.sizeMb;
  }
  if (left.hasYear !== right.hasYear) {
    return left.hasYear ? -1 : 1;
  }
  return 0;
};

/**
 * Orders merged streams by source resolution, stream resolution, size and
 * whether the description mentions the target year, all descending.
 * Full ties keep their input order.
 */
export const rankStreams = (streams: readonly MergedStream[], targetYear: string): RankedStream[] => {
  const entries = streams.map((stream): RankingEntry => {
    const ranked: RankedStream = {
      name: composeName(stream.label),
      description: composeDescription(stream),
      address: stream.address
    };
    return {
      stream: ranked,
      sourceHeight: sourceResolutionHeight(stream.sourceResolutionHint),
      streamHeight: streamResolution(ranked.name),
      sizeMb: sizeInMegabytes(stream.originSize),
      hasYear: ranked.description.includes(targetYear)
    };
  });

  return entries
    .sort(compareEntries)
    .map((entry) => entry.stream);
};
