import { describe, expect, it } from "vitest";
import {
  composeDescription,
  composeName,
  rankStreams,
  sizeInMegabytes,
  sourceResolutionHeight,
  streamResolution,
  summarizeResolution
} from "../src/pipeline/ranking";
import type { MergedStream } from "../src/pipeline/types";

const stream = (overrides: Partial<MergedStream> & { address: string }): MergedStream => ({
  label: "1080p",
  originTitle: "Wicked",
  originSize: "1.0 GB",
  originDuration: "2:40:00",
  ...overrides
});

describe("presentation", () => {
  it("composes the display name", () => {
    expect(composeName("2160p")).toBe("Prehraj.to ⚡ 2160p");
  });

  it("composes the description with an optional source line", () => {
    expect(composeDescription(stream({ address: "a", originTitle: "Wicked 2024", originSize: "500 MB" }))).toBe(
      "📂 Wicked 2024\n💾 500 MB • ⏱️ 2:40:00"
    );
    expect(composeDescription(stream({ address: "a", sourceResolutionHint: "3840 x 2160 px" }))).toBe(
      "📂 Wicked\n💾 1.0 GB • ⏱️ 2:40:00\n⚙️ Source: 4K"
    );
  });

  it("summarizes known resolutions", () => {
    expect(summarizeResolution("3840 x 2160 px")).toBe("4K");
    expect(summarizeResolution("1920 x 1080 px")).toBe("1080p");
    expect(summarizeResolution("1280 x 720 px")).toBe("1280 x 720 px");
  });
});

describe("ranking keys", () => {
  it("reads the source height", () => {
    expect(sourceResolutionHeight("3840 x 2160 px")).toBe(2160);
    expect(sourceResolutionHeight("1920 x 1080 px")).toBe(1080);
    expect(sourceResolutionHeight("1280 x 720 px")).toBe(720);
    expect(sourceResolutionHeight("neznámé")).toBe(0);
    expect(sourceResolutionHeight(undefined)).toBe(0);
  });

  it("reads the stream height from the display name", () => {
    expect(streamResolution("Prehraj.to ⚡ 720p")).toBe(720);
    expect(streamResolution("Prehraj.to ⚡ Unknown")).toBe(0);
  });

  it("converts sizes to megabytes", () => {
    expect(sizeInMegabytes("1.5 GB")).toBe(1536);
    expect(sizeInMegabytes("700 MB")).toBe(700);
    expect(sizeInMegabytes("512 kB")).toBe(0.5);
    expect(sizeInMegabytes("")).toBe(0);
  });
});

describe("rankStreams", () => {
  it("puts source resolution ahead of size", () => {
    const ranked = rankStreams([
      stream({ address: "big-1080", sourceResolutionHint: "1920 x 1080 px", originSize: "5000 MB" }),
      stream({ address: "small-2160", sourceResolutionHint: "3840 x 2160 px", label: "2160p", originSize: "500 MB" })
    ], "2024");

    expect(ranked.map((entry) => entry.address)).toEqual(["small-2160", "big-1080"]);
    expect(ranked[0]?.name).toBe("Prehraj.to ⚡ 2160p");
  });

  it("breaks ties by stream height, size and year", () => {
    const ranked = rankStreams([
      stream({ address: "no-year", originSize: "1.0 GB" }),
      stream({ address: "with-year", originTitle: "Wicked 2024", originSize: "1.0 GB" }),
      stream({ address: "larger", originSize: "2.0 GB" }),
      stream({ address: "sd", label: "480p", originSize: "9.0 GB" })
    ], "2024");

    expect(ranked.map((entry) => entry.address)).toEqual(["larger", "with-year", "no-year", "sd"]);
  });

  it("keeps the input order of full ties", () => {
    const ranked = rankStreams([
      stream({ address: "first" }),
      stream({ address: "second" }),
      stream({ address: "third" })
    ], "");

    expect(ranked.map((entry) => entry.address)).toEqual(["first", "second", "third"]);
  });

  it("returns an empty list for no streams", () => {
    expect(rankStreams([], "2024")).toEqual([]);
  });
});
