import { describe, expect, it } from "vitest";
import { extractStreams, findResolutionHint, findSourcesLiteral, parseSourceEntries } from "../src/pipeline/extract";

const detailPage = `
<html><body>
<ul class="video__info">
  <li><span>Velikost:</span><span>2.1 GB</span></li>
  <li><span>Rozlišení:</span>
      <span>3840 x 2160 px</span></li>
</ul>
<script>
  var sources = [
    {file: "https://cdn.example.test/v/2160.mp4", label: "2160p"},
    {file: 'https://cdn.example.test/v/1080.mp4', label: '1080p'},
    {file: "https://cdn.example.test/v/plain.mp4"}
  ];
</script>
</body></html>`;

describe("stream extraction", () => {
  it("reads every source with its label and the shared resolution hint", () => {
    expect(extractStreams(detailPage)).toEqual([
      { label: "2160p", address: "https://cdn.example.test/v/2160.mp4", sourceResolutionHint: "3840 x 2160 px" },
      { label: "1080p", address: "https://cdn.example.test/v/1080.mp4", sourceResolutionHint: "3840 x 2160 px" },
      { label: "Unknown", address: "https://cdn.example.test/v/plain.mp4", sourceResolutionHint: "3840 x 2160 px" }
    ]);
  });

  it("omits the hint when the page has no resolution marker", () => {
    const html = `<script>var sources = [{file: "https://cdn.example.test/a.mp4", label: "720p"}];</script>`;
    expect(extractStreams(html)).toEqual([{ label: "720p", address: "https://cdn.example.test/a.mp4" }]);
  });

  it("returns nothing without a sources array or usable entries", () => {
    expect(extractStreams("<html><body>Video nenalezeno</body></html>")).toEqual([]);
    expect(extractStreams(`<script>var sources = [{label: "720p"}];</script>`)).toEqual([]);
  });

  it("finds the sources literal", () => {
    expect(findSourcesLiteral(`x var sources = [{file: "a"}]; y`)).toBe(`[{file: "a"}]`);
    expect(findSourcesLiteral("var other = [];")).toBeNull();
  });

  it("skips segments without a file", () => {
    expect(parseSourceEntries(`[{label: "x"}, {file: "b.mp4", label: "480p"}]`)).toEqual([
      { file: "b.mp4", label: "480p" }
    ]);
  });

  it("ends a list item at the next one when its closing tag is left out", () => {
    const html = "<ul><li><span>Velikost:</span><span>2 GB</span><li><span>Rozlišení:</span><span>1920 x 1080 px</span></li></ul>";
    expect(findResolutionHint(html)).toBe("1920 x 1080 px");
    expect(findResolutionHint("<ul><li><span>Rozlišení:</span><span>1280 x 720 px</span></ul>")).toBe("1280 x 720 px");
  });

  it("falls back to the text after the marker", () => {
    expect(findResolutionHint("<ul><li><strong>Rozlišení:</strong> 1920x1080</li></ul>")).toBe("1920x1080");
    expect(findResolutionHint("<ul><li>Rozlišení:</li></ul>")).toBeUndefined();
    expect(findResolutionHint("<ul><li>Délka: 1:20:00</li></ul>")).toBeUndefined();
  });
});
