import { createLogger, createRequestId, type Logger } from "../core/logging";
import { toUpstreamError } from "../pipeline/errors";
import type { RankedStream, TitleContext } from "../pipeline/types";
import { isMediaType, parseContentId } from "../metadata/ids";
import type { MediaType, Meta, MetadataSource, MetaPreview } from "../metadata/types";
import { CATALOG_PAGE_SIZE, createManifest, type AddonManifest } from "./manifest";

export type AddonStream = {
  name: string;
  title: string;
  url: string;
};

export type AddonResponse = {
  status: number;
  body:
    | AddonManifest
    | { metas: MetaPreview[] }
    | { meta: Meta | null }
    | { streams: AddonStream[] }
    | { error: string };
};

export type AddonDeps = {
  version: string;
  metadata: MetadataSource | null;
  findStreams: (context: TitleContext, requestId: string) => Promise<RankedStream[]>;
  logger?: Logger;
};

export type AddonHandler = (method: string, rawUrl: string) => Promise<AddonResponse>;

const JSON_SUFFIX = ".json";

const notFound = (): AddonResponse => ({ status: 404, body: { error: "Not found" } });

const decodeSegment = (segment: string): string | null => {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
};

/** Splits `/resource/type/id[/extra].json` into decoded segments, or null when the path has another shape. */
export function parseRoute(pathname: string): string[] | null {
  if (!pathname.endsWith(JSON_SUFFIX)) return null;
  const segments = pathname.slice(1, -JSON_SUFFIX.length).split("/");
  const decoded: string[] = [];
  for (const segment of segments) {
    const value = decodeSegment(segment);
    if (value === null || value === "") return null;
    decoded.push(value);
  }
  return decoded;
}

export function parseCatalogExtra(extra: string | undefined): { page: number; search?: string } {
  if (!extra) return { page: 1 };
  const params = new URLSearchParams(extra);
  const skip = Number(params.get("skip") ?? "0");
  const page = Number.isFinite(skip) && skip > 0 ? Math.floor(skip / CATALOG_PAGE_SIZE) + 1 : 1;
  const search = params.get("search")?.trim();
  return search ? { page, search } : { page };
}

export const toAddonStream = (stream: RankedStream): AddonStream => ({
  name: stream.name,
  title: stream.description,
  url: stream.address
});

export function createAddonHandler(deps: AddonDeps): AddonHandler {
  const logger = deps.logger ?? createLogger("addon");
  const manifest = createManifest(deps.version);

  const handleCatalog = async (type: MediaType, extra: string | undefined): Promise<AddonResponse> => {
    if (!deps.metadata) return { status: 200, body: { metas: [] } };
    const query = parseCatalogExtra(extra);
    try {
      const metas = await deps.metadata.listCatalog(type, query);
      return { status: 200, body: { metas } };
    } catch (error) {
      const failure = toUpstreamError(error, { source: "metadata" });
      logger.warn("addon.catalog.failed", { data: { type, code: failure.code, message: failure.message } });
      return { status: 200, body: { metas: [] } };
    }
  };

  const handleMeta = async (type: MediaType, id: string): Promise<AddonResponse> => {
    const parsed = parseContentId(id);
    if (!parsed || !deps.metadata) return { status: 200, body: { meta: null } };
    try {
      const meta = await deps.metadata.getMeta(type, parsed.tmdbId);
      return { status: 200, body: { meta } };
    } catch (error) {
      const failure = toUpstreamError(error, { source: "metadata" });
      logger.warn("addon.meta.failed", { data: { id, code: failure.code, message: failure.message } });
      return { status: 200, body: { meta: null } };
    }
  };

  const handleStream = async (type: MediaType, id: string): Promise<AddonResponse> => {
    const parsed = parseContentId(id);
    if (!parsed || !deps.metadata) return { status: 200, body: { streams: [] } };
    const requestId = createRequestId();

    let context: TitleContext;
    try {
      context = await deps.metadata.getTitleContext(type, parsed.tmdbId, parsed.episode);
    } catch (error) {
      const failure = toUpstreamError(error, { source: "metadata" });
      logger.warn("addon.stream.context_failed", { requestId, data: { id, code: failure.code, message: failure.message } });
      return { status: 200, body: { streams: [] } };
    }

    logger.info("addon.stream.request", { requestId, data: { id, name: context.name, year: context.year } });
    const streams = await deps.findStreams(context, requestId);
    return { status: 200, body: { streams: streams.map(toAddonStream) } };
  };

  return async (method, rawUrl) => {
    if (method !== "GET") return notFound();
    const { pathname } = new URL(rawUrl, "http://localhost");
    if (pathname === "/manifest.json") {
      return { status: 200, body: manifest };
    }

    const segments = parseRoute(pathname);
    if (!segments) return notFound();
    const [resource, type, id, extra, ...rest] = segments;
    if (!resource || !type || !id || rest.length > 0 || !isMediaType(type)) return notFound();

    if (resource === "catalog") return handleCatalog(type, extra);
    if (extra !== undefined) return notFound();
    if (resource === "meta") return handleMeta(type, id);
    if (resource === "stream") return handleStream(type, id);
    return notFound();
  };
}
