import { createServer, type IncomingMessage, type ServerResponse } from "http";
import { createLogger, type Logger } from "../core/logging";
import type { AddonHandler, AddonResponse } from "./handlers";

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Headers": "*",
  "Access-Control-Allow-Methods": "GET, OPTIONS"
};

export class AddonServer {
  private running = false;
  private baseUrl: string | null = null;
  private port: number | null = null;
  private server: ReturnType<typeof createServer> | null = null;
  private readonly logger: Logger;

  constructor(private readonly handler: AddonHandler, logger?: Logger) {
    this.logger = logger ?? createLogger("addon-server");
  }

  async start(port = 8080, host = "0.0.0.0"): Promise<{ url: string; port: number }> {
    if (this.running && this.baseUrl && this.port !== null) {
      return { url: this.baseUrl, port: this.port };
    }

    const server = createServer((request, response) => {
      void this.handleRequest(request, response);
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Add-on server did not expose a port");
    }

    this.port = address.port;
    this.baseUrl = `http://${host === "0.0.0.0" ? "127.0.0.1" : host}:${address.port}`;
    this.running = true;
    this.logger.info("addon.listening", { data: { url: this.baseUrl } });
    return { url: this.baseUrl, port: address.port };
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.running = false;
    this.baseUrl = null;
    this.port = null;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  status(): { running: boolean; url?: string; port?: number } {
    return {
      running: this.running,
      ...(this.baseUrl ? { url: this.baseUrl } : {}),
      ...(this.port !== null ? { port: this.port } : {})
    };
  }

  private async handleRequest(request: IncomingMessage, response: ServerResponse): Promise<void> {
    const method = request.method ?? "GET";
    if (method === "OPTIONS") {
      response.writeHead(204, CORS_HEADERS);
      response.end();
      return;
    }

    let result: AddonResponse;
    try {
      result = await this.handler(method, request.url ?? "/");
    } catch (error) {
      this.logger.error("addon.request.failed", { data: { url: request.url ?? "", error } });
      result = { status: 500, body: { error: "Internal error" } };
    }

    response.writeHead(result.status, {
      ...CORS_HEADERS,
      "Content-Type": "application/json; charset=utf-8"
    });
    response.end(JSON.stringify(result.body));
  }
}
