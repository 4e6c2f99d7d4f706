/**
 * REST front end.
 *
 * Routes:
 * - `GET /`, `GET /welcome`: welcome message
 * - `GET /health`: liveness with the current timestamp
 *
 * Every response is JSON and every request is logged as
 * `request_completed` once the response has been written.
 */

import { once } from "node:events";
import * as http from "node:http";
import { describeError } from "@loglane/errors";
import { getLogger, type LoggerHandle } from "@loglane/telemetry";
import { WELCOME_HINT, WELCOME_MESSAGE } from "../constants.js";
import type { AppInterface, InterfaceDeps, WelcomeBody } from "./types.js";

export interface HealthBody {
  readonly status: "healthy";
  readonly timestamp: string;
}

export interface ErrorBody {
  readonly error: string;
  readonly detail: string;
  readonly status_code: number;
}

export interface RestApiInterfaceOptions extends InterfaceDeps {
  /** Overrides `settings.restHost` */
  readonly host?: string | undefined;
  /** Overrides `settings.restPort`; 0 picks a free port */
  readonly port?: number | undefined;
  readonly now?: (() => Date) | undefined;
}

type Route = () => WelcomeBody | HealthBody;

function roundMs(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export class RestApiInterface implements AppInterface {
  readonly type = "restapi" as const;

  private readonly server: http.Server;
  private readonly host: string;
  private readonly port: number;
  private readonly logger: LoggerHandle;
  private readonly now: () => Date;
  private readonly routes: ReadonlyMap<string, Route>;

  constructor(options: RestApiInterfaceOptions) {
    this.host = options.host ?? options.settings.restHost;
    this.port = options.port ?? options.settings.restPort;
    this.logger = options.logger ?? getLogger("restapi");
    this.now = options.now ?? (() => new Date());

    const welcome: Route = () => ({
      message: WELCOME_MESSAGE,
      hint: WELCOME_HINT,
      interface: this.type,
    });
    const health: Route = () => ({ status: "healthy", timestamp: this.now().toISOString() });
    this.routes = new Map<string, Route>([
      ["/", welcome],
      ["/welcome", welcome],
      ["/health", health],
    ]);

    this.server = http.createServer((req, res) => {
      this.handleRequest(req, res);
    });
  }

  get listening(): boolean {
    return this.server.listening;
  }

  /** Bound address, once listening */
  address(): { host: string; port: number } | undefined {
    const address = this.server.address();
    if (address === null || typeof address === "string") return undefined;
    return { host: address.address, port: address.port };
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off("error", reject);
        resolve();
      });
    });
    this.logger.info("server_started", { host: this.host, port: this.address()?.port });
  }

  /**
   * Starts the server and resolves with exit code 0 once {@link stop}
   * has closed it.
   */
  async run(_argv: readonly string[] = []): Promise<number> {
    await this.start();
    await once(this.server, "close");
    return 0;
  }

  async stop(): Promise<void> {
    if (!this.server.listening) return;

    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      this.server.closeAllConnections();
    });
    this.logger.info("server_stopped");
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    const started = performance.now();
    const method = req.method ?? "GET";
    const target = req.url ?? "/";
    const parsed = URL.canParse(target, "http://localhost")
      ? new URL(target, "http://localhost")
      : undefined;
    const path = parsed?.pathname ?? target;

    res.on("finish", () => {
      this.logger.info("request_completed", {
        method,
        path,
        status: res.statusCode,
        duration_ms: roundMs(performance.now() - started),
      });
    });

    try {
      if (parsed === undefined) {
        this.sendError(res, 400, "Bad Request", "The request target is not a valid URL");
        return;
      }
      const route = this.routes.get(path);
      if (route === undefined) {
        this.sendError(res, 404, "Not Found", `No route for ${path}`);
        return;
      }
      if (method !== "GET" && method !== "HEAD") {
        res.setHeader("Allow", "GET, HEAD");
        this.sendError(res, 405, "Method Not Allowed", `${method} is not supported on ${path}`);
        return;
      }
      this.sendJson(res, 200, route());
    } catch (error) {
      this.logger.error("request_failed", { method, path, error: describeError(error) });
      if (!res.headersSent) {
        this.sendError(res, 500, "Internal Server Error", "The request could not be handled");
      } else if (!res.writableEnded) {
        res.end();
      }
    }
  }

  private sendError(res: http.ServerResponse, status: number, error: string, detail: string): void {
    const body: ErrorBody = { error, detail, status_code: status };
    this.sendJson(res, status, body);
  }

  private sendJson(res: http.ServerResponse, status: number, body: object): void {
    res.statusCode = status;
    res.setHeader("Content-Type", "application/json");
    res.end(JSON.stringify(body));
  }
}
