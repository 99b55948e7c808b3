import http from "node:http";
import type { AddressInfo } from "node:net";
import { isRecord } from "@lectern/shared";
import type { CourseAnalytics, QueryResult } from "../RagSystem.js";
import type { RunLogger } from "../runtime/RunLogger.js";
import type { SessionManager } from "../session/SessionManager.js";

export const ROOT_MESSAGE = "Lectern course materials RAG system";

/** The slice of RagSystem the HTTP layer needs. */
export interface QueryBackend {
  readonly sessions: Pick<SessionManager, "createSession" | "clearSession">;
  query(query: string, sessionId?: string): Promise<QueryResult>;
  getCourseAnalytics(): Promise<CourseAnalytics>;
}

export interface ApiServerOptions {
  logger?: RunLogger;
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

type RouteHandler = (request: http.IncomingMessage, params: string[]) => Promise<unknown>;

interface Route {
  pattern: RegExp;
  handlers: Partial<Record<string, RouteHandler>>;
}

const readBody = async (request: http.IncomingMessage): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of request) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
};

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(422, "Request body must be valid JSON");
  }
};

const sendJson = (response: http.ServerResponse, status: number, payload: unknown): void => {
  response.statusCode = status;
  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(payload));
};

/** JSON API over node:http: query, course analytics and session reset. */
export class ApiServer {
  private server?: http.Server;
  private logger?: RunLogger;
  private routes: Route[];

  constructor(
    private backend: QueryBackend,
    options: ApiServerOptions = {},
  ) {
    this.logger = options.logger;
    this.routes = [
      { pattern: /^\/$/, handlers: { GET: async () => ({ message: ROOT_MESSAGE }) } },
      { pattern: /^\/api\/health$/, handlers: { GET: async () => ({ status: "ok" }) } },
      { pattern: /^\/api\/query$/, handlers: { POST: (request) => this.handleQuery(request) } },
      { pattern: /^\/api\/courses$/, handlers: { GET: () => this.handleCourses() } },
      {
        pattern: /^\/api\/sessions\/([^/]+)\/clear$/,
        handlers: { DELETE: async (_request, params) => this.handleClearSession(params[0]) },
      },
    ];
  }

  private async handleQuery(request: http.IncomingMessage): Promise<unknown> {
    const body = parseJson(await readBody(request));
    if (!isRecord(body) || typeof body.query !== "string") {
      throw new HttpError(422, "Field 'query' is required and must be a string");
    }
    if (body.session_id !== undefined && body.session_id !== null && typeof body.session_id !== "string") {
      throw new HttpError(422, "Field 'session_id' must be a string");
    }
    const sessionId =
      typeof body.session_id === "string" && body.session_id ? body.session_id : this.backend.sessions.createSession();
    const result = await this.backend.query(body.query, sessionId);
    return {
      answer: result.answer,
      sources: result.sources.map((source) => ({ text: source.text, link: source.link ?? null })),
      session_id: sessionId,
    };
  }

  private async handleCourses(): Promise<unknown> {
    const analytics = await this.backend.getCourseAnalytics();
    return {
      total_courses: analytics.totalCourses,
      course_titles: analytics.courseTitles,
    };
  }

  private handleClearSession(rawId: string): unknown {
    let sessionId: string;
    try {
      sessionId = decodeURIComponent(rawId);
    } catch (error) {
      if (error instanceof URIError) {
        throw new HttpError(400, "Session id is not valid percent-encoding");
      }
      throw error;
    }
    this.backend.sessions.clearSession(sessionId);
    return { message: `Session ${sessionId} cleared successfully` };
  }

  async handle(request: http.IncomingMessage, response: http.ServerResponse): Promise<void> {
    const method = request.method ?? "GET";
    const url = new URL(request.url ?? "/", "http://localhost");
    let status = 200;
    try {
      const route = this.routes.find((entry) => entry.pattern.test(url.pathname));
      if (!route) {
        throw new HttpError(404, "Not Found");
      }
      const handler = route.handlers[method];
      if (!handler) {
        throw new HttpError(405, "Method Not Allowed");
      }
      const params = route.pattern.exec(url.pathname)?.slice(1) ?? [];
      const payload = await handler(request, params);
      sendJson(response, status, payload);
    } catch (error) {
      if (error instanceof HttpError) {
        status = error.status;
        sendJson(response, status, { detail: error.message });
      } else {
        status = 500;
        const message = error instanceof Error ? error.message : String(error);
        await this.logger?.log("http_error", { method, path: url.pathname, error: message }, "error");
        sendJson(response, status, { detail: message });
      }
    }
    await this.logger?.log("http_request", { method, path: url.pathname, status }, "debug");
  }

  async listen(port: number, host = "127.0.0.1"): Promise<AddressInfo> {
    const server = http.createServer((request, response) => {
      this.handle(request, response).catch((error: unknown) => {
        if (!response.headersSent) {
          sendJson(response, 500, { detail: error instanceof Error ? error.message : String(error) });
        }
      });
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
      throw new Error("API server did not bind to a TCP address");
    }
    return address;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
