// HTTP server for the site: pages, contact form and the chat gateway.

import * as http from "http";
import { SiteConfig } from "./config";
import { HomeContent } from "./content/home";
import { CompletionClientCache } from "./gateway/client-cache";
import { CredentialSources } from "./gateway/credentials";
import {
  HttpResult,
  json,
  methodNotAllowed,
  readBody,
  writeResult,
} from "./http";
import { errorFields, log } from "./logger";
import { Mailer } from "./mail/mailer";
import { Provider } from "./providers";
import { TemplateRenderer } from "./render/templates";
import {
  ReplySource,
  handleChat,
  handleChatHealth,
  handleChatSend,
  handleChatStart,
} from "./routes/chat";
import { handleContactSubmit } from "./routes/contact";
import { handleAbout, handleHome } from "./routes/pages";
import { SessionStore } from "./session";

export interface SiteDeps {
  config: SiteConfig;
  provider: Provider;
  cache: CompletionClientCache;
  credentials: CredentialSources;
  replies: ReplySource;
  renderer: TemplateRenderer;
  homeContent: HomeContent;
  mailer: Mailer;
  sessions: SessionStore;
}

/** Transport-independent view of a request, so routing can run without a socket. */
export interface SiteRequest {
  method: string;
  url: string;
  cookie?: string;
  body(): Promise<string>;
}

const CHAT_PATHS = new Set(["/chat", "/chatbot-response/"]);

export class SiteServer {
  private server: http.Server | null = null;

  constructor(private readonly deps: SiteDeps) {}

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((err: unknown) => {
          log("error", "Unhandled error in request handler", {
            method: req.method,
            path: req.url,
            ...errorFields(err),
          });
          if (!res.headersSent) {
            writeResult(res, json(500, { error: "internal server error" }));
          }
        });
      });

      this.server.listen(this.deps.config.port, () => {
        log("info", `Site listening on port ${this.deps.config.port}`);
        resolve();
      });

      this.server.on("error", reject);
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => resolve());
      } else {
        resolve();
      }
    });
  }

  private async handleRequest(
    req: http.IncomingMessage,
    res: http.ServerResponse
  ): Promise<void> {
    const start = Date.now();
    const request: SiteRequest = {
      method: req.method || "GET",
      url: req.url || "/",
      cookie: req.headers.cookie,
      body: () => readBody(req),
    };

    const result = await this.dispatch(request);
    writeResult(res, result);

    log("info", "Request handled", {
      method: request.method,
      path: request.url,
      status: result.status,
      elapsed_ms: Date.now() - start,
    });
  }

  async dispatch(request: SiteRequest): Promise<HttpResult> {
    const { method } = request;
    const path = requestPath(request.url);
    if (path === null) {
      return json(400, { error: "bad request" });
    }
    const { deps } = this;

    if (path === "/") {
      if (method !== "GET") return methodNotAllowed(["GET"]);
      return handleHome(deps.renderer, deps.homeContent);
    }
    if (path === "/about/") {
      if (method !== "GET") return methodNotAllowed(["GET"]);
      return handleAbout(deps.renderer);
    }
    if (path === "/contact/submit/") {
      const body = method === "POST" ? await request.body() : "";
      return handleContactSubmit(method, body, {
        mailer: deps.mailer,
        renderer: deps.renderer,
        mail: deps.config.mail,
      });
    }
    if (CHAT_PATHS.has(path)) {
      if (method !== "POST") return methodNotAllowed(["POST"]);
      return handleChat(await request.body(), deps.replies);
    }
    if (path === "/chat/health") {
      if (method !== "GET") return methodNotAllowed(["GET"]);
      return handleChatHealth({
        provider: deps.provider,
        cache: deps.cache,
        credentials: deps.credentials,
        debug: deps.config.debug,
      });
    }
    if (path === "/chat/start") {
      if (method !== "POST") return methodNotAllowed(["POST"]);
      const session = deps.sessions.resolve(request.cookie);
      const result = handleChatStart(session);
      if (session.isNew) {
        result.headers["Set-Cookie"] = deps.sessions.cookieFor(session);
      }
      return result;
    }
    if (path === "/chat/send") {
      if (method !== "POST") return methodNotAllowed(["POST"]);
      return handleChatSend(await request.body(), deps.replies);
    }

    return json(404, { error: "not found" });
  }
}

function requestPath(target: string): string | null {
  try {
    return new URL(target, "http://localhost").pathname;
  } catch {
    return null;
  }
}
