// Transport helpers: handlers build an HttpResult, the server writes it.

import * as http from "http";

export interface HttpResult {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export function json(status: number, payload: unknown): HttpResult {
  return {
    status,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
  };
}

export function text(status: number, body: string): HttpResult {
  return {
    status,
    headers: { "Content-Type": "text/plain; charset=utf-8" },
    body,
  };
}

export function html(body: string): HttpResult {
  return {
    status: 200,
    headers: { "Content-Type": "text/html; charset=utf-8" },
    body,
  };
}

export function redirect(location: string): HttpResult {
  return { status: 303, headers: { Location: location }, body: "" };
}

export function methodNotAllowed(allowed: string[]): HttpResult {
  return {
    status: 405,
    headers: { Allow: allowed.join(", "), "Content-Type": "application/json" },
    body: JSON.stringify({ error: "method not allowed" }),
  };
}

export function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

export function writeResult(res: http.ServerResponse, result: HttpResult): void {
  res.writeHead(result.status, result.headers);
  res.end(result.body);
}

/** Parse a Cookie header into name/value pairs. Malformed pairs are skipped. */
export function parseCookies(header: string | undefined): Map<string, string> {
  const cookies = new Map<string, string>();
  if (!header) return cookies;

  for (const part of header.split(";")) {
    const eq = part.indexOf("=");
    if (eq <= 0) continue;
    const name = part.slice(0, eq).trim();
    const raw = part.slice(eq + 1).trim();
    try {
      cookies.set(name, decodeURIComponent(raw));
    } catch {
      // Not percent-decodable; keep the raw value.
      cookies.set(name, raw);
    }
  }
  return cookies;
}
