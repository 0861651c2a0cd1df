import { randomUUID } from "node:crypto";
import type { IncomingHttpHeaders, IncomingMessage, RequestListener, ServerResponse } from "node:http";
import type { HttpMethod, HttpRequest, HttpResponse, Logger } from "@scopebound/types";
import { MethodNotAllowedException } from "../errors/http-exception";
import { toErrorResponse } from "../handlers/pipeline";

const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
];

export type RequestHandler = {
  handle(request: HttpRequest): Promise<HttpResponse>;
};

export type RawRequestParts = {
  method: string | undefined;
  url: string | undefined;
  headers: IncomingHttpHeaders;
  body: string | null;
  remoteAddress: string | null;
};

function decodeCookieValue(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Not percent-encoded after all; keep what the client sent.
    return value;
  }
}

export function parseCookies(header: string | undefined): Record<string, string> {
  const cookies: Record<string, string> = {};
  if (!header) return cookies;

  for (const pair of header.split(";")) {
    const separator = pair.indexOf("=");
    if (separator === -1) continue;
    const name = pair.slice(0, separator).trim();
    if (name) cookies[name] = decodeCookieValue(pair.slice(separator + 1).trim());
  }
  return cookies;
}

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) result[name] = value;
  }
  return result;
}

function firstHeader(value: string | string[] | undefined): string | null {
  if (value === undefined) return null;
  return Array.isArray(value) ? (value[0] ?? null) : value;
}

/** Maps the raw parts of a Node request to the host's {@link HttpRequest}. */
export function buildHttpRequest(parts: RawRequestParts): HttpRequest {
  const method = HTTP_METHODS.find((candidate) => candidate === parts.method?.toUpperCase());
  if (!method) {
    throw new MethodNotAllowedException(`Method ${parts.method ?? "(none)"} is not supported`);
  }

  const url = new URL(parts.url ?? "/", "http://localhost");
  const query: Record<string, string | string[]> = {};
  for (const key of new Set(url.searchParams.keys())) {
    const values = url.searchParams.getAll(key);
    query[key] = values.length === 1 ? values[0] : values;
  }

  return {
    method,
    path: url.pathname,
    pathParams: {},
    query,
    headers: flattenHeaders(parts.headers),
    cookies: parseCookies(parts.headers.cookie),
    textBody: parts.body,
    contentType: parts.headers["content-type"] ?? null,
    requestId: firstHeader(parts.headers["x-request-id"]) ?? randomUUID(),
    requestTime: new Date().toISOString(),
    clientIp: parts.remoteAddress,
    userAgent: parts.headers["user-agent"] ?? null,
  };
}

async function readBody(req: IncomingMessage): Promise<string | null> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return chunks.length > 0 ? Buffer.concat(chunks).toString("utf8") : null;
}

function writeResponse(res: ServerResponse, response: HttpResponse): void {
  res.writeHead(response.status, response.headers);
  res.end(response.body);
}

export function createRequestListener(app: RequestHandler, logger: Logger): RequestListener {
  return async (req, res) => {
    try {
      const request = buildHttpRequest({
        method: req.method,
        url: req.url,
        headers: req.headers,
        body: await readBody(req),
        remoteAddress: req.socket.remoteAddress ?? null,
      });
      writeResponse(res, await app.handle(request));
    } catch (error) {
      writeResponse(res, toErrorResponse(error, logger));
    }
  };
}
