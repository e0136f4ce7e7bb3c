import type { IncomingMessage, ServerResponse } from "node:http";

import { z } from "zod";

import type { ViewerSession } from "../app/session.js";

import { buildApiErrorPayload, resolveApiError, type ApiErrorCode } from "./http/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type UiRouterOptions = {
  session: ViewerSession;
  /** Upper bound for JSON request bodies. */
  maxBodyBytes?: number;
};

type ApiRouteMatch =
  | { type: "status" }
  | { type: "tree" }
  | { type: "class"; qualifiedName: string }
  | { type: "current_task" }
  | { type: "export_directory" }
  | { type: "export_archive" }
  | { type: "bad_request" }
  | { type: "not_found" };

type RouteMethod = "read" | "write";

const ROUTE_METHODS: Record<ApiRouteMatch["type"], RouteMethod | null> = {
  status: "read",
  tree: "read",
  class: "read",
  current_task: "read",
  export_directory: "write",
  export_archive: "write",
  bad_request: null,
  not_found: null,
};

const ExportDirectoryBodySchema = z.object({ path: z.string().min(1) });
const ExportArchiveBodySchema = z.object({ path: z.string().min(1).optional() });

const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

class RequestBodyError extends Error {}

// =============================================================================
// PUBLIC API
// =============================================================================

export function createUiRouter(
  options: UiRouterOptions,
): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    void routeRequest(req, res, options);
  };
}

// =============================================================================
// ROUTING
// =============================================================================

async function routeRequest(
  req: IncomingMessage,
  res: ServerResponse,
  options: UiRouterOptions,
): Promise<void> {
  const rawUrl = req.url ?? "/";
  const method = (req.method ?? "GET").toUpperCase();
  const isHead = method === "HEAD";

  let url: URL;
  try {
    url = new URL(rawUrl, "http://127.0.0.1");
  } catch {
    sendApiError(res, 400, "bad_request", "Malformed request URL.", isHead);
    return;
  }

  try {
    if (url.pathname === "/" || url.pathname === "/index.html") {
      sendIndex(res, isHead);
      return;
    }

    if (!url.pathname.startsWith("/api/")) {
      sendApiError(res, 404, "not_found", "Not found.", isHead);
      return;
    }

    await handleApiRequest(req, res, method, url, options);
  } catch (err) {
    if (res.headersSent) {
      res.end();
      return;
    }

    if (err instanceof RequestBodyError) {
      sendApiError(res, 400, "bad_request", err.message, isHead);
      return;
    }

    const resolved = resolveApiError(err);
    sendJson(res, resolved.status, resolved.payload, isHead);
  }
}

async function handleApiRequest(
  req: IncomingMessage,
  res: ServerResponse,
  method: string,
  url: URL,
  options: UiRouterOptions,
): Promise<void> {
  const isHead = method === "HEAD";
  const route = matchApiRoute(url.pathname);

  if (route.type === "not_found") {
    sendApiError(res, 404, "not_found", "Endpoint not found.", isHead);
    return;
  }
  if (route.type === "bad_request") {
    sendApiError(res, 400, "bad_request", "Invalid class name.", isHead);
    return;
  }

  const expected = ROUTE_METHODS[route.type];
  const allowed = expected === "read" ? isReadMethod(method) : method === "POST";
  if (!allowed) {
    sendApiError(res, 405, "method_not_allowed", `Method ${method} not allowed.`, isHead);
    return;
  }

  const { session } = options;

  switch (route.type) {
    case "status":
      sendApiOk(res, session.getStatus(), isHead);
      return;

    case "tree":
      sendApiOk(res, session.getTree(), isHead);
      return;

    case "class": {
      const selection = await session.select(route.qualifiedName);
      if (!selection.found && !session.store.has(selection.qualifiedName)) {
        sendApiError(res, 404, "not_found", selection.text, isHead);
        return;
      }
      sendApiOk(res, selection, isHead);
      return;
    }

    case "current_task":
      handleCurrentTaskRequest(res, url, session, isHead);
      return;

    case "export_directory": {
      const body = ExportDirectoryBodySchema.safeParse(await readJsonBody(req, options));
      if (!body.success) {
        sendApiError(res, 400, "bad_request", "Body must be {\"path\": string}.", false);
        return;
      }
      const handle = session.exportToDirectory(body.data.path);
      sendJson(res, 202, { ok: true, result: { taskId: handle.id, kind: handle.kind } }, false);
      return;
    }

    case "export_archive": {
      const body = ExportArchiveBodySchema.safeParse(await readJsonBody(req, options));
      if (!body.success) {
        sendApiError(res, 400, "bad_request", "Body must be {\"path\"?: string}.", false);
        return;
      }
      const handle = session.exportToArchive(body.data.path);
      sendJson(res, 202, { ok: true, result: { taskId: handle.id, kind: handle.kind } }, false);
      return;
    }
  }
}

function handleCurrentTaskRequest(
  res: ServerResponse,
  url: URL,
  session: ViewerSession,
  isHead: boolean,
): void {
  const cursor = parseCursorParam(url.searchParams.get("cursor"));
  if (cursor === null) {
    sendApiError(res, 400, "bad_request", "Invalid cursor value.", isHead);
    return;
  }

  const task = session.getCurrentTask();
  if (!task) {
    sendApiError(res, 404, "not_found", "No task has been started.", isHead);
    return;
  }

  const polled = task.poll(cursor);
  sendApiOk(
    res,
    {
      taskId: task.id,
      kind: task.kind,
      cursor,
      nextCursor: polled.nextCursor,
      done: polled.done,
      events: polled.events,
    },
    isHead,
  );
}

function matchApiRoute(pathname: string): ApiRouteMatch {
  const segments = pathname.split("/").filter(Boolean);
  const [api, resource, ...rest] = segments;
  if (api !== "api") return { type: "not_found" };

  if (resource === "status" && rest.length === 0) return { type: "status" };
  if (resource === "tree" && rest.length === 0) return { type: "tree" };

  if (resource === "classes" && rest.length > 0) {
    const decoded = rest.map(safeDecodeSegment);
    const parts: string[] = [];
    for (const part of decoded) {
      if (part === null) return { type: "bad_request" };
      parts.push(part);
    }
    return { type: "class", qualifiedName: parts.join("/") };
  }

  if (resource === "tasks" && rest.length === 1) {
    if (rest[0] === "current") return { type: "current_task" };
    if (rest[0] === "export-directory") return { type: "export_directory" };
    if (rest[0] === "export-archive") return { type: "export_archive" };
  }

  return { type: "not_found" };
}

// =============================================================================
// REQUEST BODIES
// =============================================================================

async function readJsonBody(req: IncomingMessage, options: UiRouterOptions): Promise<unknown> {
  const limit = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > limit) {
      throw new RequestBodyError(`Request body exceeds ${limit} bytes.`);
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf8").trim();
  if (!raw) return {};

  try {
    return JSON.parse(raw);
  } catch {
    throw new RequestBodyError("Request body is not valid JSON.");
  }
}

// =============================================================================
// RESPONSES
// =============================================================================

function sendApiOk(res: ServerResponse, result: unknown, isHead: boolean): void {
  sendJson(res, 200, { ok: true, result }, isHead);
}

function sendApiError(
  res: ServerResponse,
  status: number,
  code: ApiErrorCode,
  message: string,
  isHead: boolean,
): void {
  sendJson(res, status, buildApiErrorPayload({ code, message }), isHead);
}

function sendJson(res: ServerResponse, status: number, payload: unknown, isHead: boolean): void {
  const body = JSON.stringify(payload);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Cache-Control", "no-store");
  res.setHeader("Content-Length", Buffer.byteLength(body));

  if (isHead) {
    res.end();
    return;
  }

  res.end(body);
}

function sendIndex(res: ServerResponse, isHead: boolean): void {
  const html = [
    "<!doctype html>",
    "<html>",
    "<head>",
    '  <meta charset="utf-8" />',
    "  <title>jarscope</title>",
    "</head>",
    "<body>",
    "  <h1>jarscope</h1>",
    "  <ul>",
    "    <li><code>GET /api/status</code></li>",
    "    <li><code>GET /api/tree</code></li>",
    "    <li><code>GET /api/classes/&lt;qualified/name&gt;</code></li>",
    "    <li><code>GET /api/tasks/current?cursor=0</code></li>",
    "    <li><code>POST /api/tasks/export-directory</code> <code>{\"path\": \"out\"}</code></li>",
    "    <li><code>POST /api/tasks/export-archive</code> <code>{\"path\": \"out.zip\"}</code></li>",
    "  </ul>",
    "</body>",
    "</html>",
    "",
  ].join("\n");

  res.statusCode = 200;
  res.setHeader("Content-Type", "text/html; charset=utf-8");
  res.setHeader("Content-Length", Buffer.byteLength(html));

  if (isHead) {
    res.end();
    return;
  }

  res.end(html);
}

// =============================================================================
// UTILITIES
// =============================================================================

function isReadMethod(method: string): boolean {
  return method === "GET" || method === "HEAD";
}

function safeDecodeSegment(segment: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    return null;
  }

  if (!decoded) return null;
  if (decoded.includes("\\") || decoded.includes("\0")) {
    return null;
  }

  return decoded;
}

function parseCursorParam(value: string | null): number | null {
  if (value === null) return 0;

  const trimmed = value.trim();
  if (!trimmed) return 0;
  if (!/^\d+$/.test(trimmed)) return null;

  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}
