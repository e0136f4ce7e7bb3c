import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { createTempDirTracker, FakeDecompilerEngine, touchArchive, type FakeEngineOptions } from "../../test/fakes.js";
import { ViewerSession } from "../app/session.js";
import { MemoryLogger } from "../core/logger.js";

import { startUiServer, type UiServerHandle } from "./server.js";

const tempDirs = createTempDirTracker("jarscope-ui-");
let server: UiServerHandle | null = null;

afterEach(async () => {
  if (server) {
    await server.close();
    server = null;
  }
  tempDirs.cleanup();
});

// =============================================================================
// HELPERS
// =============================================================================

async function startWithSession(
  engineOptions: FakeEngineOptions = {},
): Promise<{ session: ViewerSession; url: string; dir: string }> {
  const dir = tempDirs.make();
  const session = new ViewerSession({
    engineFactory: () =>
      new FakeDecompilerEngine(
        [
          { name: "a/B", source: "class B {}" },
          { name: "a/b/D", source: "class D {}" },
        ],
        engineOptions,
      ),
    logger: new MemoryLogger({ sessionId: "ui-test" }),
    cwd: dir,
  });
  server = await startUiServer({ session, port: 0 });
  return { session, url: server.url, dir };
}

async function openArchive(session: ViewerSession, dir: string): Promise<void> {
  touchArchive(dir);
  session.openArchive("app.jar");
  await session.whenIdle();
}

async function fetchJson(url: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url, init);
  return { status: response.status, body: await response.json() };
}

function postJson(body: string): RequestInit {
  return { method: "POST", headers: { "Content-Type": "application/json" }, body };
}

// =============================================================================
// READ ROUTES
// =============================================================================

describe("UI server read routes", () => {
  it("serves the index page", async () => {
    const { url } = await startWithSession();

    const response = await fetch(`${url}/`);

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(await response.text()).toContain("<title>jarscope</title>");
  });

  it("reports status and the tree", async () => {
    const { session, url, dir } = await startWithSession();
    await openArchive(session, dir);

    const status = await fetchJson(`${url}/api/status`);
    const tree = await fetchJson(`${url}/api/tree`);

    expect(status).toEqual({ status: 200, body: { ok: true, result: session.getStatus() } });
    expect(tree).toEqual({ status: 200, body: { ok: true, result: session.getTree() } });
  });

  it("returns highlighted source for a class", async () => {
    const { session, url, dir } = await startWithSession();
    await openArchive(session, dir);

    const { status, body } = await fetchJson(`${url}/api/classes/a/b/D`);

    expect(status).toBe(200);
    expect(body).toEqual({
      ok: true,
      result: {
        qualifiedName: "a/b/D",
        found: true,
        text: "class D {}",
        spans: [
          { kind: "keyword", start: 0, end: 5, text: "class" },
          { kind: "default", start: 5, end: 10, text: " D {}" },
        ],
      },
    });
  });

  it("returns 404 for unknown classes", async () => {
    const { session, url, dir } = await startWithSession();
    await openArchive(session, dir);

    await expect(fetchJson(`${url}/api/classes/x/Missing`)).resolves.toEqual({
      status: 404,
      body: { ok: false, error: { code: "not_found", message: "// Class not found: x/Missing" } },
    });
  });

  it("pages task events by cursor", async () => {
    const { session, url, dir } = await startWithSession();

    await expect(fetchJson(`${url}/api/tasks/current`)).resolves.toMatchObject({ status: 404 });

    await openArchive(session, dir);

    const first = await fetchJson(`${url}/api/tasks/current?cursor=0`);
    expect(first).toMatchObject({
      status: 200,
      body: {
        ok: true,
        result: { taskId: "decompile-archive-1", kind: "decompile-archive", cursor: 0, nextCursor: 3, done: true },
      },
    });

    const rest = await fetchJson(`${url}/api/tasks/current?cursor=2`);
    expect(rest.body).toMatchObject({
      result: {
        events: [
          {
            type: "outcome",
            taskId: "decompile-archive-1",
            outcome: { status: "success" },
          },
        ],
      },
    });

    await expect(fetchJson(`${url}/api/tasks/current?cursor=-1`)).resolves.toMatchObject({
      status: 400,
      body: { ok: false, error: { code: "bad_request", message: "Invalid cursor value." } },
    });
  });

  it("rejects unknown endpoints and wrong methods", async () => {
    const { url } = await startWithSession();

    await expect(fetchJson(`${url}/api/nope`)).resolves.toMatchObject({
      status: 404,
      body: { ok: false, error: { code: "not_found" } },
    });
    await expect(fetchJson(`${url}/api/status`, { method: "POST" })).resolves.toEqual({
      status: 405,
      body: { ok: false, error: { code: "method_not_allowed", message: "Method POST not allowed." } },
    });
    await expect(fetchJson(`${url}/api/tasks/export-directory`)).resolves.toMatchObject({
      status: 405,
    });
  });
});

// =============================================================================
// TASK ROUTES
// =============================================================================

describe("UI server task routes", () => {
  it("starts a folder export", async () => {
    const { session, url, dir } = await startWithSession();
    await openArchive(session, dir);

    const started = await fetchJson(`${url}/api/tasks/export-directory`, postJson('{"path":"out"}'));
    await session.whenIdle();

    expect(started).toEqual({
      status: 202,
      body: { ok: true, result: { taskId: "export-to-directory-2", kind: "export-to-directory" } },
    });
    expect(fs.readFileSync(path.join(dir, "out", "a", "B.java"), "utf8")).toBe("class B {}");
  });

  it("starts an archive export with the default name", async () => {
    const { session, url, dir } = await startWithSession();
    await openArchive(session, dir);

    const started = await fetchJson(`${url}/api/tasks/export-archive`, postJson(""));
    await session.whenIdle();

    expect(started.status).toBe(202);
    expect(fs.existsSync(path.join(dir, "app_decompiled.zip"))).toBe(true);
  });

  it("answers 409 while another task runs", async () => {
    let release = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { session, url, dir } = await startWithSession({ gate });
    touchArchive(dir);
    session.store.put("seed/Only", "class Only {}");
    session.openArchive("app.jar");

    const conflict = await fetchJson(`${url}/api/tasks/export-directory`, postJson('{"path":"out"}'));
    release();
    await session.whenIdle();

    expect(conflict).toEqual({
      status: 409,
      body: {
        ok: false,
        error: {
          code: "conflict",
          message:
            "Task decompile-archive-1 is still running; wait for it to finish before starting another.",
          details: { task_id: "decompile-archive-1" },
        },
      },
    });
  });

  it("answers 400 when there is nothing to export", async () => {
    const { url } = await startWithSession();

    await expect(
      fetchJson(`${url}/api/tasks/export-directory`, postJson('{"path":"out"}')),
    ).resolves.toEqual({
      status: 400,
      body: {
        ok: false,
        error: {
          code: "bad_request",
          message: "No decompiled classes to save",
          details: { hint: "Open an archive and wait for decompilation to finish." },
        },
      },
    });
  });

  it("validates request bodies", async () => {
    const { session, url, dir } = await startWithSession();
    await openArchive(session, dir);

    await expect(fetchJson(`${url}/api/tasks/export-directory`, postJson("{"))).resolves.toEqual({
      status: 400,
      body: { ok: false, error: { code: "bad_request", message: "Request body is not valid JSON." } },
    });
    await expect(fetchJson(`${url}/api/tasks/export-directory`, postJson("{}"))).resolves.toEqual({
      status: 400,
      body: { ok: false, error: { code: "bad_request", message: 'Body must be {"path": string}.' } },
    });
  });
});

describe("startUiServer lifecycle", () => {
  it("rejects ports outside the TCP range", async () => {
    const session = new ViewerSession({
      engineFactory: () => new FakeDecompilerEngine([]),
      logger: new MemoryLogger({ sessionId: "ui-test" }),
    });

    await expect(startUiServer({ session, port: 70000 })).rejects.toThrow(
      "Port must be an integer between 0 and 65535.",
    );
  });

  it("logs listen and close events", async () => {
    const logger = new MemoryLogger({ sessionId: "ui-test" });
    const session = new ViewerSession({ engineFactory: () => new FakeDecompilerEngine([]), logger });

    const handle = await startUiServer({ session, port: 0, logger });
    await handle.close();

    expect(logger.events.map((event) => [event.type, event.payload])).toEqual([
      ["ui.listen", { url: handle.url }],
      ["ui.close", { url: handle.url }],
    ]);
  });
});
