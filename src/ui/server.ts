import http from "node:http";

import type { ViewerSession } from "../app/session.js";
import type { EventLogger } from "../core/logger.js";

import { createUiRouter } from "./router.js";

// =============================================================================
// TYPES
// =============================================================================

export type StartUiServerOptions = {
  session: ViewerSession;
  port?: number;
  logger?: EventLogger;
};

export type UiServerHandle = {
  url: string;
  close: () => Promise<void>;
};

const UI_HOST = "127.0.0.1";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function startUiServer(options: StartUiServerOptions): Promise<UiServerHandle> {
  const port = options.port ?? 0;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error("Port must be an integer between 0 and 65535.");
  }

  const router = createUiRouter({ session: options.session });
  const server = http.createServer((req, res) => router(req, res));
  await listen(server, port);

  const address = server.address();
  if (!address || typeof address === "string") {
    server.close();
    throw new Error("Unable to determine UI server address.");
  }

  const url = `http://${UI_HOST}:${address.port}`;
  options.logger?.log({ type: "ui.listen", payload: { url } });

  return {
    url,
    close: async () => {
      await shutdown(server);
      options.logger?.log({ type: "ui.close", payload: { url } });
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function listen(server: http.Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("error", onError);
      reject(err);
    };

    server.once("error", onError);
    server.listen({ host: UI_HOST, port }, () => {
      server.off("error", onError);
      resolve();
    });
  });
}

// Keep-alive sockets would hold close() open until they time out.
function shutdown(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
    server.closeAllConnections();
  });
}
