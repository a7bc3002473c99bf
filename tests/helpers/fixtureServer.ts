import { createServer, type IncomingMessage, type Server } from "node:http";

export interface FixtureRoute {
  status?: number;
  contentType?: string;
  body?: string | Buffer;
}

export interface ReceivedRequest {
  method: string;
  path: string;
  contentType: string | undefined;
  body: string;
}

export interface RunningFixtureServer {
  baseUrl: string;
  received: ReceivedRequest[];
  close: () => Promise<void>;
}

/**
 * In-process stand-in for the callback sink and for remote document hosts.
 * Unrouted paths answer 404; every request is recorded with its body.
 */
export async function startFixtureServer(routes: Record<string, FixtureRoute> = {}): Promise<RunningFixtureServer> {
  const received: ReceivedRequest[] = [];

  const server = createServer(async (req, res) => {
    const path = req.url ?? "/";
    const body = await readBody(req);
    received.push({
      method: req.method ?? "GET",
      path,
      contentType: req.headers["content-type"],
      body
    });

    const route = routes[path];
    if (!route) {
      res.statusCode = 404;
      res.setHeader("content-type", "text/plain; charset=utf-8");
      res.end("Not found");
      return;
    }

    res.statusCode = route.status ?? 200;
    res.setHeader("content-type", route.contentType ?? "application/octet-stream");
    res.end(route.body ?? "");
  });

  const port = await listenOnRandomPort(server);

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    received,
    close: async () => {
      await closeServer(server);
    }
  };
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function listenOnRandomPort(server: Server): Promise<number> {
  return new Promise((resolvePromise, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      server.off("error", reject);
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("Failed to start fixture server"));
        return;
      }
      resolvePromise(address.port);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolvePromise, reject) => {
    server.closeAllConnections();
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolvePromise();
    });
  });
}
