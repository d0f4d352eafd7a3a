/**
 * node:http adapter: converts incoming messages to Web Requests and
 * writes the Web Response back.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { text } from "node:stream/consumers";
import { ErrorCode, errorDetail, logError } from "#lib/logger.ts";
import { handleRequest } from "#routes";

const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

/** Build a Web Request from a node request */
export const toRequest = async (message: IncomingMessage): Promise<Request> => {
  const headers = new Headers();
  for (const [key, value] of Object.entries(message.headers)) {
    if (value === undefined) continue;
    for (const item of Array.isArray(value) ? value : [value]) headers.append(key, item);
  }

  const method = message.method ?? "GET";
  const body = BODYLESS_METHODS.has(method) ? "" : await text(message);
  const url = new URL(message.url ?? "/", `http://${headers.get("host") ?? "localhost"}`);

  return new Request(url, { method, headers, body: body === "" ? null : body });
};

const writeResponse = async (response: Response, res: ServerResponse): Promise<void> => {
  res.writeHead(response.status, Object.fromEntries(response.headers));
  res.end(await response.text());
};

const serve = async (req: IncomingMessage, res: ServerResponse): Promise<void> =>
  writeResponse(await handleRequest(await toRequest(req)), res);

/** Start listening; resolves once the port is bound */
export const startServer = (port: number): Promise<Server> =>
  new Promise((resolve) => {
    const server = createServer((req, res) => {
      serve(req, res).catch((error: unknown) => {
        logError({ code: ErrorCode.REQUEST_UNHANDLED, detail: errorDetail(error) });
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
    });
    server.listen(port, () => resolve(server));
  });
