/**
 * Pure HTTP request handler. No server/listen.
 * Injected ledger for testability; routing only, ledger rules live in domain.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import { ValidationError } from "../domain/errors.js";
import type { StreamingLedger } from "../domain/streamingLedger.js";
import { apiError, toApiError, type ErrorCode } from "./apiErrors.js";

const API = "/api";

export interface HandlerDeps {
  ledger: StreamingLedger;
}

const registerBody = z.object({
  identity: z.string().min(1),
  name: z.string(),
  profileRef: z.string().default(""),
});

const publishBody = z.object({
  creator: z.string().min(1),
  title: z.string(),
  audioRef: z.string(),
  coverRef: z.string().default(""),
  unitPrice: z.number().int().nonnegative(),
  royaltyBasisPoints: z.number().int().min(0).max(10_000).optional(),
});

const streamBody = z.object({
  consumer: z.string().min(1),
  payment: z.number().int().nonnegative().default(0),
});

const withdrawBody = z.object({
  caller: z.string().min(1),
});

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendError(res: ServerResponse, statusCode: number, code: ErrorCode, message: string, details?: Record<string, unknown>): void {
  sendJson(res, statusCode, apiError(code, message, details));
}

function getPathname(url: string | undefined, host: string | undefined): string {
  if (url === undefined) return "/";
  try {
    const base = host !== undefined ? `http://${host}` : "http://localhost";
    return new URL(url, base).pathname;
  } catch {
    return "/";
  }
}

function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk: Buffer | string) => {
      body += typeof chunk === "string" ? chunk : chunk.toString();
    });
    req.on("end", () => {
      try {
        resolve(body ? JSON.parse(body) : {});
      } catch {
        reject(new ValidationError("Invalid JSON"));
      }
    });
    req.on("error", reject);
  });
}

function match(pathname: string, pattern: string): string[] | null {
  const m = pathname.match(new RegExp(`^${API}${pattern}$`));
  return m ? m.slice(1).map((s) => decodeURIComponent(s)) : null;
}

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

/** Known domain and input errors become JSON error payloads; anything else rejects. */
export function createHandler(deps: HandlerDeps): RequestHandler {
  const { ledger } = deps;

  async function route(req: IncomingMessage, res: ServerResponse, method: string, pathname: string): Promise<void> {
    // --- Health ---
    if (method === "GET" && pathname === "/health") {
      sendJson(res, 200, { status: "ok" });
      return;
    }

    // --- Registry ---
    if (method === "POST" && pathname === `${API}/creators`) {
      const body = registerBody.parse(await parseBody(req));
      const creatorId = await ledger.registerCreator(body.identity, body.name, body.profileRef);
      sendJson(res, 201, { creatorId });
      return;
    }

    if (method === "POST" && pathname === `${API}/consumers`) {
      const body = registerBody.parse(await parseBody(req));
      await ledger.registerConsumer(body.identity, body.name, body.profileRef);
      sendJson(res, 201, { identity: body.identity.trim() });
      return;
    }

    const creatorWorks = match(pathname, "/creators/([^/]+)/works");
    if (method === "GET" && creatorWorks) {
      sendJson(res, 200, ledger.worksByCreator(creatorWorks[0] ?? ""));
      return;
    }

    const creator = match(pathname, "/creators/([^/]+)");
    if (method === "GET" && creator) {
      const identity = creator[0] ?? "";
      const found = ledger.getCreator(identity);
      if (!found) {
        sendError(res, 404, "NOT_FOUND", "Creator not found", { identity });
        return;
      }
      sendJson(res, 200, found);
      return;
    }

    const plays = match(pathname, "/consumers/([^/]+)/plays");
    if (method === "GET" && plays) {
      sendJson(res, 200, ledger.playHistory(plays[0] ?? ""));
      return;
    }

    const consumer = match(pathname, "/consumers/([^/]+)");
    if (method === "GET" && consumer) {
      const identity = consumer[0] ?? "";
      const found = ledger.getConsumer(identity);
      if (!found) {
        sendError(res, 404, "NOT_FOUND", "Consumer not found", { identity });
        return;
      }
      sendJson(res, 200, found);
      return;
    }

    // --- Catalog ---
    if (method === "POST" && pathname === `${API}/works`) {
      const { creator: owner, ...request } = publishBody.parse(await parseBody(req));
      const workId = await ledger.publish(owner, request);
      sendJson(res, 201, { workId });
      return;
    }

    if (method === "GET" && pathname === `${API}/works`) {
      sendJson(res, 200, ledger.allWorks());
      return;
    }

    const work = match(pathname, "/works/(\\d+)");
    if (method === "GET" && work) {
      sendJson(res, 200, ledger.getWork(Number(work[0])));
      return;
    }

    const gate = match(pathname, "/works/(\\d+)/gate");
    if (method === "GET" && gate) {
      sendJson(res, 200, ledger.gateInfo(Number(gate[0])));
      return;
    }

    // --- Access & escrow ---
    const stream = match(pathname, "/works/(\\d+)/stream");
    if (method === "POST" && stream) {
      const workId = Number(stream[0]);
      const body = streamBody.parse(await parseBody(req));
      const audioRef = await ledger.stream(body.consumer, workId, body.payment);
      sendJson(res, 200, { workId, audioRef, playCount: ledger.getWork(workId).playCount });
      return;
    }

    const withdraw = match(pathname, "/works/(\\d+)/withdraw");
    if (method === "POST" && withdraw) {
      const workId = Number(withdraw[0]);
      const body = withdrawBody.parse(await parseBody(req));
      const amount = await ledger.withdrawEscrow(body.caller, workId);
      sendJson(res, 200, { workId, amount });
      return;
    }

    // --- Journal ---
    if (method === "GET" && pathname === `${API}/stats`) {
      sendJson(res, 200, ledger.stats());
      return;
    }

    if (method === "GET" && pathname === `${API}/events`) {
      sendJson(res, 200, await ledger.events());
      return;
    }

    sendError(res, 404, "NOT_FOUND", "Not Found");
  }

  return async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const pathname = getPathname(req.url, req.headers.host);
    const method = req.method ?? "GET";
    try {
      await route(req, res, method, pathname);
    } catch (err) {
      const known = toApiError(err);
      if (!known) throw err;
      sendJson(res, known.status, known.payload);
    }
  };
}
