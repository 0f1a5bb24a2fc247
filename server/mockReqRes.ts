/**
 * Test utils — in-process HTTP req/res doubles, no sockets.
 * Only the surface the handler touches is implemented.
 */

import { Readable } from "node:stream";
import type { IncomingMessage, ServerResponse } from "node:http";

export interface MockReqOptions {
  method?: string;
  url?: string;
  headers?: Record<string, string>;
  /** Serialized with JSON.stringify unless already a string. */
  body?: unknown;
}

export interface CapturedResponse {
  readonly statusCode: number;
  readonly headers: Record<string, string>;
  readonly body: string;
  json<T = unknown>(): T;
}

export function mockReq(opts: MockReqOptions = {}): IncomingMessage {
  const raw = opts.body === undefined ? "" : typeof opts.body === "string" ? opts.body : JSON.stringify(opts.body);
  const headers = Object.fromEntries(
    Object.entries(opts.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v])
  );
  const stream = Readable.from(raw === "" ? [] : [raw]);
  return Object.assign(stream, {
    method: opts.method ?? "GET",
    url: opts.url ?? "/",
    headers,
  }) as unknown as IncomingMessage;
}

export function mockRes(): { res: ServerResponse; captured: CapturedResponse } {
  const state = { statusCode: 0, headers: {} as Record<string, string>, body: "" };

  const res = {
    headersSent: false,
    writeHead(code: number, h?: Record<string, string | string[]>): void {
      state.statusCode = code;
      for (const [k, v] of Object.entries(h ?? {})) {
        state.headers[k.toLowerCase()] = Array.isArray(v) ? v.join(", ") : v;
      }
      res.headersSent = true;
    },
    end(chunk?: string | Buffer): void {
      state.body = chunk === undefined ? "" : chunk.toString();
    },
  };

  const captured: CapturedResponse = {
    get statusCode() {
      return state.statusCode;
    },
    get headers() {
      return { ...state.headers };
    },
    get body() {
      return state.body;
    },
    json<T = unknown>(): T {
      return JSON.parse(state.body) as T;
    },
  };

  return { res: res as unknown as ServerResponse, captured };
}

export interface MockReqResResult {
  req: IncomingMessage;
  res: ServerResponse;
  captured: CapturedResponse;
}

export function mockReqRes(opts: MockReqOptions = {}): MockReqResResult {
  return { req: mockReq(opts), ...mockRes() };
}
