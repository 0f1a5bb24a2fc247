import { describe, expect, it, beforeEach, vi } from "vitest";
import { createApp, type App } from "./app.js";
import { mockReqRes, type MockReqOptions } from "./mockReqRes.js";
import { InMemoryPayoutTransfer } from "./payouts.js";
import type { PaymentTransfer } from "../domain/ports.js";

interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

async function call(app: App, opts: MockReqOptions) {
  const { req, res, captured } = mockReqRes(opts);
  await app.handle(req, res);
  return captured;
}

const post = (app: App, url: string, body: unknown) => call(app, { method: "POST", url, body });
const get = (app: App, url: string) => call(app, { method: "GET", url });

async function seed(app: App): Promise<void> {
  await post(app, "/api/creators", { identity: "artist", name: "The Artist", profileRef: "ipfs://artist" });
  await post(app, "/api/consumers", { identity: "fan", name: "Fan" });
  await post(app, "/api/works", {
    creator: "artist",
    title: "First Light",
    audioRef: "ipfs://first-light.mp3",
    coverRef: "ipfs://first-light.png",
    unitPrice: 1000,
  });
}

describe("server API contract", () => {
  let payouts: InMemoryPayoutTransfer;
  let app: App;

  beforeEach(async () => {
    payouts = new InMemoryPayoutTransfer();
    app = await createApp({ transfer: payouts, clock: { now: () => 1_700_000_000_000 } });
  });

  describe("GET /health", () => {
    it("returns 200 + { status: 'ok' }", async () => {
      const res = await get(app, "/health");
      expect(res.statusCode).toBe(200);
      expect(res.headers["content-type"]).toBe("application/json");
      expect(res.json()).toEqual({ status: "ok" });
    });
  });

  describe("registration", () => {
    it("POST /api/creators returns 201 + creatorId, then 409 on duplicate", async () => {
      const first = await post(app, "/api/creators", { identity: "artist", name: "A" });
      expect(first.statusCode).toBe(201);
      expect(first.json()).toEqual({ creatorId: 1 });

      const dup = await post(app, "/api/creators", { identity: "artist", name: "B" });
      expect(dup.statusCode).toBe(409);
      expect(dup.json<ErrorBody>().error).toMatchObject({
        code: "ALREADY_REGISTERED",
        message: "creator artist is already registered",
      });
    });

    it("GET /api/creators/:identity returns the record or 404", async () => {
      await seed(app);
      const found = await get(app, "/api/creators/artist");
      expect(found.statusCode).toBe(200);
      expect(found.json()).toEqual({ id: 1, identity: "artist", name: "The Artist", profileRef: "ipfs://artist" });

      const missing = await get(app, "/api/creators/nobody");
      expect(missing.statusCode).toBe(404);
      expect(missing.json<ErrorBody>().error.code).toBe("NOT_FOUND");
    });

    it("GET /api/consumers/:identity defaults profileRef to empty", async () => {
      await seed(app);
      const found = await get(app, "/api/consumers/fan");
      expect(found.json()).toEqual({ identity: "fan", name: "Fan", profileRef: "" });
    });

    it("invalid body returns 400 INVALID_INPUT with issues", async () => {
      const res = await post(app, "/api/creators", { name: "no identity" });
      expect(res.statusCode).toBe(400);
      const body = res.json<ErrorBody>();
      expect(body.error.code).toBe("INVALID_INPUT");
      expect(body.error.details).toMatchObject({ issues: [{ path: "identity" }] });
    });

    it("malformed JSON returns 400", async () => {
      const res = await call(app, { method: "POST", url: "/api/consumers", body: "{not json" });
      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>().error).toMatchObject({ code: "INVALID_INPUT", message: "Invalid JSON" });
    });
  });

  describe("catalog", () => {
    it("POST /api/works from an unregistered creator returns 403", async () => {
      const res = await post(app, "/api/works", { creator: "ghost", title: "t", audioRef: "a", unitPrice: 1 });
      expect(res.statusCode).toBe(403);
      expect(res.json<ErrorBody>().error.code).toBe("NOT_REGISTERED_CREATOR");
      expect((await get(app, "/api/works")).json()).toEqual([]);
    });

    it("GET /api/works/:id, /gate and /api/creators/:identity/works", async () => {
      await seed(app);
      const work = await get(app, "/api/works/1");
      expect(work.json()).toEqual({
        id: 1,
        creatorId: 1,
        creator: "artist",
        title: "First Light",
        audioRef: "ipfs://first-light.mp3",
        coverRef: "ipfs://first-light.png",
        playCount: 0,
        publishedAt: 1_700_000_000_000,
      });

      const gate = await get(app, "/api/works/1/gate");
      expect(gate.json()).toEqual({
        workId: 1,
        unitPrice: 1000,
        royaltyBasisPoints: 3000,
        ownerCreatorId: 1,
        owner: "artist",
        escrowBalance: 0,
        grantedTo: [],
        issuedCount: 0,
        pendingPayout: 0,
      });

      const byCreator = await get(app, "/api/creators/artist/works");
      expect(byCreator.json<Array<{ id: number }>>().map((w) => w.id)).toEqual([1]);
    });

    it("POST /api/works accepts an empty title and audio ref", async () => {
      await post(app, "/api/creators", { identity: "artist", name: "The Artist" });
      const res = await post(app, "/api/works", { creator: "artist", title: "", audioRef: "", unitPrice: 0 });
      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({ workId: 1 });
      expect((await get(app, "/api/works/1")).json()).toMatchObject({ title: "", audioRef: "", coverRef: "" });
    });

    it("unknown work returns 404 WORK_NOT_FOUND", async () => {
      const res = await get(app, "/api/works/0");
      expect(res.statusCode).toBe(404);
      expect(res.json<ErrorBody>().error).toMatchObject({ code: "WORK_NOT_FOUND", details: { workId: 0 } });
    });
  });

  describe("stream + withdraw", () => {
    it("underpayment returns 402 and nothing is recorded", async () => {
      await seed(app);
      const res = await post(app, "/api/works/1/stream", { consumer: "fan", payment: 10 });
      expect(res.statusCode).toBe(402);
      expect(res.json<ErrorBody>().error.code).toBe("INSUFFICIENT_PAYMENT");
      expect((await get(app, "/api/consumers/fan/plays")).json()).toEqual([]);
    });

    it("paid stream returns the audio ref; replay is free", async () => {
      await seed(app);
      const paid = await post(app, "/api/works/1/stream", { consumer: "fan", payment: 1000 });
      expect(paid.statusCode).toBe(200);
      expect(paid.json()).toEqual({ workId: 1, audioRef: "ipfs://first-light.mp3", playCount: 1 });

      const free = await post(app, "/api/works/1/stream", { consumer: "fan" });
      expect(free.json()).toEqual({ workId: 1, audioRef: "ipfs://first-light.mp3", playCount: 2 });

      const plays = await get(app, "/api/consumers/fan/plays");
      expect(plays.json()).toEqual([
        { workId: 1, consumer: "fan", sequence: 6, at: 1_700_000_000_000 },
        { workId: 1, consumer: "fan", sequence: 7, at: 1_700_000_000_000 },
      ]);
      expect((await get(app, "/api/works/1/gate")).json()).toMatchObject({ escrowBalance: 300, issuedCount: 1 });
    });

    it("withdraw: 403 for non-owner, 200 for owner, 409 when empty", async () => {
      await seed(app);
      await post(app, "/api/works/1/stream", { consumer: "fan", payment: 1000 });

      const notOwner = await post(app, "/api/works/1/withdraw", { caller: "fan" });
      expect(notOwner.statusCode).toBe(403);
      expect(notOwner.json<ErrorBody>().error.code).toBe("NOT_OWNER");

      const transfer = vi.spyOn(payouts, "transfer");
      const ok = await post(app, "/api/works/1/withdraw", { caller: "artist" });
      expect(ok.statusCode).toBe(200);
      expect(ok.json()).toEqual({ workId: 1, amount: 300 });
      expect(transfer).toHaveBeenCalledTimes(1);
      expect(transfer).toHaveBeenCalledWith("artist", 300);

      const empty = await post(app, "/api/works/1/withdraw", { caller: "artist" });
      expect(empty.statusCode).toBe(409);
      expect(empty.json<ErrorBody>().error.code).toBe("NOTHING_TO_WITHDRAW");
    });

    it("failed transfer returns 502 and keeps the escrow", async () => {
      const rejecting: PaymentTransfer = { transfer: async () => ({ ok: false, reason: "rail unavailable" }) };
      const failing = await createApp({ transfer: rejecting });
      await seed(failing);
      await post(failing, "/api/works/1/stream", { consumer: "fan", payment: 1000 });

      const res = await post(failing, "/api/works/1/withdraw", { caller: "artist" });
      expect(res.statusCode).toBe(502);
      expect(res.json<ErrorBody>().error).toMatchObject({
        code: "TRANSFER_FAILED",
        details: { workId: 1, to: "artist", amount: 300, reason: "rail unavailable" },
      });
      expect((await get(failing, "/api/works/1/gate")).json()).toMatchObject({ escrowBalance: 300 });
    });
  });

  describe("journal", () => {
    it("GET /api/stats and /api/events reflect committed operations", async () => {
      await seed(app);
      await post(app, "/api/works/1/stream", { consumer: "fan", payment: 1000 });
      expect((await get(app, "/api/stats")).json()).toEqual({
        creators: 1,
        consumers: 1,
        works: 1,
        plays: 1,
        version: 6,
      });
      const events = (await get(app, "/api/events")).json<Array<{ type: string; version: number }>>();
      expect(events.map((e) => e.type)).toEqual([
        "CreatorRegistered",
        "ConsumerRegistered",
        "WorkPublished",
        "RoyaltyAccrued",
        "GrantIssued",
        "WorkPlayed",
      ]);
    });
  });

  it("unknown route returns 404", async () => {
    const res = await get(app, "/api/nope");
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: { code: "NOT_FOUND", message: "Not Found" } });
  });
});
