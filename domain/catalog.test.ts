import { describe, expect, it } from "vitest";
import { Catalog, type PublishInput } from "./catalog.js";
import { IdentityRegistry } from "./identityRegistry.js";
import { InvariantViolation, NotRegisteredCreatorError, WorkNotFoundError } from "./errors.js";
import { asAmount, asBasisPoints, asCreatorId, asIdentity, asTimestamp, asWorkId, NO_WORK } from "./core.js";

const TS = asTimestamp(5_000);
const alice = asIdentity("alice");
const bob = asIdentity("bob");

const track = (title: string): PublishInput => ({
  title,
  audioRef: `ipfs://${title}.mp3`,
  coverRef: `ipfs://${title}.png`,
  unitPrice: asAmount(1_000),
  royaltyBasisPoints: asBasisPoints(3_000),
});

function setup(): { registry: IdentityRegistry; catalog: Catalog } {
  const registry = new IdentityRegistry();
  registry.apply(registry.registerCreator(alice, "Alice", "", TS));
  registry.apply(registry.registerCreator(bob, "Bob", "", TS));
  return { registry, catalog: new Catalog(registry) };
}

describe("Catalog", () => {
  it("publish from unregistered identity rejected, catalog unchanged", () => {
    const { catalog } = setup();
    expect(() => catalog.publish(asIdentity("mallory"), track("x"), TS)).toThrow(NotRegisteredCreatorError);
    expect(catalog.workCount).toBe(0);
  });

  it("work ids start at 1 and are shared across creators", () => {
    const { catalog } = setup();
    const a = catalog.publish(alice, track("a"), TS);
    catalog.apply(a);
    const b = catalog.publish(bob, track("b"), TS);
    catalog.apply(b);
    expect(a.workId).toBe(1);
    expect(b.workId).toBe(2);
    expect(b.creatorId).toBe(2);
  });

  it("work and gate are created together", () => {
    const { catalog } = setup();
    catalog.apply(catalog.publish(alice, track("a"), TS));
    const work = catalog.getWork(asWorkId(1));
    expect(work).toEqual({
      id: 1,
      creatorId: 1,
      creator: "alice",
      title: "a",
      audioRef: "ipfs://a.mp3",
      coverRef: "ipfs://a.png",
      playCount: 0,
      publishedAt: 5_000,
    });
    expect(catalog.gate(asWorkId(1)).info()).toMatchObject({
      workId: 1,
      unitPrice: 1_000,
      royaltyBasisPoints: 3_000,
      owner: "alice",
      ownerCreatorId: 1,
      escrowBalance: 0,
    });
  });

  it("getWork rejects the 0 sentinel and unassigned ids", () => {
    const { catalog } = setup();
    catalog.apply(catalog.publish(alice, track("a"), TS));
    expect(() => catalog.getWork(NO_WORK)).toThrow(WorkNotFoundError);
    expect(() => catalog.getWork(asWorkId(2))).toThrow(WorkNotFoundError);
    expect(() => catalog.gate(asWorkId(2))).toThrow(/Work 2 not found/);
  });

  it("listAll and listByCreator keep insertion order", () => {
    const { catalog } = setup();
    for (const [who, title] of [
      [alice, "a1"],
      [bob, "b1"],
      [alice, "a2"],
    ] as const) {
      catalog.apply(catalog.publish(who, track(title), TS));
    }
    expect(catalog.listAll().map((w) => w.title)).toEqual(["a1", "b1", "a2"]);
    expect(catalog.listByCreator(alice).map((w) => w.id)).toEqual([1, 3]);
    expect(catalog.listByCreator(bob).map((w) => w.id)).toEqual([2]);
    expect(catalog.listByCreator(asIdentity("nobody"))).toEqual([]);
  });

  it("WorkPlayed increments playCount only for that work", () => {
    const { catalog } = setup();
    catalog.apply(catalog.publish(alice, track("a"), TS));
    catalog.apply(catalog.publish(alice, track("b"), TS));
    catalog.apply({ type: "WorkPlayed", workId: asWorkId(2), consumer: bob, timestamp: TS, version: 0 });
    catalog.apply({ type: "WorkPlayed", workId: asWorkId(2), consumer: bob, timestamp: TS, version: 0 });
    expect(catalog.getWork(asWorkId(1)).playCount).toBe(0);
    expect(catalog.getWork(asWorkId(2)).playCount).toBe(2);
  });

  it("WorkPublished naming another creator's id violates an invariant", () => {
    const { catalog } = setup();
    const event = { ...catalog.publish(alice, track("a"), TS), creatorId: asCreatorId(2) };
    expect(() => catalog.apply(event)).toThrow(InvariantViolation);
    expect(catalog.workCount).toBe(0);
  });

  it("title and media refs are stored as given, empty included", () => {
    const { catalog } = setup();
    const event = catalog.publish(alice, { ...track("a"), title: "", audioRef: "", coverRef: "" }, TS);
    catalog.apply(event);
    expect(catalog.getWork(event.workId)).toMatchObject({ id: 1, title: "", audioRef: "", coverRef: "" });
  });
});
