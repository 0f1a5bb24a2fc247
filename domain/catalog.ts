/**
 * Catalog — published works, each owning exactly one AccessGate.
 * Work ids come from a single pre-incremented counter; 0 is never issued.
 */

import {
  asWorkId,
  NO_WORK,
  type Amount,
  type BasisPoints,
  type CreatorId,
  type Identity,
  type Timestamp,
  type WorkId,
} from "./core.js";
import { AccessGate } from "./accessGate.js";
import { NotRegisteredCreatorError, WorkNotFoundError } from "./errors.js";
import type { CatalogEvent, WorkPublished } from "./events.js";
import type { IdentityRegistry } from "./identityRegistry.js";
import { invariant, neverReached } from "./validation.js";

export interface Work {
  readonly id: WorkId;
  readonly creatorId: CreatorId;
  readonly creator: Identity;
  readonly title: string;
  readonly audioRef: string;
  readonly coverRef: string;
  readonly playCount: number;
  readonly publishedAt: Timestamp;
}

export interface PublishInput {
  readonly title: string;
  readonly audioRef: string;
  readonly coverRef: string;
  readonly unitPrice: Amount;
  readonly royaltyBasisPoints: BasisPoints;
}

interface WorkEntry {
  work: Work;
  readonly gate: AccessGate;
}

export class Catalog {
  private readonly registry: IdentityRegistry;
  private lastWorkId = 0;
  private readonly entries = new Map<WorkId, WorkEntry>();
  private readonly workIds: WorkId[] = [];
  private readonly byCreator = new Map<Identity, WorkId[]>();

  constructor(registry: IdentityRegistry) {
    this.registry = registry;
  }

  get workCount(): number {
    return this.workIds.length;
  }

  publish(creatorIdentity: Identity, input: PublishInput, timestamp: Timestamp): WorkPublished {
    const creator = this.registry.getCreator(creatorIdentity);
    if (creator === undefined) throw new NotRegisteredCreatorError(creatorIdentity);
    return {
      type: "WorkPublished",
      workId: asWorkId(this.lastWorkId + 1),
      creatorId: creator.id,
      creator: creator.identity,
      title: input.title,
      audioRef: input.audioRef,
      coverRef: input.coverRef,
      unitPrice: input.unitPrice,
      royaltyBasisPoints: input.royaltyBasisPoints,
      timestamp,
      version: 0,
    };
  }

  getWork(workId: WorkId): Work {
    return this.entry(workId).work;
  }

  gate(workId: WorkId): AccessGate {
    return this.entry(workId).gate;
  }

  listAll(): Work[] {
    return this.workIds.map((id) => this.entry(id).work);
  }

  listByCreator(creatorIdentity: Identity): Work[] {
    return (this.byCreator.get(creatorIdentity) ?? []).map((id) => this.entry(id).work);
  }

  apply(event: CatalogEvent): void {
    switch (event.type) {
      case "WorkPublished": {
        invariant(event.workId === this.lastWorkId + 1, `work id ${event.workId} out of sequence`);
        invariant(
          this.registry.creatorById(event.creatorId)?.identity === event.creator,
          `work ${event.workId} published under creator ${event.creatorId} by ${event.creator}`
        );
        const work: Work = {
          id: event.workId,
          creatorId: event.creatorId,
          creator: event.creator,
          title: event.title,
          audioRef: event.audioRef,
          coverRef: event.coverRef,
          playCount: 0,
          publishedAt: event.timestamp,
        };
        const gate = new AccessGate({
          workId: event.workId,
          unitPrice: event.unitPrice,
          royaltyBasisPoints: event.royaltyBasisPoints,
          ownerCreatorId: event.creatorId,
          owner: event.creator,
        });
        this.lastWorkId = event.workId;
        this.entries.set(work.id, { work, gate });
        this.workIds.push(work.id);
        const authored = this.byCreator.get(work.creator);
        if (authored) authored.push(work.id);
        else this.byCreator.set(work.creator, [work.id]);
        break;
      }
      case "WorkPlayed": {
        const entry = this.entry(event.workId);
        entry.work = { ...entry.work, playCount: entry.work.playCount + 1 };
        break;
      }
      default:
        neverReached(event);
    }
  }

  private entry(workId: WorkId): WorkEntry {
    const entry = workId === NO_WORK ? undefined : this.entries.get(workId);
    if (entry === undefined) throw new WorkNotFoundError(workId);
    return entry;
  }
}
