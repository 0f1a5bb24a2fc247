/**
 * Identity registry — creators and consumers, independent namespaces.
 * Command methods return the event to append and never mutate; apply() does.
 */

import { asCreatorId, type CreatorId, type Identity, type Timestamp } from "./core.js";
import { AlreadyRegisteredError } from "./errors.js";
import type { ConsumerRegistered, CreatorRegistered, RegistryEvent } from "./events.js";
import { invariant, neverReached } from "./validation.js";

export interface Creator {
  readonly id: CreatorId;
  readonly identity: Identity;
  readonly name: string;
  readonly profileRef: string;
}

export interface Consumer {
  readonly identity: Identity;
  readonly name: string;
  readonly profileRef: string;
}

export class IdentityRegistry {
  private readonly creators = new Map<Identity, Creator>();
  private readonly creatorsById = new Map<CreatorId, Creator>();
  private readonly consumers = new Map<Identity, Consumer>();

  get creatorCount(): number {
    return this.creators.size;
  }

  get consumerCount(): number {
    return this.consumers.size;
  }

  isRegisteredCreator(identity: Identity): boolean {
    return this.creators.has(identity);
  }

  isRegisteredConsumer(identity: Identity): boolean {
    return this.consumers.has(identity);
  }

  getCreator(identity: Identity): Creator | undefined {
    return this.creators.get(identity);
  }

  creatorById(id: CreatorId): Creator | undefined {
    return this.creatorsById.get(id);
  }

  getConsumer(identity: Identity): Consumer | undefined {
    return this.consumers.get(identity);
  }

  /** Next creator id is count + 1; ids are never reused since creators are never removed. */
  registerCreator(identity: Identity, name: string, profileRef: string, timestamp: Timestamp): CreatorRegistered {
    if (this.creators.has(identity)) throw new AlreadyRegisteredError("creator", identity);
    return {
      type: "CreatorRegistered",
      creatorId: asCreatorId(this.creators.size + 1),
      identity,
      name,
      profileRef,
      timestamp,
      version: 0,
    };
  }

  registerConsumer(identity: Identity, name: string, profileRef: string, timestamp: Timestamp): ConsumerRegistered {
    if (this.consumers.has(identity)) throw new AlreadyRegisteredError("consumer", identity);
    return { type: "ConsumerRegistered", identity, name, profileRef, timestamp, version: 0 };
  }

  apply(event: RegistryEvent): void {
    switch (event.type) {
      case "CreatorRegistered": {
        invariant(!this.creators.has(event.identity), `creator ${event.identity} registered twice`);
        invariant(event.creatorId === this.creators.size + 1, `creator id ${event.creatorId} out of sequence`);
        const creator: Creator = {
          id: event.creatorId,
          identity: event.identity,
          name: event.name,
          profileRef: event.profileRef,
        };
        this.creators.set(creator.identity, creator);
        this.creatorsById.set(creator.id, creator);
        break;
      }
      case "ConsumerRegistered":
        invariant(!this.consumers.has(event.identity), `consumer ${event.identity} registered twice`);
        this.consumers.set(event.identity, {
          identity: event.identity,
          name: event.name,
          profileRef: event.profileRef,
        });
        break;
      default:
        neverReached(event);
    }
  }
}
