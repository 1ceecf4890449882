/**
 * Events driven through a state machine
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Priority carried by an event (informational, the queue stays FIFO)
 */
export enum EventPriority {
  LOW = 0,
  NORMAL = 1,
  HIGH = 2,
  CRITICAL = 3,
}

export type EventMetadata = Readonly<Record<string, unknown>>;

interface EventInit {
  name: string;
  payload?: unknown;
  timestamp?: Date;
  id?: string;
  priority?: EventPriority;
  metadata?: EventMetadata;
}

/**
 * Immutable event record
 *
 * Derived copies share the payload by reference.
 */
export class Event {
  readonly name: string;
  readonly payload: unknown;
  readonly timestamp: Date;
  readonly id: string;
  readonly priority: EventPriority;
  readonly metadata: EventMetadata;

  constructor(init: EventInit) {
    this.name = init.name;
    this.payload = init.payload;
    this.timestamp = init.timestamp ?? new Date();
    this.id = init.id ?? uuidv4();
    this.priority = init.priority ?? EventPriority.NORMAL;
    this.metadata = Object.freeze({ ...(init.metadata ?? {}) });
    Object.freeze(this);
  }

  static create(name: string, payload?: unknown): Event {
    return new Event({ name, payload });
  }

  withPriority(priority: EventPriority): Event {
    return new Event({ ...this.toInit(), priority });
  }

  withMetadata(key: string, value: unknown): Event {
    return new Event({ ...this.toInit(), metadata: { ...this.metadata, [key]: value } });
  }

  /**
   * Same event under another name, used when mapping events into a sub-machine
   */
  rename(name: string): Event {
    return new Event({ ...this.toInit(), name, id: uuidv4() });
  }

  getMetadata(key: string): unknown {
    return this.metadata[key];
  }

  hasMetadata(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.metadata, key);
  }

  clone(): Event {
    return new Event(this.toInit());
  }

  private toInit(): EventInit {
    return {
      name: this.name,
      payload: this.payload,
      timestamp: this.timestamp,
      id: this.id,
      priority: this.priority,
      metadata: this.metadata,
    };
  }
}
