// backend/services/blog/src/models/BaseEntity.ts
import { randomUUID } from "node:crypto";

/** Identity + audit timestamps, for building new entities or rehydrating rows. */
export interface EntityInit {
  id?: string;
  createdAt?: Date;
  updatedAt?: Date;
}

export abstract class BaseEntity {
  readonly id: string;
  readonly createdAt: Date;
  updatedAt: Date;

  protected constructor(init: EntityInit = {}) {
    const createdAt = init.createdAt ?? new Date();
    this.id = init.id ?? randomUUID();
    this.createdAt = createdAt;
    this.updatedAt = init.updatedAt ?? new Date(createdAt.getTime());
  }

  /** Mark a mutation. `updatedAt` never moves backwards. */
  touch(now: Date = new Date()): void {
    if (now.getTime() > this.updatedAt.getTime()) {
      this.updatedAt = now;
    }
  }
}
