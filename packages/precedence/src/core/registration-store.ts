/*
 * RegistrationStore
 * -----------------
 * Ordered map of registration id -> Registration used by Catalog.
 *
 * Responsibilities
 *  - keep registrations in registration order (the iteration order
 *    lookupByType() exposes)
 *  - apply the catalog's duplicate policy when an id is registered twice
 *
 * A replaced registration keeps the position of the one it replaces.
 */
import { DuplicateRegistrationError } from '../errors/index.js';
import type {
  Constructor,
  DuplicatePolicy,
  ProducerMethodMetadata,
  RegistrationId,
} from '../types/index.js';

/**
 * Internal record describing one registration.
 *
 *  - id: registration identity
 *  - type: declared type (class, value constructor, or producer `type`)
 *  - ctor: set for class registrations
 *  - producer: set for producer registrations
 *  - instance: materialized component, once created
 */
export type Registration = {
  readonly id: RegistrationId;
  readonly type: Constructor;
  readonly ctor?: Constructor;
  readonly producer?: ProducerMethodMetadata;
  instance?: object;
};

export class RegistrationStore {
  private readonly entries = new Map<RegistrationId, Registration>();

  constructor(
    private readonly catalogName: string,
    private readonly policy: DuplicatePolicy = 'error'
  ) {}

  get size(): number {
    return this.entries.size;
  }

  get(id: RegistrationId): Registration | undefined {
    return this.entries.get(id);
  }

  has(id: RegistrationId): boolean {
    return this.entries.has(id);
  }

  /**
   * Registration ids in registration order.
   */
  ids(): RegistrationId[] {
    return Array.from(this.entries.keys());
  }

  values(): IterableIterator<Registration> {
    return this.entries.values();
  }

  /**
   * Add a registration.
   *
   * @throws DuplicateRegistrationError if the id exists and the policy is 'error'
   */
  add(entry: Registration): void {
    if (this.entries.has(entry.id)) {
      if (this.policy === 'error') {
        throw new DuplicateRegistrationError(entry.id, this.catalogName);
      }
      if (this.policy === 'warn') {
        console.warn(
          `[precedence] Registration '${entry.id}' replaced in catalog '${this.catalogName}'.`
        );
      }
    }
    this.entries.set(entry.id, entry);
  }
}
