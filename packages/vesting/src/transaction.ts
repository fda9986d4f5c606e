/**
 * Journaled state store.
 *
 * A component keeps all of its mutable state in one store. `transact`
 * hands the operation a Journal; the operation saves each record, map
 * entry, array length or set member before changing it, and the journal
 * undoes those saves in reverse order if the operation throws. The
 * state object's own fields are saved for every operation.
 */

export class Journal {
  private readonly undo: (() => void)[] = [];

  /** Save a record's own fields. Returns the record. */
  save<O extends object>(target: O): O {
    const saved = { ...target };
    this.undo.push(() => {
      Object.assign(target, saved);
    });
    return target;
  }

  /** Save the value stored under `key`, or its absence. */
  saveEntry<K, V>(map: Map<K, V>, key: K): void {
    const previous = map.get(key);
    this.undo.push(() => {
      if (previous === undefined) {
        map.delete(key);
      } else {
        map.set(key, previous);
      }
    });
  }

  /** Save an array's length, so appended items are dropped on rollback. */
  saveLength<T>(items: T[]): void {
    const length = items.length;
    this.undo.push(() => {
      items.splice(length);
    });
  }

  /** Save whether `value` is in the set. */
  saveMember<V>(set: Set<V>, value: V): void {
    const present = set.has(value);
    this.undo.push(() => {
      if (present) {
        set.add(value);
      } else {
        set.delete(value);
      }
    });
  }

  rollback(): void {
    for (let i = this.undo.length - 1; i >= 0; i--) {
      this.undo[i]?.();
    }
    this.undo.length = 0;
  }
}

export class TransactionalStore<S extends object> {
  private readonly current: S;

  constructor(initial: S) {
    this.current = initial;
  }

  /** Current committed state. Callers must not mutate it. */
  read(): S {
    return this.current;
  }

  transact<T>(fn: (state: S, journal: Journal) => T): T {
    const journal = new Journal();
    journal.save(this.current);
    try {
      return fn(this.current, journal);
    } catch (err) {
      journal.rollback();
      throw err;
    }
  }
}
