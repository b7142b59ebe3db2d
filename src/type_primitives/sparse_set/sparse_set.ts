/***
 *
 * SparseSet — O(1) integer-keyed storage with cache-friendly dense values
 *
 * Keys are non-negative integers (entity IDs in practice). Two parallel
 * dense arrays (ids and values) are packed at 0..size-1 for fast linear
 * iteration. A sparse number[] maps id → dense index, or ABSENT.
 *
 * Removal is swap-and-pop: the last dense slot moves into the hole, so
 * dense order is NOT stable across removals. After a removal, trailing
 * ABSENT entries are trimmed so the sparse array never outgrows the
 * highest id still present.
 *
 * get() does no membership check. Callers pair it with has().
 *
 ***/

import { ABSENT } from "utils/constants";
import { extend_number_array, trim_trailing } from "utils/arrays";
import { is_non_negative_integer } from "../assertions";
import { TYPE_ERROR, TypeError } from "../error";

export class SparseSet<T, ID extends number = number> {
  private readonly _sparse: number[] = [];
  private readonly _dense: T[] = [];
  private readonly _dense_ids: ID[] = [];

  get size(): number {
    return this._dense.length;
  }

  /** Live view of member ids, parallel to `values`. Do not mutate. */
  get ids(): readonly ID[] {
    return this._dense_ids;
  }

  /** Live view of stored values, parallel to `ids`. */
  get values(): readonly T[] {
    return this._dense;
  }

  get sparse_length(): number {
    return this._sparse.length;
  }

  /** False for any key never added, including negative and fractional ones. */
  has(id: ID): boolean {
    const row = this._sparse[id];
    return row !== undefined && row !== ABSENT;
  }

  /**
   * Insert a value for `id`. Returns false (and changes nothing) if
   * `id` is already present. O(1) amortised.
   */
  add(id: ID, value: T): boolean {
    if (this.has(id)) return false;
    if (__DEV__ && !is_non_negative_integer(id)) {
      throw new TypeError(
        TYPE_ERROR.VALIDATION_FAIL_CONDITION,
        "SparseSet keys must be non-negative integers",
        { id },
      );
    }
    extend_number_array(this._sparse, id + 1, ABSENT);
    this._sparse[id] = this._dense.length;
    this._dense.push(value);
    this._dense_ids.push(id);
    return true;
  }

  /** Precondition: has(id). Unchecked. */
  get(id: ID): T {
    return this._dense[this._sparse[id]];
  }

  try_get(id: ID): T | undefined {
    return this.has(id) ? this._dense[this._sparse[id]] : undefined;
  }

  /** Overwrite the value of a present id. False if absent. */
  set(id: ID, value: T): boolean {
    if (!this.has(id)) return false;
    this._dense[this._sparse[id]] = value;
    return true;
  }

  /**
   * Remove `id` via swap-and-pop. O(1) plus the sentinel trim.
   * Returns true if the id was present, false if it was absent.
   */
  remove(id: ID): boolean {
    if (!this.has(id)) return false;
    const row = this._sparse[id];
    const last = this._dense.length - 1;

    if (row !== last) {
      const moved_id = this._dense_ids[last];
      this._dense[row] = this._dense[last];
      this._dense_ids[row] = moved_id;
      this._sparse[moved_id] = row;
    }
    this._dense.pop();
    this._dense_ids.pop();

    this._sparse[id] = ABSENT;
    trim_trailing(this._sparse, ABSENT);
    return true;
  }

  clear(): void {
    this._sparse.length = 0;
    this._dense.length = 0;
    this._dense_ids.length = 0;
  }

  for_each(fn: (id: ID, value: T) => void): void {
    for (let i = 0; i < this._dense_ids.length; i++) {
      fn(this._dense_ids[i], this._dense[i]);
    }
  }

  *[Symbol.iterator](): IterableIterator<[ID, T]> {
    for (let i = 0; i < this._dense_ids.length; i++) {
      yield [this._dense_ids[i], this._dense[i]];
    }
  }
}
