import { ProtocolError, type ErrorCode } from './errors';
import { Journal, StateMap, StateSlot } from './journal';

/**
 * Journaled set with a fixed capacity, O(1) insert and O(1) swap-remove.
 * Iteration order is insertion order until a removal moves the last element
 * into the vacated slot.
 */
export class BoundedSet<T extends string> {
    private readonly slots: StateMap<number, T>;
    private readonly indexOf: StateMap<T, number>;
    private readonly count: StateSlot<number>;

    constructor(
        journal: Journal,
        readonly capacity: number,
        private readonly overflowCode: ErrorCode
    ) {
        this.slots = new StateMap(journal);
        this.indexOf = new StateMap(journal);
        this.count = new StateSlot(journal, 0);
    }

    get size(): number {
        return this.count.get();
    }

    has(item: T): boolean {
        return this.indexOf.has(item);
    }

    /** Returns false when the item was already present. */
    insert(item: T): boolean {
        if (this.indexOf.has(item)) return false;
        const size = this.count.get();
        if (size >= this.capacity) {
            throw new ProtocolError(this.overflowCode, `set is full (${this.capacity})`, { item });
        }
        this.slots.set(size, item);
        this.indexOf.set(item, size);
        this.count.set(size + 1);
        return true;
    }

    /** Returns false when the item was not present. */
    remove(item: T): boolean {
        const index = this.indexOf.get(item);
        if (index === undefined) return false;
        const lastIndex = this.count.get() - 1;
        const last = this.slots.get(lastIndex);
        if (last !== undefined && index !== lastIndex) {
            this.slots.set(index, last);
            this.indexOf.set(last, index);
        }
        this.slots.delete(lastIndex);
        this.indexOf.delete(item);
        this.count.set(lastIndex);
        return true;
    }

    toArray(): T[] {
        const items: T[] = [];
        for (let i = 0; i < this.count.get(); i++) {
            const item = this.slots.get(i);
            if (item !== undefined) items.push(item);
        }
        return items;
    }
}
