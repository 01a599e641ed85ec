/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * JOURNAL — ATOMIC STATE TRANSITIONS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * PURPOSE:
 * Every persistent cell of the protocol (slot, map, list) records an undo entry
 * into the journal when it is written inside an atomic frame. A frame that
 * throws replays its undo entries in reverse and re-throws: either the whole
 * operation applies or none of it does.
 *
 * INVARIANTS:
 * - Frames nest. A failed inner frame reverts only its own writes; the outer
 *   frame decides whether to catch or propagate.
 * - Commit hooks queued inside a frame run only when the outermost frame
 *   succeeds. Hooks of a reverted frame are discarded.
 * - Writes outside any frame apply immediately and are not journaled.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

type Undo = () => void;
type CommitHook = () => void;

export class Journal {
    private undoLog: Undo[] = [];
    private commitHooks: CommitHook[] = [];
    private depth = 0;

    get inFrame(): boolean {
        return this.depth > 0;
    }

    record(undo: Undo): void {
        if (this.depth > 0) {
            this.undoLog.push(undo);
        }
    }

    onCommit(hook: CommitHook): void {
        if (this.depth === 0) {
            hook();
            return;
        }
        this.commitHooks.push(hook);
    }

    atomic<T>(fn: () => T): T {
        const undoMark = this.undoLog.length;
        const hookMark = this.commitHooks.length;
        this.depth += 1;

        let result: T;
        try {
            result = fn();
        } catch (error) {
            this.depth -= 1;
            this.rollback(undoMark);
            this.commitHooks.length = hookMark;
            throw error;
        }

        this.depth -= 1;
        if (this.depth === 0) {
            this.undoLog.length = 0;
            const hooks = this.commitHooks.splice(0);
            for (const hook of hooks) {
                hook();
            }
        }
        return result;
    }

    private rollback(mark: number): void {
        while (this.undoLog.length > mark) {
            const undo = this.undoLog.pop();
            if (undo) undo();
        }
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// JOURNALED CELLS
// ═══════════════════════════════════════════════════════════════════════════════

export class StateSlot<T> {
    constructor(private readonly journal: Journal, private value: T) {}

    get(): T {
        return this.value;
    }

    set(next: T): void {
        const previous = this.value;
        if (Object.is(previous, next)) return;
        this.value = next;
        this.journal.record(() => {
            this.value = previous;
        });
    }
}

// Values may not be undefined: an undefined read means "no entry".
export class StateMap<K, V extends {} | null> {
    private readonly entries = new Map<K, V>();

    constructor(private readonly journal: Journal) {}

    get size(): number {
        return this.entries.size;
    }

    has(key: K): boolean {
        return this.entries.has(key);
    }

    get(key: K): V | undefined {
        return this.entries.get(key);
    }

    getOr(key: K, fallback: V): V {
        const value = this.entries.get(key);
        return value === undefined ? fallback : value;
    }

    set(key: K, value: V): void {
        const previous = this.entries.get(key);
        this.entries.set(key, value);
        this.journal.record(() => {
            if (previous !== undefined) {
                this.entries.set(key, previous);
            } else {
                this.entries.delete(key);
            }
        });
    }

    delete(key: K): void {
        const previous = this.entries.get(key);
        if (previous === undefined) return;
        this.entries.delete(key);
        this.journal.record(() => {
            this.entries.set(key, previous);
        });
    }

    keys(): K[] {
        return [...this.entries.keys()];
    }

    values(): V[] {
        return [...this.entries.values()];
    }
}

export class StateList<T> {
    private readonly items: T[] = [];

    constructor(private readonly journal: Journal) {}

    get length(): number {
        return this.items.length;
    }

    push(item: T): void {
        this.items.push(item);
        this.journal.record(() => {
            this.items.pop();
        });
    }

    toArray(): readonly T[] {
        return [...this.items];
    }
}
