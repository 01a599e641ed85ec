import logger from '../utils/logger';
import { generateEventId } from '../utils/id';
import type { Clock } from './clock';
import { Journal, StateList } from './journal';

export type EventArgs = Readonly<Record<string, unknown>>;

export interface ProtocolEvent {
    readonly id: string;
    readonly name: string;
    readonly emitter: string;
    readonly timestamp: number;
    readonly args: EventArgs;
}

const renderArgs = (args: EventArgs): string =>
    Object.entries(args)
        .map(([key, value]) => `${key}=${String(value)}`)
        .join(' ');

/**
 * Append-only log of protocol events. Events emitted inside a call that later
 * reverts are removed with it; the debug log line is written on commit only.
 */
export class EventLog {
    private readonly events: StateList<ProtocolEvent>;

    constructor(private readonly journal: Journal, private readonly clock: Clock) {
        this.events = new StateList(journal);
    }

    emit(emitter: string, name: string, args: EventArgs = {}): ProtocolEvent {
        const event: ProtocolEvent = {
            id: generateEventId(),
            name,
            emitter,
            timestamp: this.clock.now(),
            args,
        };
        this.events.push(event);
        this.journal.onCommit(() => {
            logger.debug(`${emitter} EVENT ${name} ${renderArgs(args)}`);
        });
        return event;
    }

    all(): readonly ProtocolEvent[] {
        return this.events.toArray();
    }

    filter(name: string): ProtocolEvent[] {
        return this.events.toArray().filter((event) => event.name === name);
    }

    get length(): number {
        return this.events.length;
    }
}
