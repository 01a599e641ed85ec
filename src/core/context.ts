import { createConfig, type ProtocolConfig } from '../config/protocol';
import { TokenBank } from '../tokens/tokenBank';
import { SystemClock, type Clock } from './clock';
import { EventLog } from './events';
import { Journal } from './journal';

/**
 * Shared execution environment of one protocol instance. Every component of
 * the same instance writes through the same journal, so a call spanning
 * several components reverts as one unit.
 */
export interface ProtocolContext {
    readonly journal: Journal;
    readonly clock: Clock;
    readonly tokens: TokenBank;
    readonly events: EventLog;
    readonly config: ProtocolConfig;
}

export interface ContextOptions {
    clock?: Clock;
    config?: ProtocolConfig;
}

export function createContext(options: ContextOptions = {}): ProtocolContext {
    const journal = new Journal();
    const clock = options.clock ?? new SystemClock();
    return {
        journal,
        clock,
        tokens: new TokenBank(journal),
        events: new EventLog(journal, clock),
        config: options.config ?? createConfig(),
    };
}
