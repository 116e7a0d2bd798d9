// Sale runtime: events
// Contracts buffer events while an operation runs and publish them only when
// it commits, so observers never see events from a rolled-back operation.
// A listener that throws is reported and skipped; it cannot undo the commit.

import type { Address } from 'viem';

import { createLogger, type Logger } from './logger';
import { describeRevert } from './Revert';

export type EventValue = Address | bigint | boolean | number | string;
export type EventData = Readonly<Record<string, EventValue>>;

export abstract class NetEvent<T extends EventData = EventData> {
    protected constructor(
        public readonly name: string,
        public readonly data: T,
    ) {}
}

export type EventListener = (event: NetEvent) => void;

export type ListenerErrorHandler = (error: unknown, event: NetEvent) => void;

function logListenerError(log: Logger): ListenerErrorHandler {
    return (error: unknown, event: NetEvent) => {
        log.error('Event listener failed', {
            event: event.name,
            error: describeRevert(error),
        });
    };
}

export class EventLog {
    private readonly history: NetEvent[] = [];
    private readonly listeners: Set<EventListener> = new Set();

    public constructor(
        private readonly onListenerError: ListenerErrorHandler = logListenerError(createLogger('EventLog')),
    ) {}

    public get entries(): ReadonlyArray<NetEvent> {
        return this.history;
    }

    /**
     * Subscribe to committed events. Returns the unsubscribe function.
     */
    public subscribe(listener: EventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    public named(name: string): NetEvent[] {
        return this.history.filter((event: NetEvent) => event.name === name);
    }

    public publish(events: ReadonlyArray<NetEvent>): void {
        for (const event of events) {
            this.history.push(event);
            for (const listener of this.listeners) {
                try {
                    listener(event);
                } catch (error: unknown) {
                    this.onListenerError(error, event);
                }
            }
        }
    }
}
