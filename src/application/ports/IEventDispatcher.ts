import type { IDomainEvent } from '../../domain/events/IDomainEvent.js';

export interface IEventHandler<T extends IDomainEvent> {
    handle(event: T): Promise<void>;
}

/**
 * Constructor of a domain event class, used as its subscription key.
 */
export type EventType<T extends IDomainEvent> = abstract new (...args: never[]) => T;

export interface IEventDispatcher {
    dispatch(event: IDomainEvent): Promise<void>;

    /**
     * Returns a function that removes the subscription.
     */
    subscribe<T extends IDomainEvent>(
        eventType: EventType<T>,
        handler: IEventHandler<T>
    ): () => void;
}
