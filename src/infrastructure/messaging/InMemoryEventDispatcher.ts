import type { IDomainEvent } from '../../domain/events/IDomainEvent.js';
import type { EventType, IEventDispatcher, IEventHandler } from '../../application/ports/IEventDispatcher.js';

export class InMemoryEventDispatcher implements IEventDispatcher {
    private handlers: Map<string, IEventHandler<IDomainEvent>[]> = new Map();

    async dispatch(event: IDomainEvent): Promise<void> {
        const eventName = event.constructor.name;
        const eventHandlers = this.handlers.get(eventName) || [];

        for (const handler of eventHandlers) {
            await handler.handle(event);
        }
    }

    subscribe<T extends IDomainEvent>(eventType: EventType<T>, handler: IEventHandler<T>): () => void {
        const wrapped: IEventHandler<IDomainEvent> = {
            handle: async (event) => {
                if (event instanceof eventType) {
                    await handler.handle(event);
                }
            },
        };

        const currentHandlers = this.handlers.get(eventType.name) || [];
        currentHandlers.push(wrapped);
        this.handlers.set(eventType.name, currentHandlers);

        return () => {
            const remaining = (this.handlers.get(eventType.name) || []).filter(h => h !== wrapped);
            this.handlers.set(eventType.name, remaining);
        };
    }

    getSubscriberCount(): number {
        let count = 0;
        this.handlers.forEach(handlers => count += handlers.length);
        return count;
    }
}
