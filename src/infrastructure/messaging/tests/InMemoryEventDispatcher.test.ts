import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryEventDispatcher } from '../InMemoryEventDispatcher.js';
import { PetLogChanged } from '../../../domain/events/PetLogChanged.js';
import type { IDomainEvent } from '../../../domain/events/IDomainEvent.js';
import type { IEventHandler } from '../../../application/ports/IEventDispatcher.js';

class UnrelatedEvent implements IDomainEvent {
    dateTimeOccurred = new Date();

    getAggregateId(): string {
        return 'unrelated';
    }
}

describe('InMemoryEventDispatcher', () => {
    let dispatcher: InMemoryEventDispatcher;
    let received: PetLogChanged[];
    let handler: IEventHandler<PetLogChanged>;

    beforeEach(() => {
        dispatcher = new InMemoryEventDispatcher();
        received = [];
        handler = {
            handle: async (event) => {
                received.push(event);
            },
        };
    });

    it('should deliver events to handlers subscribed to their class', async () => {
        dispatcher.subscribe(PetLogChanged, handler);

        const event = new PetLogChanged('created', 'pet', 'p-1');
        await dispatcher.dispatch(event);

        expect(received).toEqual([event]);
        expect(event.getAggregateId()).toBe('p-1');
    });

    it('should not deliver events of other classes', async () => {
        dispatcher.subscribe(PetLogChanged, handler);

        await dispatcher.dispatch(new UnrelatedEvent());

        expect(received).toEqual([]);
    });

    it('should stop delivering after unsubscribe', async () => {
        const unsubscribe = dispatcher.subscribe(PetLogChanged, handler);
        expect(dispatcher.getSubscriberCount()).toBe(1);

        unsubscribe();
        await dispatcher.dispatch(new PetLogChanged('deleted', 'pet', 'p-1'));

        expect(received).toEqual([]);
        expect(dispatcher.getSubscriberCount()).toBe(0);
    });

    it('should propagate handler failures to the caller', async () => {
        dispatcher.subscribe(PetLogChanged, {
            handle: async () => {
                throw new Error('handler failed');
            },
        });

        await expect(dispatcher.dispatch(new PetLogChanged('reloaded', 'snapshot', null))).rejects.toThrow('handler failed');
    });

    it('should key snapshot events by a fixed aggregate id', () => {
        expect(new PetLogChanged('reloaded', 'snapshot', null).getAggregateId()).toBe('snapshot');
    });
});
