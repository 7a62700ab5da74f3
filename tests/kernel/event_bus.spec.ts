import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { EventBus, type SessionEvents } from '../../src/kernel/event_bus';

describe('EventBus: publish / subscribe', () => {
    let bus: EventBus<SessionEvents>;

    beforeEach(() => {
        bus = new EventBus<SessionEvents>();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('Given no listeners, When publishing, Then returns false', () => {
        expect(bus.publish('HAND_PRESENCE', { detected: true })).toBe(false);
    });

    it('Given a listener, When publishing, Then it receives the payload and publish returns true', () => {
        const received: boolean[] = [];
        bus.subscribe('HAND_PRESENCE', ({ detected }) => received.push(detected));

        expect(bus.publish('HAND_PRESENCE', { detected: true })).toBe(true);
        expect(received).toEqual([true]);
    });

    it('Given the returned disposer is called, When publishing, Then the listener is not called', () => {
        const listener = jest.fn();
        const dispose = bus.subscribe('ORB_ACTIVATED', listener);
        dispose();

        bus.publish('ORB_ACTIVATED', { orbIndex: 1 });
        expect(listener).not.toHaveBeenCalled();
        expect(bus.listenerCount('ORB_ACTIVATED')).toBe(0);
    });

    it('Given a listener that throws, When publishing, Then later listeners still run and the error is logged', () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const after = jest.fn();
        bus.subscribe('GESTURE', () => {
            throw new Error('boom');
        });
        bus.subscribe('GESTURE', after);

        bus.publish('GESTURE', { gestureType: 'comfort', confidence: 0.9 });

        expect(after).toHaveBeenCalledWith({ gestureType: 'comfort', confidence: 0.9 });
        expect(error).toHaveBeenCalledTimes(1);
        expect(error.mock.calls[0]?.[0]).toBe("[EventBus] Listener for 'GESTURE' threw; continuing delivery");
    });

    it('Given a listener that unsubscribes itself mid-dispatch, When publishing, Then the other listener still runs once', () => {
        const other = jest.fn();
        const dispose = bus.subscribe('TASK_PROMPT', () => dispose());
        bus.subscribe('TASK_PROMPT', other);

        bus.publish('TASK_PROMPT', { text: 'hello', source: 'system' });
        bus.publish('TASK_PROMPT', { text: 'again', source: 'system' });

        expect(other).toHaveBeenCalledTimes(2);
        expect(bus.listenerCount('TASK_PROMPT')).toBe(1);
    });

    it('Given two buses, When publishing on one, Then the other never sees it', () => {
        const other = new EventBus<SessionEvents>();
        const listener = jest.fn();
        other.subscribe('HAND_PRESENCE', listener);

        bus.publish('HAND_PRESENCE', { detected: false });
        expect(listener).not.toHaveBeenCalled();
    });
});
