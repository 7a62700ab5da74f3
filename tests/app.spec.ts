import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { createHealingSession } from '../src/app';
import { FLAG_KEYS, MemoryFlagStore } from '../src/session/flag_store';
import type { SessionEvents } from '../src/kernel/event_bus';
import { CustomizationPlugin } from '../src/plugins/customization_plugin';
import { TreeControlPlugin } from '../src/plugins/tree_control_plugin';
import { TEST_CONFIG } from './helpers/session_harness';

beforeEach(() => {
    jest.useFakeTimers();
});

afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
});

describe('createHealingSession', () => {

    it('Given default options, When created, Then every controller is running and Welcome shows', async () => {
        const session = await createHealingSession({ config: TEST_CONFIG });

        expect(session.supervisor.getState()).toBe('RUNNING');
        expect(session.context.session.state).toBe('Welcome');
        expect(session.context.pal.has('flagStore')).toBe(true);
        expect(session.context.pal.has('chatClient')).toBe(false);
        await session.teardown();
    });

    it('Given a running exercise, When torn down, Then no timer, panel or collaborator is left', async () => {
        const session = await createHealingSession({
            config: TEST_CONFIG,
            flagStore: new MemoryFlagStore({ [FLAG_KEYS.firstRunCompleted]: true }),
        });
        session.context.session.dispatch('select-breathing');
        expect(jest.getTimerCount()).toBe(1);

        await session.teardown();

        expect(jest.getTimerCount()).toBe(0);
        expect(session.supervisor.getState()).toBe('DESTROYED');
        expect(session.context.visibility.visiblePrimaries()).toEqual([]);
        expect(session.context.session.state).toBeNull();
        expect(session.context.pal.has('flagStore')).toBe(false);
        expect(session.plugins.breathing.isActive).toBe(false);
    });

    it('Given a torn-down session, When tracker input arrives, Then it is dropped', async () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const session = await createHealingSession({ config: TEST_CONFIG });
        await session.teardown();
        expect(session.gestures.ingestGesture({ gestureType: 'comfort', confidence: 1 })).toBe(false);
    });

    it('Given a controller that fails to init, When created, Then the session still runs and its state is refused', async () => {
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        jest.spyOn(TreeControlPlugin.prototype, 'init').mockImplementation(() => {
            throw new Error('tree assets missing');
        });
        const session = await createHealingSession({
            config: TEST_CONFIG,
            flagStore: new MemoryFlagStore({ [FLAG_KEYS.firstRunCompleted]: true }),
        });
        const rejected: Array<SessionEvents['SESSION_TRANSITION_REJECTED']> = [];
        session.context.eventBus.subscribe('SESSION_TRANSITION_REJECTED', event => rejected.push(event));

        expect(session.supervisor.getState()).toBe('RUNNING');
        expect(session.supervisor.isHealthy('TreeControlPlugin')).toBe(false);
        expect(session.context.session.state).toBe('MainMenu');

        expect(session.context.session.dispatch('select-tree')).toBe(false);
        expect(rejected).toEqual([{
            from: 'MainMenu',
            trigger: 'select-tree',
            reason: "state 'TreeControl' is disabled (TreeControlPlugin failed to init: tree assets missing)",
        }]);
        expect(session.context.visibility.visiblePrimaries()).toEqual(['MainMenu']);
        expect(session.context.session.dispatch('select-history')).toBe(true);
        await session.teardown();
    });

    it('Given the customization controller fails to start on a fresh install, When Welcome completes, Then onboarding continues to the check-in', async () => {
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        jest.spyOn(CustomizationPlugin.prototype, 'start').mockImplementation(() => {
            throw new Error('bind failed');
        });
        const store = new MemoryFlagStore();
        const session = await createHealingSession({ config: TEST_CONFIG, flagStore: store });

        expect(session.context.session.dispatch('welcome-complete')).toBe(true);
        expect(session.context.session.state).toBe('ConnectionConfirm');
        expect(store.get(FLAG_KEYS.firstRunCompleted)).toBe(true);
        await session.teardown();
    });

    it('Given an invalid config, When created, Then creation fails before anything is built', async () => {
        await expect(createHealingSession({ config: { tick_ms: 0 } })).rejects.toThrow(/tick_ms/);
    });
});
