import { describe, it, expect, jest } from '@jest/globals';
import { ConfigManager, ConfigValidationError, DEFAULT_CONFIG } from '../../src/kernel/config';

describe('ConfigManager', () => {
    it('Given no overrides, When constructed, Then holds the defaults', () => {
        const manager = new ConfigManager();
        expect(manager.get()).toEqual(DEFAULT_CONFIG);
    });

    it('Given overrides, When constructed, Then merges them over the defaults', () => {
        const manager = new ConfigManager({ tick_ms: 50, chat_context_window: 2 });
        const config = manager.get();
        expect(config.tick_ms).toBe(50);
        expect(config.chat_context_window).toBe(2);
        expect(config.breathing_cycles).toBe(4);
    });

    it('Given an invalid override, When constructed, Then throws ConfigValidationError listing the field', () => {
        expect(() => new ConfigManager({ tick_ms: -1 })).toThrow(ConfigValidationError);
        try {
            new ConfigManager({ gesture_confidence_threshold: 2 });
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigValidationError);
            if (error instanceof ConfigValidationError) {
                expect(error.issues).toHaveLength(1);
                expect(error.issues[0]).toMatch(/^gesture_confidence_threshold: /);
            }
        }
    });

    it('Given get() result is mutated, When get() is called again, Then the stored config is unchanged', () => {
        const manager = new ConfigManager();
        const copy = manager.get();
        copy.tick_ms = 9999;
        expect(manager.get().tick_ms).toBe(100);
    });

    it('Given a subscriber, When update() succeeds, Then it is called immediately and again with the new config', () => {
        const manager = new ConfigManager();
        const listener = jest.fn();
        manager.subscribe(listener);
        manager.update({ comfort_cooldown_ms: 500 });

        expect(listener).toHaveBeenCalledTimes(2);
        expect(listener).toHaveBeenLastCalledWith({ ...DEFAULT_CONFIG, comfort_cooldown_ms: 500 });
    });

    it('Given an invalid update, When applied, Then throws and keeps the previous config without notifying', () => {
        const manager = new ConfigManager();
        const listener = jest.fn();
        manager.subscribe(listener);

        expect(() => manager.update({ breathing_cycles: 0 })).toThrow(/\[ConfigManager\] Invalid config: breathing_cycles/);
        expect(manager.get().breathing_cycles).toBe(4);
        expect(listener).toHaveBeenCalledTimes(1);
    });

    it('Given an unsubscribed listener, When update() runs, Then it is not called', () => {
        const manager = new ConfigManager();
        const listener = jest.fn();
        const dispose = manager.subscribe(listener);
        dispose();
        manager.update({ tick_ms: 200 });
        expect(listener).toHaveBeenCalledTimes(1);
    });
});
