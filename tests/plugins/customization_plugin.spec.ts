import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { FLAG_KEYS, MemoryFlagStore, type FlagValue } from '../../src/session/flag_store';
import { DEFAULT_PREFERENCES, loadPreferences } from '../../src/plugins/customization_plugin';
import { createHarness, type Harness } from '../helpers/session_harness';

// ─── Helpers ─────────────────────────────────────────────────────────────────

async function openSettings(flags: Record<string, FlagValue> = {}): Promise<Harness> {
    const harness = await createHarness({ flags: { [FLAG_KEYS.firstRunCompleted]: true, ...flags } });
    harness.context.session.dispatch('open-settings');
    return harness;
}

let harness: Harness | null = null;

afterEach(async () => {
    await harness?.session.teardown();
    harness = null;
    jest.restoreAllMocks();
});

describe('loadPreferences', () => {

    it('Given an empty store, Then the defaults are returned', () => {
        expect(loadPreferences(new MemoryFlagStore())).toEqual(DEFAULT_PREFERENCES);
    });

    it('Given out-of-range indices, Then they fall back to the defaults', () => {
        const store = new MemoryFlagStore({
            [FLAG_KEYS.themeColor]: 9,
            [FLAG_KEYS.companionColor]: -1,
            [FLAG_KEYS.accessory]: 4,
            [FLAG_KEYS.volume]: 0.2,
        });
        expect(loadPreferences(store)).toEqual({ ...DEFAULT_PREFERENCES, volume: 0.2 });
    });
});

describe('CustomizationPlugin', () => {

    it('Given stored preferences, When settings open, Then the widgets show them', async () => {
        harness = await openSettings({ [FLAG_KEYS.volume]: 0.2, [FLAG_KEYS.accessory]: 3, [FLAG_KEYS.themeColor]: 2 });
        const h = harness.context.panels.get('Customization')?.handles;

        expect(h?.volume.value).toBe(0.2);
        expect(h?.accessoryStatus.text).toBe('Accessory: Cape');
        expect(h?.themeColors.map(button => button.selected)).toEqual([false, false, true, false, false]);
        expect(harness.events.of('PREFERENCES_CHANGED')).toEqual([]);
    });

    it('Given a slider is moved, Then the value is persisted and announced', async () => {
        harness = await openSettings();
        harness.context.panels.get('Customization')?.handles.brightness.setValue(0.3);

        expect(harness.store.get(FLAG_KEYS.brightness)).toBe(0.3);
        expect(harness.events.of('PREFERENCES_CHANGED')).toEqual([{ key: 'brightness', value: 0.3 }]);
        expect(harness.session.plugins.customization.preferences.brightness).toBe(0.3);
    });

    it('Given a flag store that fails on write, When a slider is moved, Then the change still applies and the error is logged', async () => {
        harness = await openSettings();
        const failure = new Error('storage offline');
        jest.spyOn(harness.store, 'set').mockImplementation(() => {
            throw failure;
        });
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        harness.context.panels.get('Customization')?.handles.volume.setValue(0.8);

        expect(error).toHaveBeenCalledWith("[CustomizationPlugin] Flag store failed while saving 'volume'", failure);
        expect(harness.session.plugins.customization.preferences.volume).toBe(0.8);
        expect(harness.events.of('PREFERENCES_CHANGED')).toEqual([{ key: 'volume', value: 0.8 }]);
    });

    it('Given a flag store that fails on read, When settings open, Then the defaults are shown', async () => {
        harness = await createHarness({ flags: { [FLAG_KEYS.firstRunCompleted]: true, [FLAG_KEYS.volume]: 0.2 } });
        jest.spyOn(harness.store, 'get').mockImplementation(() => {
            throw new Error('storage offline');
        });
        jest.spyOn(console, 'error').mockImplementation(() => undefined);

        harness.context.session.dispatch('open-settings');
        expect(harness.session.plugins.customization.preferences).toEqual(DEFAULT_PREFERENCES);
        expect(harness.context.panels.get('Customization')?.handles.volume.value).toBe(DEFAULT_PREFERENCES.volume);
    });

    it('Given a companion colour is clicked, Then only that swatch is selected', async () => {
        harness = await openSettings();
        const h = harness.context.panels.get('Customization')?.handles;
        h?.companionColors[4]?.click();

        expect(h?.companionColors.map(button => button.selected)).toEqual([false, false, false, false, true]);
        expect(harness.store.get(FLAG_KEYS.companionColor)).toBe(4);
    });

    it('Given an accessory is clicked twice, Then it is worn and then removed', async () => {
        harness = await openSettings();
        const h = harness.context.panels.get('Customization')?.handles;

        h?.accessories[1]?.click();
        expect(h?.accessoryStatus.text).toBe('Accessory: Halo');
        h?.accessories[1]?.click();
        expect(h?.accessoryStatus.text).toBe('Accessory: None');
        expect(harness.store.get(FLAG_KEYS.accessory)).toBe(-1);
    });

    it('Given Done is clicked, Then the chat check-in follows', async () => {
        harness = await openSettings();
        harness.context.panels.get('Customization')?.handles.finish.click();
        expect(harness.context.session.state).toBe('ConnectionConfirm');
    });
});
