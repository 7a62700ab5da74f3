import type { StateEntry } from '../session/session_state_machine';
import { FLAG_KEYS, readNumber, type FlagStore } from '../session/flag_store';
import { ACCESSORIES, COMPANION_COLORS, THEME_COLORS } from '../ui/panel_builder';
import { StatePlugin } from './state_plugin';

export interface CompanionPreferences {
    brightness: number;
    volume: number;
    scale: number;
    themeColor: number;
    companionColor: number;
    /** Index into ACCESSORIES, or -1 for none. */
    accessory: number;
}

export const DEFAULT_PREFERENCES: CompanionPreferences = {
    brightness: 1,
    volume: 0.5,
    scale: 2,
    themeColor: 0,
    companionColor: 0,
    accessory: -1,
};

const PREFERENCE_KEYS: Record<keyof CompanionPreferences, string> = {
    brightness: FLAG_KEYS.brightness,
    volume: FLAG_KEYS.volume,
    scale: FLAG_KEYS.scale,
    themeColor: FLAG_KEYS.themeColor,
    companionColor: FLAG_KEYS.companionColor,
    accessory: FLAG_KEYS.accessory,
};

export function loadPreferences(store: FlagStore): CompanionPreferences {
    const index = (key: string, fallback: number, count: number): number => {
        const value = Math.trunc(readNumber(store, key, fallback));
        return value >= -1 && value < count ? value : fallback;
    };
    return {
        brightness: readNumber(store, FLAG_KEYS.brightness, DEFAULT_PREFERENCES.brightness),
        volume: readNumber(store, FLAG_KEYS.volume, DEFAULT_PREFERENCES.volume),
        scale: readNumber(store, FLAG_KEYS.scale, DEFAULT_PREFERENCES.scale),
        themeColor: Math.max(0, index(FLAG_KEYS.themeColor, DEFAULT_PREFERENCES.themeColor, THEME_COLORS.length)),
        companionColor: Math.max(0, index(FLAG_KEYS.companionColor, DEFAULT_PREFERENCES.companionColor, COMPANION_COLORS.length)),
        accessory: index(FLAG_KEYS.accessory, DEFAULT_PREFERENCES.accessory, ACCESSORIES.length),
    };
}

/**
 * Companion appearance.  Every change is persisted and announced on
 * PREFERENCES_CHANGED; Done runs finish-customization, which also writes the
 * first-run flag on a fresh install.
 */
export class CustomizationPlugin extends StatePlugin<'Customization'> {
    public readonly name = 'CustomizationPlugin';
    public readonly state = 'Customization';

    private prefs: CompanionPreferences = { ...DEFAULT_PREFERENCES };

    public get preferences(): CompanionPreferences {
        return { ...this.prefs };
    }

    protected bind(): Array<() => void> {
        const panel = this.panel;
        if (!panel) return [];
        const h = panel.handles;
        return [
            h.brightness.onValueChanged.connect(value => this.update('brightness', value)),
            h.volume.onValueChanged.connect(value => this.update('volume', value)),
            h.scale.onValueChanged.connect(value => this.update('scale', value)),
            ...h.themeColors.map((button, i) => button.onClick.connect(() => this.update('themeColor', i))),
            ...h.companionColors.map((button, i) => button.onClick.connect(() => this.update('companionColor', i))),
            ...h.accessories.map((button, i) => button.onClick.connect(() =>
                this.update('accessory', this.prefs.accessory === i ? -1 : i))),
            h.finish.onClick.connect(() => this.context.session.dispatch('finish-customization')),
        ];
    }

    protected onEnter(_transition: StateEntry): void {
        this.prefs = { ...DEFAULT_PREFERENCES };
        this.withStore('loading preferences', store => {
            this.prefs = loadPreferences(store);
        });
        const panel = this.panel;
        if (!panel) return;
        const h = panel.handles;
        h.brightness.setValueWithoutNotify(this.prefs.brightness);
        h.volume.setValueWithoutNotify(this.prefs.volume);
        h.scale.setValueWithoutNotify(this.prefs.scale);
        this.render();
    }

    private update(key: keyof CompanionPreferences, value: number): void {
        if (this.prefs[key] === value) return;
        this.prefs[key] = value;
        this.withStore(`saving '${key}'`, store => store.set(PREFERENCE_KEYS[key], value));
        this.context.eventBus.publish('PREFERENCES_CHANGED', { key, value });
        this.render();
    }

    private render(): void {
        const panel = this.panel;
        if (!panel) return;
        const h = panel.handles;
        h.themeColors.forEach((button, i) => button.setSelected(i === this.prefs.themeColor));
        h.companionColors.forEach((button, i) => button.setSelected(i === this.prefs.companionColor));
        h.accessoryStatus.setText(`Accessory: ${ACCESSORIES[this.prefs.accessory] ?? 'None'}`);
    }
}
