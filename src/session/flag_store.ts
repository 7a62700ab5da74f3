/**
 * Persisted key-value store for session flags.  The host supplies the real
 * implementation (device preferences, localStorage, a file); the core reads
 * and writes single booleans and numbers synchronously.
 */

export type FlagValue = boolean | number;

export interface FlagStore {
    get(key: string): FlagValue | undefined;
    set(key: string, value: FlagValue): void;
}

export const FLAG_KEYS = {
    firstRunCompleted: 'first_run_completed',
    totalNutrients: 'total_nutrients',
    anxietyLevel: 'anxiety_level',
    brightness: 'pref_brightness',
    volume: 'pref_volume',
    scale: 'pref_scale',
    themeColor: 'pref_theme_color',
    companionColor: 'pref_companion_color',
    accessory: 'pref_accessory',
} as const;

export function readBool(store: FlagStore, key: string, fallback: boolean): boolean {
    const value = store.get(key);
    return typeof value === 'boolean' ? value : fallback;
}

export function readNumber(store: FlagStore, key: string, fallback: number): number {
    const value = store.get(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/** In-process store; the default when the host registers none. */
export class MemoryFlagStore implements FlagStore {
    private readonly values = new Map<string, FlagValue>();

    constructor(initial: Record<string, FlagValue> = {}) {
        for (const [key, value] of Object.entries(initial)) {
            this.values.set(key, value);
        }
    }

    public get(key: string): FlagValue | undefined {
        return this.values.get(key);
    }

    public set(key: string, value: FlagValue): void {
        this.values.set(key, value);
    }
}
