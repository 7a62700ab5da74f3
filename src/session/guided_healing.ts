import type { HealingStep } from './session_state';
import { FLAG_KEYS, type FlagStore } from './flag_store';

export type AnxietyLevel = 'light' | 'moderate' | 'severe';

const LEVELS: readonly AnxietyLevel[] = ['light', 'moderate', 'severe'];

/** Activities of a guided journey, by stored anxiety level. */
export const HEALING_PATHS: Readonly<Record<AnxietyLevel, readonly HealingStep[]>> = {
    light: ['Breathing'],
    moderate: ['Breathing', 'Altruistic'],
    severe: ['Breathing', 'Altruistic', 'TreeControl'],
};

const SEVERE_KEYWORDS = [
    'panic', 'terrified', 'overwhelming', "can't breathe", 'death', 'suicide',
    'hopeless', 'unbearable', 'dying', 'scared', 'crisis',
];

const MODERATE_KEYWORDS = [
    'anxious', 'worried', 'nervous', 'stressed', 'fear', 'concern',
    'difficult', 'struggle', 'upset', 'sad', 'lonely',
];

/** Keyword check of a check-in message; anything without a match counts as light. */
export function classifyAnxiety(message: string): AnxietyLevel {
    const lower = message.toLowerCase();
    if (SEVERE_KEYWORDS.some(keyword => lower.includes(keyword))) return 'severe';
    if (MODERATE_KEYWORDS.some(keyword => lower.includes(keyword))) return 'moderate';
    return 'light';
}

export function storeAnxietyLevel(store: FlagStore, level: AnxietyLevel): void {
    store.set(FLAG_KEYS.anxietyLevel, LEVELS.indexOf(level));
}

export function loadAnxietyLevel(store: FlagStore): AnxietyLevel | null {
    const value = store.get(FLAG_KEYS.anxietyLevel);
    if (typeof value !== 'number') return null;
    return LEVELS[value] ?? null;
}

/**
 * Step after `current` on the journey for `level`; the first step when
 * `current` is null.  Null once the journey is over, or when `current`
 * is not on the path.
 */
export function nextHealingStep(level: AnxietyLevel, current: HealingStep | null): HealingStep | null {
    const path = HEALING_PATHS[level];
    if (current === null) return path[0] ?? null;
    const index = path.indexOf(current);
    if (index === -1) return null;
    return path[index + 1] ?? null;
}
