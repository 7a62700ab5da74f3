/**
 * @file config.ts
 * @description Session configuration: defaults, zod validation and hot-swap.
 *
 *   Scenario: Load and update config
 *     Given a ConfigManager initialised with DEFAULT_CONFIG
 *     When a partial payload is fed in live
 *     Then the manager validates it, updates its state and notifies subscribers
 *
 *   Scenario: Reject an invalid payload
 *     Given a ConfigManager
 *     When an update would break a constraint (e.g. negative tick interval)
 *     Then ConfigValidationError is thrown and the previous config stays active
 */

import { z } from 'zod';

export const SessionConfigSchema = z.object({
    /** Period of the countdown ticks driving timer displays. */
    tick_ms: z.number().int().positive(),

    // Welcome
    welcome_auto_advance_ms: z.number().int().nonnegative(),

    // Breathing (4-7-8 method)
    breathing_prepare_s: z.number().nonnegative(),
    breathing_inhale_s: z.number().positive(),
    breathing_hold_s: z.number().nonnegative(),
    breathing_exhale_s: z.number().positive(),
    breathing_cycles: z.number().int().positive(),
    breathing_nutrients: z.number().int().nonnegative(),

    // Altruistic
    altruistic_required_touches: z.number().int().positive(),
    gesture_confidence_threshold: z.number().min(0).max(1),
    comfort_cooldown_ms: z.number().int().nonnegative(),

    // Chat
    chat_timeout_ms: z.number().int().positive(),
    chat_context_window: z.number().int().nonnegative(),

    // Layout
    dropdown_item_height: z.number().positive(),
    history_card_height: z.number().positive(),

    // Tree
    orb_task_nutrients: z.number().int().nonnegative(),

    verbose_logging: z.boolean(),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export const DEFAULT_CONFIG: SessionConfig = {
    tick_ms: 100,

    welcome_auto_advance_ms: 6000, // 5 s approach + 1 s settle

    breathing_prepare_s: 5,
    breathing_inhale_s: 4,
    breathing_hold_s: 7,
    breathing_exhale_s: 8,
    breathing_cycles: 4,           // 4 × 19 s = 76 s
    breathing_nutrients: 30,

    altruistic_required_touches: 3,
    gesture_confidence_threshold: 0.6,
    comfort_cooldown_ms: 2000,

    chat_timeout_ms: 15000,
    chat_context_window: 5,

    dropdown_item_height: 30,
    history_card_height: 130,

    orb_task_nutrients: 50,

    verbose_logging: true,
};

/** Thrown when a config payload fails schema validation. */
export class ConfigValidationError extends Error {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super(`[ConfigManager] Invalid config: ${issues.join('; ')}`);
        this.name = 'ConfigValidationError';
        this.issues = issues;
    }
}

type ConfigChangeListener = (config: SessionConfig) => void;

export class ConfigManager {
    private current: SessionConfig;
    private listeners: Set<ConfigChangeListener> = new Set();

    constructor(initial: Partial<SessionConfig> = {}) {
        this.current = ConfigManager.validate({ ...DEFAULT_CONFIG, ...initial });
    }

    public get(): SessionConfig {
        return { ...this.current };
    }

    /**
     * Hot-swap the configuration.  Only provided keys change; the merged
     * result must still satisfy the schema.
     */
    public update(values: Partial<SessionConfig>): void {
        this.current = ConfigManager.validate({ ...this.current, ...values });
        const snapshot = this.get();
        for (const listener of this.listeners) {
            listener(snapshot);
        }
    }

    /** Subscribe to changes; the listener is called immediately with the current config. */
    public subscribe(listener: ConfigChangeListener): () => void {
        this.listeners.add(listener);
        listener(this.get());
        return () => {
            this.listeners.delete(listener);
        };
    }

    private static validate(candidate: unknown): SessionConfig {
        const parsed = SessionConfigSchema.safeParse(candidate);
        if (!parsed.success) {
            throw new ConfigValidationError(
                parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
            );
        }
        return parsed.data;
    }
}
