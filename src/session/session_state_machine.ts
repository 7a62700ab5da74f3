/**
 * @file session_state_machine.ts
 * @description Owns the primary session state, the first-run flag and the
 * guided healing journey, and drives panel visibility.
 *
 *   Scenario: Fresh install
 *     Given the first-run flag is unset
 *     When start() runs
 *     Then Welcome is shown; welcome-complete → Customization;
 *          finish-customization writes the flag → ConnectionConfirm;
 *          continue → MainMenu as a first entry
 *
 *   Scenario: Returning user
 *     Given the flag is already set
 *     When start() runs
 *     Then MainMenu is shown directly
 *
 *   Scenario: Target panel missing
 *     Given a transition whose target panel was never built
 *     When it is dispatched
 *     Then the error is logged, SESSION_TRANSITION_REJECTED is published and
 *          the current state and panel stay as they were
 *
 *   Scenario: Onboarding panel missing
 *     Given the first run is not complete and an onboarding panel was never built
 *     When start() or the onboarding trigger would show it
 *     Then the session continues to the next built panel along
 *          Welcome → Customization → ConnectionConfirm → MainMenu; skipping
 *          Customization still writes the first-run flag.  A state disabled
 *          because its controller failed counts as missing.
 *
 * Leaving a state always calls the outgoing controller's exit() before the
 * incoming panel is shown, so timers owned by that state stop first.
 */

import type { EventBus, SessionEvents } from '../kernel/event_bus';
import type { ConfigManager } from '../kernel/config';
import type { PanelRegistry } from '../ui/panels';
import type { PanelVisibilityController } from '../ui/panel_visibility';
import { FLAG_KEYS, readBool, type FlagStore } from './flag_store';
import { loadAnxietyLevel, nextHealingStep, type AnxietyLevel } from './guided_healing';
import {
    lookupTransition,
    type HealingStep,
    type HubEntryKind,
    type SessionState,
    type SessionTrigger,
} from './session_state';

export interface StateEntry {
    from: SessionState | null;
    trigger: SessionTrigger | 'init';
    /** Set when entering MainMenu. */
    entry?: HubEntryKind;
}

/** Per-state behaviour bound while its state is active. */
export interface StateController {
    readonly state: SessionState;
    enter(transition: StateEntry): void;
    /** Stop everything the state owns (timers, pending requests). */
    exit(): void;
}

export interface SessionStateMachineDeps {
    eventBus: EventBus<SessionEvents>;
    panels: PanelRegistry;
    visibility: PanelVisibilityController;
    flagStore: FlagStore;
    config: ConfigManager;
}

const ONBOARDING: readonly SessionState[] = ['Welcome', 'Customization', 'ConnectionConfirm', 'MainMenu'];

interface HealingJourney {
    level: AnxietyLevel;
    step: HealingStep;
}

export class SessionStateMachine {
    private current: SessionState | null = null;
    private firstRunCompleted = false;
    private flagSetThisSession = false;
    private hubEntered = false;
    private journey: HealingJourney | null = null;

    private readonly controllers = new Map<SessionState, StateController>();
    private readonly disabled = new Map<SessionState, string>();
    private readonly queue: SessionTrigger[] = [];
    private transitioning = false;

    constructor(private readonly deps: SessionStateMachineDeps) {}

    public get state(): SessionState | null {
        return this.current;
    }

    public get isFirstRunCompleted(): boolean {
        return this.firstRunCompleted;
    }

    public registerController(controller: StateController): void {
        if (this.controllers.has(controller.state)) {
            console.warn(`[SessionStateMachine] Replacing controller for ${controller.state}`);
        }
        this.controllers.set(controller.state, controller);
    }

    public unregisterController(controller: StateController): void {
        if (this.controllers.get(controller.state) === controller) {
            this.controllers.delete(controller.state);
        }
    }

    /** Refuse every later transition into `state`, as if its panel were missing, and drop its controller. */
    public disableState(state: SessionState, reason: string): void {
        this.controllers.delete(state);
        this.disabled.set(state, reason);
        console.error(`[SessionStateMachine] ${state} disabled: ${reason}`);
    }

    /**
     * Read the first-run flag once and show the initial state.  Returns the
     * state shown, or null when its panel is missing.
     */
    public start(): SessionState | null {
        if (this.current !== null) {
            console.warn(`[SessionStateMachine] start() called twice; staying in ${this.current}`);
            return this.current;
        }
        this.firstRunCompleted = this.readFirstRunFlag();
        const initial = this.firstRunCompleted ? 'MainMenu' : this.onboardingTarget('Welcome');
        const blocked = this.unavailable(initial);
        if (blocked !== null) {
            this.reject('init', blocked);
            return null;
        }
        if (this.skipsCustomization(initial)) this.completeFirstRun();
        return this.transitionTo(initial, 'init') ? initial : null;
    }

    /**
     * Apply a trigger.  Returns false when the trigger has no edge from the
     * current state or the target panel is missing.  A trigger raised while
     * another transition is in progress is queued and runs right after it.
     */
    public dispatch(trigger: SessionTrigger): boolean {
        if (this.transitioning) {
            this.queue.push(trigger);
            return true;
        }
        const accepted = this.apply(trigger);
        while (this.queue.length > 0) {
            const next = this.queue.shift();
            if (next !== undefined) this.apply(next);
        }
        return accepted;
    }

    /** Exit the active controller; used at teardown. */
    public shutdown(): void {
        if (this.current === null) return;
        this.exitController(this.current);
        this.current = null;
        this.journey = null;
    }

    // ── Guided healing ────────────────────────────────────────────────────────

    public startGuidedHealing(): boolean {
        return this.dispatch('start-healing');
    }

    public continueHealingFlow(): boolean {
        return this.dispatch('healing-next');
    }

    /** Abandon or complete the journey and return to the hub. */
    public finishHealingFlow(): boolean {
        this.journey = null;
        return this.dispatch('finish');
    }

    public isInGuidedHealing(): boolean {
        return this.journey !== null;
    }

    /** True while the active journey step has another step after it. */
    public shouldShowNextButton(): boolean {
        if (!this.journey) return false;
        return nextHealingStep(this.journey.level, this.journey.step) !== null;
    }

    // ── Internals ─────────────────────────────────────────────────────────────

    private apply(trigger: SessionTrigger): boolean {
        const from = this.current;
        if (from === null) {
            return this.reject(trigger, 'session not started');
        }

        if (trigger === 'start-healing') return this.beginJourney(from);
        if (trigger === 'healing-next') return this.advanceJourney(from);

        const edge = lookupTransition(from, trigger);
        if (edge === undefined) {
            return this.reject(trigger, `no transition from ${from} on '${trigger}'`);
        }
        const target = this.firstRunCompleted ? edge : this.onboardingTarget(edge);
        const blocked = this.unavailable(target);
        if (blocked !== null) return this.reject(trigger, blocked);

        if (trigger === 'finish-customization' || this.skipsCustomization(target)) this.completeFirstRun();
        this.journey = null;
        return this.transitionTo(target, trigger);
    }

    private beginJourney(from: SessionState): boolean {
        if (from !== 'MainMenu') {
            return this.reject('start-healing', `guided healing starts from MainMenu, not ${from}`);
        }
        const level = loadAnxietyLevel(this.deps.flagStore);
        if (level === null) {
            return this.reject('start-healing', 'no anxiety level stored yet');
        }
        const first = nextHealingStep(level, null);
        if (first === null) {
            return this.reject('start-healing', `empty healing path for ${level}`);
        }
        const blocked = this.unavailable(first);
        if (blocked !== null) return this.reject('start-healing', blocked);
        this.journey = { level, step: first };
        this.info(`Guided healing started (${level})`);
        return this.transitionTo(first, 'start-healing');
    }

    private advanceJourney(from: SessionState): boolean {
        const journey = this.journey;
        if (!journey || journey.step !== from) {
            return this.reject('healing-next', `not on a guided healing step in ${from}`);
        }
        const next = nextHealingStep(journey.level, journey.step);
        if (next === null) {
            this.journey = null;
            this.info('Guided healing finished');
            return this.transitionTo('MainMenu', 'healing-next');
        }
        const blocked = this.unavailable(next);
        if (blocked !== null) return this.reject('healing-next', blocked);
        this.journey = { level: journey.level, step: next };
        return this.transitionTo(next, 'healing-next');
    }

    private transitionTo(target: SessionState, trigger: SessionTrigger | 'init'): boolean {
        const from = this.current;
        const blocked = this.unavailable(target);
        if (blocked !== null) return this.reject(trigger, blocked);

        this.transitioning = true;
        try {
            if (from !== null) this.exitController(from);
            this.deps.visibility.show(target);
            this.current = target;

            const transition: StateEntry = { from, trigger };
            if (target === 'MainMenu') {
                transition.entry = this.flagSetThisSession && !this.hubEntered ? 'first-entry' : 'return';
                this.hubEntered = true;
            }
            this.enterController(target, transition);

            this.info(`${from ?? '(start)'} → ${target} (${trigger}${transition.entry ? `, ${transition.entry}` : ''})`);
            this.deps.eventBus.publish('SESSION_STATE_CHANGE', {
                previous: from,
                current: target,
                trigger,
                ...(transition.entry ? { entry: transition.entry } : {}),
            });
        } finally {
            this.transitioning = false;
        }
        return true;
    }

    /** First enterable onboarding state at or after `target`; `target` itself when there is none. */
    private onboardingTarget(target: SessionState): SessionState {
        const at = ONBOARDING.indexOf(target);
        if (at < 0) return target;
        const usable = ONBOARDING.slice(at).find(state => this.unavailable(state) === null);
        if (usable === undefined) return target;
        if (usable !== target) {
            console.error(`[SessionStateMachine] Onboarding state ${target} is unavailable; continuing to ${usable}`);
        }
        return usable;
    }

    /** Why `state` cannot be entered, or null when it can. */
    private unavailable(state: SessionState): string | null {
        const reason = this.disabled.get(state);
        if (reason !== undefined) return `state '${state}' is disabled (${reason})`;
        if (!this.deps.panels.has(state)) return `target panel '${state}' is not built`;
        return null;
    }

    private skipsCustomization(target: SessionState): boolean {
        return !this.firstRunCompleted && (target === 'ConnectionConfirm' || target === 'MainMenu');
    }

    private completeFirstRun(): void {
        if (this.firstRunCompleted) return;
        this.firstRunCompleted = true;
        this.flagSetThisSession = true;
        try {
            this.deps.flagStore.set(FLAG_KEYS.firstRunCompleted, true);
        } catch (error) {
            console.error('[SessionStateMachine] Could not persist first-run flag; kept for this session', error);
        }
        this.deps.eventBus.publish('FIRST_RUN_COMPLETED', { at: Date.now() });
    }

    private readFirstRunFlag(): boolean {
        try {
            return readBool(this.deps.flagStore, FLAG_KEYS.firstRunCompleted, false);
        } catch (error) {
            console.error('[SessionStateMachine] Could not read first-run flag; treating as fresh install', error);
            return false;
        }
    }

    private exitController(state: SessionState): void {
        const controller = this.controllers.get(state);
        if (!controller) return;
        try {
            controller.exit();
        } catch (error) {
            console.error(`[SessionStateMachine] exit() of ${state} threw`, error);
        }
    }

    private enterController(state: SessionState, transition: StateEntry): void {
        const controller = this.controllers.get(state);
        if (!controller) return;
        try {
            controller.enter(transition);
        } catch (error) {
            console.error(`[SessionStateMachine] enter() of ${state} threw`, error);
        }
    }

    private reject(trigger: SessionTrigger | 'init', reason: string): false {
        console.error(`[SessionStateMachine] Transition '${trigger}' refused in ${this.current ?? '(start)'}: ${reason}`);
        this.deps.eventBus.publish('SESSION_TRANSITION_REJECTED', { from: this.current, trigger, reason });
        return false;
    }

    private info(message: string): void {
        if (this.deps.config.get().verbose_logging) {
            console.log(`[SessionStateMachine] ${message}`);
        }
    }
}
