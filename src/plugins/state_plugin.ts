import type { Plugin } from '../kernel/plugin_supervisor';
import type { SessionContext } from '../kernel/session_context';
import type { SessionConfig } from '../kernel/config';
import type { FlagStore } from '../session/flag_store';
import type { StateController, StateEntry } from '../session/session_state_machine';
import type { SessionState } from '../session/session_state';
import type { Panel } from '../ui/panels';

type TimerHandle = ReturnType<typeof setTimeout>;

/**
 * Controller for one session state, run under the PluginSupervisor.
 *
 * init() registers it with the state machine; start() binds its panel's
 * widgets; enter()/exit() bracket the time its state is active.  Timers made
 * through `after()`/`every()` belong to the active state and are cleared on
 * exit() and stop().
 */
export abstract class StatePlugin<S extends SessionState> implements Plugin, StateController {
    public abstract readonly name: string;
    public readonly version: string = '1.0.0';
    public abstract readonly state: S;

    protected context!: SessionContext;

    private bindings: Array<() => void> = [];
    private readonly timeouts = new Set<TimerHandle>();
    private readonly intervals = new Set<TimerHandle>();
    private active = false;

    public init(context: SessionContext): void {
        this.context = context;
        context.session.registerController(this);
    }

    public start(): void {
        if (this.bindings.length > 0) return;
        this.bindings = this.bind();
        this.log('Started');
    }

    public stop(): void {
        this.clearTimers();
        for (const unbind of this.bindings.splice(0)) unbind();
        this.log('Stopped');
    }

    public destroy(): void {
        this.stop();
        this.active = false;
        this.context.session.unregisterController(this);
    }

    public enter(transition: StateEntry): void {
        this.active = true;
        this.onEnter(transition);
    }

    public exit(): void {
        this.active = false;
        this.clearTimers();
        this.onExit();
    }

    /** True between enter() and exit(). */
    public get isActive(): boolean {
        return this.active;
    }

    /** Timers this state currently owns. */
    public get pendingTimers(): number {
        return this.timeouts.size + this.intervals.size;
    }

    /** Connect widget signals and bus channels; returns their disposers. */
    protected abstract bind(): Array<() => void>;

    protected abstract onEnter(transition: StateEntry): void;

    protected onExit(): void {
        // Most states own nothing beyond their timers.
    }

    protected get panel(): Panel<S> | undefined {
        return this.context.panels.get(this.state);
    }

    protected get config(): SessionConfig {
        return this.context.config.get();
    }

    /** Finish label for activities that can be a guided healing step. */
    protected finishLabel(idle: string): string {
        const session = this.context.session;
        if (!session.isInGuidedHealing()) return idle;
        return session.shouldShowNextButton() ? 'Next →' : 'Finish';
    }

    /** Leave an activity: advance the guided journey when on one, else `trigger`. */
    protected leave(trigger: 'finish' | 'close'): void {
        const session = this.context.session;
        if (session.isInGuidedHealing()) {
            session.continueHealingFlow();
        } else {
            session.dispatch(trigger);
        }
    }

    /** Session wall clock; the host's `clock` collaborator when one is registered. */
    protected now(): Date {
        const clock = this.context.pal.resolve('clock');
        return clock ? clock() : new Date();
    }

    /** Run `action` against the flag store; a failing store is logged and the caller carries on. */
    protected withStore(what: string, action: (store: FlagStore) => void): boolean {
        try {
            action(this.context.pal.require('flagStore'));
            return true;
        } catch (error) {
            console.error(`[${this.name}] Flag store failed while ${what}`, error);
            return false;
        }
    }

    protected after(ms: number, callback: () => void): void {
        const handle = setTimeout(() => {
            this.timeouts.delete(handle);
            callback();
        }, ms);
        this.timeouts.add(handle);
    }

    protected every(ms: number, callback: () => void): TimerHandle {
        const handle = setInterval(callback, ms);
        this.intervals.add(handle);
        return handle;
    }

    protected cancel(handle: TimerHandle): void {
        clearInterval(handle);
        this.intervals.delete(handle);
    }

    protected clearTimers(): void {
        for (const handle of this.timeouts) clearTimeout(handle);
        for (const handle of this.intervals) clearInterval(handle);
        this.timeouts.clear();
        this.intervals.clear();
    }

    protected log(message: string): void {
        if (this.config.verbose_logging) {
            console.log(`[${this.name}] ${message}`);
        }
    }
}
