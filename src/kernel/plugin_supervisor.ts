import type { SessionContext } from './session_context';

/** A session component run under the supervisor: the activity controllers and the gesture bridge. */
export interface Plugin {
    readonly name: string;
    readonly version: string;

    init(context: SessionContext): Promise<void> | void;
    start(): Promise<void> | void;
    stop(): Promise<void> | void;
    destroy(): Promise<void> | void;
}

// ── Session lifecycle ─────────────────────────────────────────────────────────
//
//   CREATED     ─initAll()────▶ INITIALIZED
//   INITIALIZED ─startAll()───▶ RUNNING
//   RUNNING     ─stopAll()────▶ STOPPED
//   STOPPED     ─startAll()───▶ RUNNING       (no re-init)
//   any         ─destroyAll()─▶ DESTROYED     (terminal)
//
// A plugin that throws in init() or start() is quarantined rather than
// aborting the session: it is skipped by every later phase (destroy() still
// runs when init() had succeeded) and reported once through onFailure()
// listeners and the PLUGIN_FAILED channel.

export type SupervisorState = 'CREATED' | 'INITIALIZED' | 'RUNNING' | 'STOPPED' | 'DESTROYED';

export type FailedPhase = 'init' | 'start';

export interface PluginFailure {
    plugin: Plugin;
    phase: FailedPhase;
    error: unknown;
}

export type FailureListener = (failure: PluginFailure) => void;

/** Thrown when a PluginSupervisor lifecycle method is called in the wrong state. */
export class LifecycleGateError extends Error {
    constructor(call: string, current: SupervisorState, allowed: readonly SupervisorState[]) {
        super(`[PluginSupervisor] ${call} needs ${allowed.join(' or ')}, but the session is ${current}`);
        this.name = 'LifecycleGateError';
    }
}

interface Slot {
    plugin: Plugin;
    failed: FailedPhase | null;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class PluginSupervisor {
    private readonly slots: Slot[] = [];
    private readonly failureLog: PluginFailure[] = [];
    private readonly listeners = new Set<FailureListener>();
    private state: SupervisorState = 'CREATED';

    constructor(private readonly context: SessionContext) {}

    public getState(): SupervisorState {
        return this.state;
    }

    public getPlugin(name: string): Plugin | undefined {
        return this.slots.find(slot => slot.plugin.name === name)?.plugin;
    }

    /** Plugins quarantined so far, in the order they failed. */
    public failures(): readonly PluginFailure[] {
        return this.failureLog;
    }

    public isHealthy(name: string): boolean {
        const slot = this.slots.find(candidate => candidate.plugin.name === name);
        return slot !== undefined && slot.failed === null;
    }

    public onFailure(listener: FailureListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    public registerPlugin(plugin: Plugin): void {
        this.gate(`registerPlugin('${plugin.name}')`, ['CREATED']);
        if (this.getPlugin(plugin.name)) {
            throw new Error(`[PluginSupervisor] '${plugin.name}' is already registered`);
        }
        this.slots.push({ plugin, failed: null });
        this.info(`Registered ${plugin.name} v${plugin.version}`);
    }

    public async initAll(): Promise<void> {
        this.gate('initAll()', ['CREATED']);
        for (const slot of this.slots) {
            await this.attempt(slot, 'init', () => slot.plugin.init(this.context));
        }
        this.state = 'INITIALIZED';
    }

    public async startAll(): Promise<void> {
        this.gate('startAll()', ['INITIALIZED', 'STOPPED']);
        for (const slot of this.healthy()) {
            await this.attempt(slot, 'start', () => slot.plugin.start());
        }
        this.state = 'RUNNING';
    }

    public async stopAll(): Promise<void> {
        this.gate('stopAll()', ['RUNNING']);
        for (const slot of this.healthy().reverse()) {
            try {
                await slot.plugin.stop();
            } catch (error) {
                console.error(`[PluginSupervisor] ${slot.plugin.name} failed to stop`, error);
            }
        }
        this.state = 'STOPPED';
    }

    public async destroyAll(): Promise<void> {
        if (this.state === 'DESTROYED') {
            console.warn('[PluginSupervisor] destroyAll() on a destroyed session; ignored');
            return;
        }
        const initialized = this.slots.filter(slot => slot.failed !== 'init').reverse();
        for (const slot of initialized) {
            try {
                await slot.plugin.destroy();
            } catch (error) {
                console.error(`[PluginSupervisor] ${slot.plugin.name} failed to destroy`, error);
            }
        }
        this.slots.length = 0;
        this.listeners.clear();
        this.state = 'DESTROYED';
    }

    private healthy(): Slot[] {
        return this.slots.filter(slot => slot.failed === null);
    }

    private async attempt(slot: Slot, phase: FailedPhase, step: () => Promise<void> | void): Promise<void> {
        try {
            await step();
        } catch (error) {
            this.quarantine(slot, phase, error);
        }
    }

    private quarantine(slot: Slot, phase: FailedPhase, error: unknown): void {
        slot.failed = phase;
        const failure: PluginFailure = { plugin: slot.plugin, phase, error };
        this.failureLog.push(failure);
        console.error(`[PluginSupervisor] ${slot.plugin.name} failed to ${phase}; continuing without it`, error);
        this.context.eventBus.publish('PLUGIN_FAILED', {
            name: slot.plugin.name,
            phase,
            reason: describeError(error),
        });
        for (const listener of this.listeners) {
            try {
                listener(failure);
            } catch (listenerError) {
                console.error('[PluginSupervisor] Failure listener threw', listenerError);
            }
        }
    }

    private gate(call: string, allowed: readonly SupervisorState[]): void {
        if (!allowed.includes(this.state)) {
            throw new LifecycleGateError(call, this.state, allowed);
        }
    }

    private info(message: string): void {
        if (this.context.config.get().verbose_logging) {
            console.log(`[PluginSupervisor] ${message}`);
        }
    }
}
