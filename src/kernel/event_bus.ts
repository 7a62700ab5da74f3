import type { SessionState, SessionTrigger, HubEntryKind } from '../session/session_state';

// ── Typed session events ──────────────────────────────────────────────────────
//
// Every channel and its payload is declared once here.  A misspelled channel or
// a wrong payload shape is a compile error, not a silent no-op at runtime.

export interface SessionEvents {
    // ── State machine output ──────────────────────────────────────────────────
    /** SessionStateMachine → listeners: primary state changed */
    'SESSION_STATE_CHANGE'  : { previous: SessionState | null; current: SessionState; trigger: SessionTrigger | 'init';
                                entry?: HubEntryKind };
    /** SessionStateMachine → listeners: a transition was refused (unknown trigger or missing panel) */
    'SESSION_TRANSITION_REJECTED': { from: SessionState | null; trigger: SessionTrigger | 'init'; reason: string };
    /** SessionStateMachine → listeners: first-run flag written (fires at most once per session) */
    'FIRST_RUN_COMPLETED'   : { at: number };

    // ── Lifecycle ─────────────────────────────────────────────────────────────
    /** PluginSupervisor → listeners: a controller was quarantined after failing init or start */
    'PLUGIN_FAILED'         : { name: string; phase: 'init' | 'start'; reason: string };

    // ── Overlay ───────────────────────────────────────────────────────────────
    /** Any controller or collaborator → TaskOverlayController: raise the full-screen prompt */
    'TASK_PROMPT'           : { text: string; source: 'gesture' | 'chat' | 'tree' | 'altruistic' | 'system' };
    /** TaskOverlayController → listeners: overlay shown or dismissed */
    'TASK_OVERLAY_STATE'    : { visible: boolean; text: string };

    // ── Gesture collaborator input ────────────────────────────────────────────
    /** GestureBridge → AltruisticPlugin: a recognised discrete gesture */
    'GESTURE'               : { gestureType: string; confidence: number };
    /** GestureBridge → AltruisticPlugin: coarse palm detected / hand lost signal */
    'HAND_PRESENCE'         : { detected: boolean };
    /** GestureBridge → TreeControlPlugin: the user activated a floating orb */
    'ORB_ACTIVATED'         : { orbIndex: number };

    // ── Activity output ───────────────────────────────────────────────────────
    /** AltruisticPlugin → listeners: touch counter changed */
    'COMFORT_PROGRESS'      : { touches: number; required: number };
    /** BreathingPlugin → listeners: exercise ran to completion */
    'BREATHING_COMPLETED'   : { nutrients: number };
    /** TreeControlPlugin → renderer: season preset chosen in the dropdown */
    'TREE_SEASON_CHANGED'   : { index: number; season: string };
    /** History / chat → renderer: the companion should wear this expression */
    'COMPANION_EXPRESSION'  : { expression: string };
    /** CustomizationPlugin → renderer: appearance preferences changed */
    'PREFERENCES_CHANGED'   : { key: string; value: number };
    /** ConnectionConfirmPlugin → listeners: transcript grew */
    'CHAT_TRANSCRIPT'       : { role: 'user' | 'assistant'; content: string };
}

export type EventCallback<T> = (data: T) => void;

type ListenerTable<M> = { [K in keyof M]?: Set<EventCallback<M[K]>> };

/**
 * Isolated typed event bus.  One instance per session; every controller
 * receives it through its context, never through a module-level singleton.
 */
export class EventBus<M extends object = SessionEvents> {
    private readonly listeners: ListenerTable<M> = {};

    public subscribe<K extends keyof M>(event: K, callback: EventCallback<M[K]>): () => void {
        let channel = this.listeners[event];
        if (!channel) {
            channel = new Set<EventCallback<M[K]>>();
            this.listeners[event] = channel;
        }
        channel.add(callback);

        return () => this.unsubscribe(event, callback);
    }

    public unsubscribe<K extends keyof M>(event: K, callback: EventCallback<M[K]>): void {
        const channel = this.listeners[event];
        if (channel) {
            channel.delete(callback);
        }
    }

    public publish<K extends keyof M>(event: K, data: M[K]): boolean {
        const channel = this.listeners[event];
        if (!channel || channel.size === 0) {
            return false;
        }

        // Snapshot: a listener may unsubscribe itself (or others) mid-dispatch.
        for (const listener of Array.from(channel)) {
            try {
                listener(data);
            } catch (error) {
                console.error(`[EventBus] Listener for '${String(event)}' threw; continuing delivery`, error);
            }
        }
        return true;
    }

    public listenerCount<K extends keyof M>(event: K): number {
        return this.listeners[event]?.size ?? 0;
    }
}
