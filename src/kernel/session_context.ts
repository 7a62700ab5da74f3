import type { EventBus, SessionEvents } from './event_bus';
import type { PathAbstractionLayer } from './pal';
import type { ConfigManager } from './config';
import type { FlagStore } from '../session/flag_store';
import type { SessionStateMachine } from '../session/session_state_machine';
import type { PanelRegistry } from '../ui/panels';
import type { PanelVisibilityController } from '../ui/panel_visibility';
import type { TaskOverlayController } from '../ui/task_overlay';
import type { WidgetFactory } from '../ui/widget_factory';

// ── Host collaborators ────────────────────────────────────────────────────────

export interface ChatTurn {
    role: 'user' | 'assistant';
    content: string;
}

export interface ChatRequest {
    message: string;
    /** Most recent transcript entries, oldest first. */
    context: ChatTurn[];
}

/** Chat backend.  Resolves with the raw reply payload, expected to be `{ reply: string }`. */
export interface ChatClient {
    send(request: ChatRequest): Promise<unknown>;
}

/** Past check-ins.  Resolves with the raw payload, expected to be a list of history entries. */
export interface HistorySource {
    load(): Promise<unknown>;
}

export interface SessionCollaborators {
    flagStore: FlagStore;
    chatClient: ChatClient;
    historySource: HistorySource;
    /** Uniform [0, 1) source for task draws. */
    random: () => number;
    /** Wall clock for transcript timestamps and the comfort cooldown. */
    clock: () => Date;
}

/**
 * Everything a controller may touch, handed to it in init().  One per
 * session; there is no module-level session state.
 */
export interface SessionContext {
    eventBus: EventBus<SessionEvents>;
    pal: PathAbstractionLayer<SessionCollaborators>;
    config: ConfigManager;
    panels: PanelRegistry;
    /** Builds runtime list content (transcript lines, history cards) on the session surface. */
    widgets: WidgetFactory;
    visibility: PanelVisibilityController;
    overlay: TaskOverlayController;
    session: SessionStateMachine;
}
