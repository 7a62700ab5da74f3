/**
 * app.ts: session bootstrap.
 *
 * The only place that knows the host: it registers collaborators in the PAL,
 * builds the panels on the given surface, runs the plugin lifecycle and
 * starts the state machine.
 */

import { ConfigManager, type SessionConfig } from './kernel/config';
import { EventBus, type SessionEvents } from './kernel/event_bus';
import { PathAbstractionLayer } from './kernel/pal';
import { PluginSupervisor } from './kernel/plugin_supervisor';
import type { ChatClient, HistorySource, SessionCollaborators, SessionContext } from './kernel/session_context';
import { MemoryFlagStore, type FlagStore } from './session/flag_store';
import { SessionStateMachine } from './session/session_state_machine';
import { HeadlessSurface, type UiSurface } from './ui/surface';
import { PanelBuilder } from './ui/panel_builder';
import { PanelVisibilityController } from './ui/panel_visibility';
import { TaskOverlayController } from './ui/task_overlay';
import { WidgetFactory } from './ui/widget_factory';
import { WelcomePlugin } from './plugins/welcome_plugin';
import { CustomizationPlugin } from './plugins/customization_plugin';
import { ConnectionConfirmPlugin } from './plugins/connection_confirm_plugin';
import { MainMenuPlugin } from './plugins/main_menu_plugin';
import { BreathingPlugin } from './plugins/breathing_plugin';
import { AltruisticPlugin } from './plugins/altruistic_plugin';
import { TreeControlPlugin } from './plugins/tree_control_plugin';
import { HistoryPlugin } from './plugins/history_plugin';
import { GestureBridge } from './plugins/gesture_bridge';

export interface HealingSessionOptions {
    /** Defaults to a HeadlessSurface. */
    surface?: UiSurface;
    config?: Partial<SessionConfig>;
    /** Defaults to an empty in-memory store (a fresh install). */
    flagStore?: FlagStore;
    chatClient?: ChatClient;
    historySource?: HistorySource;
    random?: () => number;
    clock?: () => Date;
}

export interface SessionPlugins {
    welcome: WelcomePlugin;
    customization: CustomizationPlugin;
    chat: ConnectionConfirmPlugin;
    mainMenu: MainMenuPlugin;
    breathing: BreathingPlugin;
    altruistic: AltruisticPlugin;
    tree: TreeControlPlugin;
    history: HistoryPlugin;
}

export interface HealingSession {
    readonly context: SessionContext;
    readonly surface: UiSurface;
    readonly supervisor: PluginSupervisor;
    readonly gestures: GestureBridge;
    readonly plugins: SessionPlugins;
    /** Stop every controller, hide every panel and drop the collaborators. */
    teardown(): Promise<void>;
}

export async function createHealingSession(options: HealingSessionOptions = {}): Promise<HealingSession> {
    const config = new ConfigManager(options.config);
    const eventBus = new EventBus<SessionEvents>();

    const pal = new PathAbstractionLayer<SessionCollaborators>();
    pal.register('flagStore', options.flagStore ?? new MemoryFlagStore());
    pal.register('random', options.random ?? Math.random);
    pal.register('clock', options.clock ?? (() => new Date()));
    if (options.chatClient) pal.register('chatClient', options.chatClient);
    if (options.historySource) pal.register('historySource', options.historySource);

    const surface = options.surface ?? new HeadlessSurface();
    const settings = config.get();
    const panels = new PanelBuilder(surface, settings).buildAll();
    const visibility = new PanelVisibilityController(panels, surface);
    const overlay = new TaskOverlayController(eventBus, panels, visibility);
    const session = new SessionStateMachine({
        eventBus,
        panels,
        visibility,
        flagStore: pal.require('flagStore'),
        config,
    });

    const context: SessionContext = {
        eventBus,
        pal,
        config,
        panels,
        widgets: new WidgetFactory(surface, settings.dropdown_item_height),
        visibility,
        overlay,
        session,
    };

    const plugins: SessionPlugins = {
        welcome: new WelcomePlugin(),
        customization: new CustomizationPlugin(),
        chat: new ConnectionConfirmPlugin(),
        mainMenu: new MainMenuPlugin(),
        breathing: new BreathingPlugin(),
        altruistic: new AltruisticPlugin(),
        tree: new TreeControlPlugin(),
        history: new HistoryPlugin(),
    };
    const gestures = new GestureBridge();

    const controllers = Object.values(plugins);
    const supervisor = new PluginSupervisor(context);
    for (const plugin of controllers) {
        supervisor.registerPlugin(plugin);
    }
    supervisor.registerPlugin(gestures);
    supervisor.onFailure(({ plugin, phase, error }) => {
        const controller = controllers.find(candidate => candidate === plugin);
        if (!controller) return;
        const reason = error instanceof Error ? error.message : String(error);
        session.disableState(controller.state, `${plugin.name} failed to ${phase}: ${reason}`);
    });

    await supervisor.initAll();
    await supervisor.startAll();
    overlay.bind();
    session.start();

    return {
        context,
        surface,
        supervisor,
        gestures,
        plugins,
        async teardown(): Promise<void> {
            session.shutdown();
            overlay.unbind();
            if (supervisor.getState() === 'RUNNING') {
                await supervisor.stopAll();
            }
            await supervisor.destroyAll();
            visibility.hideAll();
            pal.clear();
        },
    };
}
