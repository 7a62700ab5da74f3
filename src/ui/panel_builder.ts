/**
 * panel_builder.ts: composes WidgetFactory calls into the session panels.
 *
 * Fixed anchor layout: every child is placed explicitly relative to its
 * panel's centre.  Only list content (dropdown options, chat transcript,
 * history cards) stacks automatically.
 *
 *   Scenario: Build once
 *     Given a surface
 *     When buildAll() runs twice
 *     Then the second call returns the same registry and mounts nothing new
 *
 *   Scenario: A panel fails to build
 *     Given a surface that rejects one panel's nodes
 *     When buildAll() runs
 *     Then the failure is logged, that panel is absent and every other panel exists
 */

import type { SessionConfig } from '../kernel/config';
import type { Rgba, UiSurface } from './surface';
import { WidgetFactory, PALETTE } from './widget_factory';
import { PanelRegistry, type Panel, type PanelName, type PanelTable } from './panels';

export const SEASONS = ['Default', 'Spring', 'Summer', 'Autumn', 'Winter'] as const;

export const THEME_COLORS: readonly Rgba[] = [
    { r: 0.71, g: 0.62, b: 0.86, a: 1 }, // lavender
    { r: 0.53, g: 0.81, b: 0.92, a: 1 }, // sky
    { r: 0.6, g: 0.9, b: 0.75, a: 1 },   // mint
    { r: 1, g: 0.8, b: 0.64, a: 1 },     // peach
    { r: 0.96, g: 0.6, b: 0.7, a: 1 },   // rose
];

export const COMPANION_COLORS: readonly Rgba[] = [
    { r: 1, g: 1, b: 1, a: 1 },
    { r: 1, g: 0.84, b: 0.3, a: 1 },
    { r: 1, g: 0.7, b: 0.8, a: 1 },
    { r: 0.5, g: 0.7, b: 1, a: 1 },
    { r: 0.55, g: 0.85, b: 0.5, a: 1 },
];

export const ACCESSORIES = ['Hat', 'Halo', 'Bow', 'Cape'] as const;

export const OVERLAY_TITLE = 'Behavioral Activation Task';

type BuilderConfig = Pick<SessionConfig, 'dropdown_item_height' | 'altruistic_required_touches'>;

export class PanelBuilder {
    private readonly factory: WidgetFactory;
    private registry: PanelRegistry | null = null;

    constructor(private readonly surface: UiSurface, private readonly config: BuilderConfig) {
        this.factory = new WidgetFactory(surface, config.dropdown_item_height);
    }

    /**
     * Run every panel builder once, then hide every built panel once.
     * A builder that throws is logged and its panel left unset; the others
     * still build.
     */
    public buildAll(): PanelRegistry {
        if (this.registry) return this.registry;

        const table: PanelTable = {
            Welcome: this.attempt('Welcome', () => this.buildWelcome()),
            Customization: this.attempt('Customization', () => this.buildCustomization()),
            ConnectionConfirm: this.attempt('ConnectionConfirm', () => this.buildConnectionConfirm()),
            MainMenu: this.attempt('MainMenu', () => this.buildMainMenu()),
            Breathing: this.attempt('Breathing', () => this.buildBreathing()),
            Altruistic: this.attempt('Altruistic', () => this.buildAltruistic()),
            TreeControl: this.attempt('TreeControl', () => this.buildTreeControl()),
            History: this.attempt('History', () => this.buildHistory()),
            TaskOverlay: this.attempt('TaskOverlay', () => this.buildTaskOverlay()),
        };
        const registry = new PanelRegistry(table);
        this.registry = registry;

        for (const name of registry.names()) {
            registry.root(name)?.setVisible(false);
        }
        this.surface.present();
        return registry;
    }

    private attempt<K extends PanelName>(name: K, build: () => Panel<K>): Panel<K> | undefined {
        try {
            return build();
        } catch (error) {
            console.error(`[PanelBuilder] Failed to build panel '${name}'; transitions to it will be refused`, error);
            const partial = this.surface.root.find(`${name}Panel`);
            if (!partial) return undefined;
            try {
                partial.remove();
            } catch (cleanupError) {
                console.error(`[PanelBuilder] Could not unmount partial panel '${name}'`, cleanupError);
            }
            return undefined;
        }
    }

    // ── Panels ────────────────────────────────────────────────────────────────

    private buildWelcome(): Panel<'Welcome'> {
        const f = this.factory;
        const root = f.panel('WelcomePanel', { x: 800, y: 500 });
        return {
            name: 'Welcome',
            root,
            handles: {
                title: f.text(root, 'Title', { x: 0, y: 150 }, { x: 700, y: 80 }, { text: 'Welcome', fontSize: 48 }),
                subtitle: f.text(root, 'Subtitle', { x: 0, y: 40 }, { x: 700, y: 100 }, {
                    text: 'Your companion is on the way.\nTake a slow breath while you wait.',
                    fontSize: 26,
                }),
                begin: f.button(root, 'BeginButton', { x: 0, y: -150 }, { x: 240, y: 70 }, { label: 'Begin', fontSize: 30 }),
            },
        };
    }

    private buildCustomization(): Panel<'Customization'> {
        const f = this.factory;
        const root = f.panel('CustomizationPanel', { x: 800, y: 900 });

        const title = f.text(root, 'Title', { x: 0, y: 400 }, { x: 700, y: 60 }, { text: 'Customize Your Companion', fontSize: 40 });

        f.text(root, 'BrightnessLabel', { x: -250, y: 310 }, { x: 200, y: 40 }, { text: 'Brightness' });
        const brightness = f.slider(root, 'BrightnessSlider', { x: 100, y: 310 }, { x: 400, y: 30 }, { min: 0, max: 1, value: 1 });
        f.text(root, 'VolumeLabel', { x: -250, y: 250 }, { x: 200, y: 40 }, { text: 'Volume' });
        const volume = f.slider(root, 'VolumeSlider', { x: 100, y: 250 }, { x: 400, y: 30 }, { min: 0, max: 1, value: 0.5 });
        f.text(root, 'ScaleLabel', { x: -250, y: 190 }, { x: 200, y: 40 }, { text: 'Size' });
        const scale = f.slider(root, 'ScaleSlider', { x: 100, y: 190 }, { x: 400, y: 30 }, { min: 0.8, max: 3, value: 2 });

        f.text(root, 'ThemeLabel', { x: 0, y: 110 }, { x: 600, y: 40 }, { text: 'Theme Color' });
        const themeRow = f.subPanel(root, 'ThemeColors', { x: 0, y: 50 }, { x: 600, y: 70 });
        const themeColors = THEME_COLORS.map((color, i) =>
            f.colorButton(themeRow, `Theme ${i}`, { x: -220 + i * 110, y: 0 }, { x: 60, y: 60 }, { color }));

        f.text(root, 'CompanionLabel', { x: 0, y: -30 }, { x: 600, y: 40 }, { text: 'Companion Color' });
        const companionRow = f.subPanel(root, 'CompanionColors', { x: 0, y: -90 }, { x: 600, y: 70 });
        const companionColors = COMPANION_COLORS.map((color, i) =>
            f.colorButton(companionRow, `Companion ${i}`, { x: -220 + i * 110, y: 0 }, { x: 60, y: 60 }, { color }));

        f.text(root, 'AccessoryLabel', { x: 0, y: -170 }, { x: 600, y: 40 }, { text: 'Accessory' });
        const accessoryRow = f.subPanel(root, 'Accessories', { x: 0, y: -230 }, { x: 600, y: 70 });
        const accessories = ACCESSORIES.map((label, i) =>
            f.button(accessoryRow, `${label}Button`, { x: -210 + i * 140, y: 0 }, { x: 120, y: 50 }, { label }));
        const accessoryStatus = f.text(root, 'AccessoryStatus', { x: 0, y: -290 }, { x: 600, y: 40 }, { text: 'Accessory: None' });

        const finish = f.button(root, 'FinishButton', { x: 0, y: -380 }, { x: 240, y: 70 }, { label: 'Done', fontSize: 30 });

        return {
            name: 'Customization',
            root,
            handles: { title, brightness, volume, scale, themeColors, companionColors, accessories, accessoryStatus, finish },
        };
    }

    private buildConnectionConfirm(): Panel<'ConnectionConfirm'> {
        const f = this.factory;
        const root = f.panel('ConnectionConfirmPanel', { x: 800, y: 900 });
        const thinking = f.text(root, 'ThinkingIndicator', { x: 0, y: -240 }, { x: 700, y: 40 }, {
            text: 'Nomi is thinking...',
            fontSize: 22,
        });
        thinking.node.setVisible(false);
        return {
            name: 'ConnectionConfirm',
            root,
            handles: {
                title: f.text(root, 'Title', { x: 0, y: 400 }, { x: 700, y: 60 }, { text: 'Chat with Nomi', fontSize: 40 }),
                transcript: f.scrollList(root, 'Transcript', { x: 0, y: 80 }, { x: 700, y: 560 }, { spacing: 10 }),
                thinking,
                input: f.textInput(root, 'MessageInput', { x: -70, y: -300 }, { x: 560, y: 60 }, {
                    placeholder: 'Type how you feel...',
                }),
                send: f.button(root, 'SendButton', { x: 290, y: -300 }, { x: 120, y: 60 }, { label: 'Send' }),
                continueButton: f.button(root, 'ContinueButton', { x: 0, y: -390 }, { x: 240, y: 60 }, { label: 'Continue' }),
            },
        };
    }

    private buildMainMenu(): Panel<'MainMenu'> {
        const f = this.factory;
        const root = f.panel('MainMenuPanel', { x: 1000, y: 700 });
        const sidebar = f.subPanel(root, 'Sidebar', { x: -350, y: 0 }, { x: 260, y: 660 });
        const sideButton = (name: string, label: string, row: number) =>
            f.button(sidebar, name, { x: 0, y: 240 - row * 120 }, { x: 220, y: 90 }, { label, fontSize: 26 });

        return {
            name: 'MainMenu',
            root,
            handles: {
                title: f.text(root, 'Title', { x: 130, y: 280 }, { x: 600, y: 60 }, { text: 'Healing Hub', fontSize: 44 }),
                nutrients: f.text(root, 'Nutrients', { x: 130, y: 200 }, { x: 600, y: 40 }, { text: 'Nutrients: 0' }),
                hint: f.text(root, 'Hint', { x: 130, y: -60 }, { x: 600, y: 80 }, { text: '', fontSize: 22 }),
                startHealing: f.button(root, 'StartHealingButton', { x: 130, y: 60 }, { x: 320, y: 90 }, {
                    label: 'Start Healing',
                    fontSize: 32,
                }),
                settings: f.button(root, 'SettingsButton', { x: 450, y: 300 }, { x: 60, y: 60 }, { label: '⚙', fontSize: 32 }),
                sidebar,
                breathing: sideButton('BreathingButton', 'Breathing', 0),
                altruistic: sideButton('AltruisticButton', 'Comfort', 1),
                tree: sideButton('TreeButton', 'Tree', 2),
                history: sideButton('HistoryButton', 'History', 3),
                chat: sideButton('ChatButton', 'Chat', 4),
            },
        };
    }

    private buildBreathing(): Panel<'Breathing'> {
        const f = this.factory;
        const root = f.panel('BreathingPanel', { x: 600, y: 600 });
        return {
            name: 'Breathing',
            root,
            handles: {
                title: f.text(root, 'Title', { x: 0, y: 240 }, { x: 550, y: 60 }, { text: '4-7-8 Breathing', fontSize: 40 }),
                phase: f.text(root, 'PhaseText', { x: 0, y: 60 }, { x: 550, y: 200 }, { text: '', fontSize: 36 }),
                remaining: f.text(root, 'RemainingText', { x: 0, y: -100 }, { x: 550, y: 50 }, { text: '', fontSize: 26 }),
                finish: f.button(root, 'FinishButton', { x: 0, y: -220 }, { x: 240, y: 70 }, { label: 'Finish', fontSize: 30 }),
            },
        };
    }

    private buildAltruistic(): Panel<'Altruistic'> {
        const f = this.factory;
        const root = f.panel('AltruisticPanel', { x: 600, y: 600 });
        const cameraPreview = f.subPanel(root, 'CameraPreview', { x: 0, y: 40 }, { x: 320, y: 180 }, PALETTE.field);
        cameraPreview.setVisible(false);
        const required = this.config.altruistic_required_touches;
        return {
            name: 'Altruistic',
            root,
            handles: {
                title: f.text(root, 'Title', { x: 0, y: 250 }, { x: 550, y: 60 }, { text: 'Comfort Your Companion', fontSize: 36 }),
                instructions: f.text(root, 'Instructions', { x: 0, y: 180 }, { x: 550, y: 60 }, {
                    text: 'Gently touch your companion to comfort it.',
                    fontSize: 22,
                }),
                touches: f.text(root, 'TouchCount', { x: 0, y: -90 }, { x: 300, y: 50 }, { text: `Touches: 0/${required}`, fontSize: 30 }),
                cameraPreview,
                comfort: f.button(root, 'ComfortButton', { x: -130, y: -210 }, { x: 220, y: 70 }, { label: 'Comfort' }),
                finish: f.button(root, 'FinishButton', { x: 130, y: -210 }, { x: 220, y: 70 }, { label: 'Finish' }),
            },
        };
    }

    private buildTreeControl(): Panel<'TreeControl'> {
        const f = this.factory;
        const root = f.panel('TreeControlPanel', { x: 500, y: 400 });
        return {
            name: 'TreeControl',
            root,
            handles: {
                title: f.text(root, 'Title', { x: 0, y: 160 }, { x: 450, y: 50 }, { text: 'Your Tree', fontSize: 34 }),
                seasonLabel: f.text(root, 'SeasonLabel', { x: -150, y: 90 }, { x: 140, y: 40 }, { text: 'Season' }),
                season: f.dropdown(root, 'SeasonDropdown', { x: 70, y: 90 }, { x: 260, y: 40 }, {
                    options: SEASONS,
                    itemHeight: this.config.dropdown_item_height,
                }),
                resetOrbs: f.button(root, 'ResetOrbsButton', { x: 0, y: -60 }, { x: 260, y: 60 }, { label: 'Reset Orbs' }),
                close: f.button(root, 'CloseButton', { x: 0, y: -140 }, { x: 260, y: 60 }, { label: 'Close Controls' }),
            },
        };
    }

    private buildHistory(): Panel<'History'> {
        const f = this.factory;
        const root = f.panel('HistoryPanel', { x: 800, y: 700 });
        return {
            name: 'History',
            root,
            handles: {
                title: f.text(root, 'Title', { x: 0, y: 300 }, { x: 700, y: 60 }, { text: 'Your Journey', fontSize: 40 }),
                status: f.text(root, 'Status', { x: 0, y: 250 }, { x: 700, y: 40 }, { text: '', fontSize: 22 }),
                list: f.scrollList(root, 'Entries', { x: 0, y: 20 }, { x: 720, y: 400 }),
                back: f.button(root, 'BackButton', { x: 0, y: -280 }, { x: 240, y: 70 }, { label: 'Back' }),
            },
        };
    }

    private buildTaskOverlay(): Panel<'TaskOverlay'> {
        const f = this.factory;
        const root = f.panel('TaskOverlayPanel', this.surface.root.size, PALETTE.clear);
        const background = f.button(root, 'Background', { x: 0, y: 0 }, this.surface.root.size, {
            color: { r: 0, g: 0, b: 0, a: 0.6 },
        });
        const card = f.subPanel(root, 'Card', { x: 0, y: 0 }, { x: 700, y: 420 });
        return {
            name: 'TaskOverlay',
            root,
            handles: {
                background,
                title: f.text(card, 'Title', { x: 0, y: 150 }, { x: 640, y: 60 }, { text: OVERLAY_TITLE, fontSize: 34 }),
                message: f.text(card, 'Message', { x: 0, y: 20 }, { x: 640, y: 180 }, { text: '', fontSize: 28 }),
                dismiss: f.button(card, 'DismissButton', { x: 0, y: -150 }, { x: 220, y: 70 }, { label: 'Got it!' }),
            },
        };
    }
}
