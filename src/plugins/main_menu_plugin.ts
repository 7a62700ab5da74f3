import type { StateEntry } from '../session/session_state_machine';
import { FLAG_KEYS, readNumber } from '../session/flag_store';
import { HEALING_PATHS, loadAnxietyLevel } from '../session/guided_healing';
import { StatePlugin } from './state_plugin';

export const MAIN_MENU_TEXT = {
    firstEntryTitle: 'Welcome!',
    returnTitle: 'Welcome back',
    noLevelHint: 'Check in with Nomi first so a healing path can be suggested.',
} as const;

/** The hub: activity sidebar, guided healing entry point and settings. */
export class MainMenuPlugin extends StatePlugin<'MainMenu'> {
    public readonly name = 'MainMenuPlugin';
    public readonly state = 'MainMenu';

    protected bind(): Array<() => void> {
        const panel = this.panel;
        if (!panel) return [];
        const h = panel.handles;
        const session = this.context.session;
        return [
            h.breathing.onClick.connect(() => session.dispatch('select-breathing')),
            h.altruistic.onClick.connect(() => session.dispatch('select-altruistic')),
            h.tree.onClick.connect(() => session.dispatch('select-tree')),
            h.history.onClick.connect(() => session.dispatch('select-history')),
            h.chat.onClick.connect(() => session.dispatch('select-chat')),
            h.settings.onClick.connect(() => session.dispatch('open-settings')),
            h.startHealing.onClick.connect(() => this.startHealing()),
        ];
    }

    protected onEnter(transition: StateEntry): void {
        const panel = this.panel;
        if (!panel) return;
        const h = panel.handles;
        h.title.setText(transition.entry === 'first-entry' ? MAIN_MENU_TEXT.firstEntryTitle : MAIN_MENU_TEXT.returnTitle);
        const store = this.context.pal.require('flagStore');
        h.nutrients.setText(`Nutrients: ${readNumber(store, FLAG_KEYS.totalNutrients, 0)}`);
        h.hint.setText(this.pathHint());
    }

    private startHealing(): void {
        if (this.context.session.startGuidedHealing()) return;
        this.panel?.handles.hint.setText(MAIN_MENU_TEXT.noLevelHint);
    }

    private pathHint(): string {
        const level = loadAnxietyLevel(this.context.pal.require('flagStore'));
        if (level === null) return MAIN_MENU_TEXT.noLevelHint;
        return `Suggested path: ${HEALING_PATHS[level].join(' → ')}`;
    }
}
