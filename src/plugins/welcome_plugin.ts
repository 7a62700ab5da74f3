import type { StateEntry } from '../session/session_state_machine';
import { StatePlugin } from './state_plugin';

/** Greets a first-run user, then hands over to Customization on a delay or on Begin. */
export class WelcomePlugin extends StatePlugin<'Welcome'> {
    public readonly name = 'WelcomePlugin';
    public readonly state = 'Welcome';

    protected bind(): Array<() => void> {
        const panel = this.panel;
        if (!panel) return [];
        return [panel.handles.begin.onClick.connect(() => this.complete())];
    }

    protected onEnter(_transition: StateEntry): void {
        this.after(this.config.welcome_auto_advance_ms, () => this.complete());
    }

    private complete(): void {
        if (!this.isActive) return;
        this.context.session.dispatch('welcome-complete');
    }
}
