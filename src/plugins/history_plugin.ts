import sampleHistoryData from '../data/sample_history.json';
import { HistoryEntriesSchema, type HistoryEntry } from '../kernel/schemas';
import type { StateEntry } from '../session/session_state_machine';
import type { ButtonWidget } from '../ui/widgets';
import { StatePlugin } from './state_plugin';

const CARD_SIZE = { x: 700, y: 120 };

function parseSample(): HistoryEntry[] {
    const parsed = HistoryEntriesSchema.safeParse(sampleHistoryData);
    if (!parsed.success) {
        console.error('[HistoryPlugin] Bundled sample history failed validation', parsed.error.issues);
        return [];
    }
    return parsed.data;
}

export const SAMPLE_HISTORY: readonly HistoryEntry[] = parseSample();

/**
 * Past check-ins as stacked cards.  Entries come from the HistorySource
 * collaborator; a failed or invalid load falls back to the bundled sample.
 * A load that completes after the state was left (or re-entered) is dropped.
 */
export class HistoryPlugin extends StatePlugin<'History'> {
    public readonly name = 'HistoryPlugin';
    public readonly state = 'History';

    private loadSeq = 0;
    private shown: HistoryEntry[] = [];
    private cardBindings: Array<() => void> = [];
    private recalls: ButtonWidget[] = [];

    public get entries(): readonly HistoryEntry[] {
        return this.shown;
    }

    /** Recall button of each rendered card, in list order. */
    public get recallButtons(): readonly ButtonWidget[] {
        return this.recalls;
    }

    protected bind(): Array<() => void> {
        const panel = this.panel;
        if (!panel) return [];
        return [
            panel.handles.back.onClick.connect(() => this.context.session.dispatch('back')),
            () => this.clearCards(),
        ];
    }

    protected onEnter(_transition: StateEntry): void {
        const seq = ++this.loadSeq;
        this.clearCards();
        this.panel?.handles.status.setText('Loading...');

        const source = this.context.pal.resolve('historySource');
        if (!source) {
            this.render([...SAMPLE_HISTORY]);
            return;
        }
        let load: Promise<unknown>;
        try {
            load = source.load();
        } catch (error) {
            load = Promise.reject(error);
        }
        void load.then(
            raw => this.onLoaded(seq, raw),
            (error: unknown) => this.onFailed(seq, error),
        );
    }

    protected onExit(): void {
        this.loadSeq++;
    }

    private onLoaded(seq: number, raw: unknown): void {
        if (!this.isCurrent(seq)) return;
        const parsed = HistoryEntriesSchema.safeParse(raw);
        if (!parsed.success) {
            console.warn('[HistoryPlugin] History payload failed validation; showing sample history', parsed.error.issues);
            this.render([...SAMPLE_HISTORY]);
            return;
        }
        this.render(parsed.data);
    }

    private onFailed(seq: number, error: unknown): void {
        if (!this.isCurrent(seq)) return;
        console.error('[HistoryPlugin] History load failed; showing sample history', error);
        this.render([...SAMPLE_HISTORY]);
    }

    private isCurrent(seq: number): boolean {
        if (seq === this.loadSeq && this.isActive) return true;
        this.log(`Dropped stale history load ${seq}`);
        return false;
    }

    private render(entries: HistoryEntry[]): void {
        this.shown = entries;
        const panel = this.panel;
        if (!panel) return;
        const { list, status } = panel.handles;
        const widgets = this.context.widgets;
        const cardHeight = this.config.history_card_height;

        this.clearCards();
        entries.forEach((entry, i) => {
            const slot = list.addItem(`Card ${i}`, cardHeight);
            const card = widgets.subPanel(slot, 'Card', { x: 0, y: 0 }, CARD_SIZE);
            widgets.text(card, 'Date', { x: -200, y: 30 }, { x: 260, y: 40 }, { text: `${entry.date}  ${entry.time}`, fontSize: 22 });
            widgets.text(card, 'Description', { x: -100, y: -25 }, { x: 460, y: 40 }, {
                text: `${entry.anxiety_level} (${entry.anxiety_score.toFixed(1)})`,
                fontSize: 24,
            });
            const recall = widgets.button(card, 'RecallButton', { x: 260, y: 0 }, { x: 140, y: 60 }, { label: 'Recall' });
            this.recalls.push(recall);
            this.cardBindings.push(recall.onClick.connect(() => {
                this.context.eventBus.publish('COMPANION_EXPRESSION', { expression: entry.expression });
            }));
        });
        list.scrollTo(0);
        status.setText(entries.length === 0 ? 'No check-ins yet' : `${entries.length} check-ins`);
    }

    private clearCards(): void {
        for (const unbind of this.cardBindings.splice(0)) unbind();
        this.recalls = [];
        this.panel?.handles.list.clear();
    }
}
