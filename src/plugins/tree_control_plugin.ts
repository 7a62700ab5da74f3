import orbTaskData from '../data/orb_tasks.json';
import { TaskListSchema } from '../kernel/schemas';
import type { StateEntry } from '../session/session_state_machine';
import { FLAG_KEYS, readNumber } from '../session/flag_store';
import { loadAnxietyLevel } from '../session/guided_healing';
import { SEASONS } from '../ui/panel_builder';
import { StatePlugin } from './state_plugin';

export const ORBS_RESET_PROMPT = '🔄 Orbs Reset\n\nNew tasks are ready for you!';
export const ENCOURAGEMENT_PROMPT = "🌱 You're doing great!\n\nKeep nurturing your tree, one small step at a time.";

/**
 * Tree configurator: season preset dropdown and the floating task orbs.
 * An activated orb draws a behavioural-activation task without repetition
 * until the pool runs dry; confirming the prompt feeds the tree.
 */
export class TreeControlPlugin extends StatePlugin<'TreeControl'> {
    public readonly name = 'TreeControlPlugin';
    public readonly state = 'TreeControl';

    private tasks: readonly string[] = [];
    private pool: string[] = [];
    private awaitingConfirmation: string | null = null;

    constructor(tasks: unknown = orbTaskData) {
        super();
        const parsed = TaskListSchema.safeParse(tasks);
        if (parsed.success) {
            this.tasks = parsed.data;
        } else {
            console.error('[TreeControlPlugin] Task list failed validation; orbs will only encourage', parsed.error.issues);
        }
        this.refill();
    }

    public get remainingTasks(): number {
        return this.pool.length;
    }

    /** Handle an orb activation; returns the prompt raised, or null when inactive. */
    public activateOrb(orbIndex: number): string | null {
        if (!this.isActive) return null;
        const level = loadAnxietyLevel(this.context.pal.require('flagStore'));
        if (level === 'light' || this.tasks.length === 0) {
            this.raise(ENCOURAGEMENT_PROMPT);
            return ENCOURAGEMENT_PROMPT;
        }

        if (this.pool.length === 0) this.refill();
        const random = this.context.pal.resolve('random') ?? Math.random;
        const pick = Math.min(this.pool.length - 1, Math.floor(random() * this.pool.length));
        const [task] = this.pool.splice(pick, 1);
        if (task === undefined) return null;

        this.log(`Orb ${orbIndex} → "${task}"`);
        this.awaitingConfirmation = task;
        this.raise(task);
        return task;
    }

    public resetOrbs(): void {
        this.refill();
        this.awaitingConfirmation = null;
        this.raise(ORBS_RESET_PROMPT);
    }

    protected bind(): Array<() => void> {
        const panel = this.panel;
        if (!panel) return [];
        const h = panel.handles;
        const bus = this.context.eventBus;
        return [
            h.season.onValueChanged.connect(index => {
                bus.publish('TREE_SEASON_CHANGED', { index, season: SEASONS[index] ?? SEASONS[0] });
            }),
            h.resetOrbs.onClick.connect(() => this.resetOrbs()),
            h.close.onClick.connect(() => this.leave('close')),
            bus.subscribe('ORB_ACTIVATED', ({ orbIndex }) => {
                this.activateOrb(orbIndex);
            }),
            bus.subscribe('TASK_OVERLAY_STATE', ({ visible, text }) => {
                if (visible || text !== this.awaitingConfirmation) return;
                this.awaitingConfirmation = null;
                this.reward();
            }),
        ];
    }

    protected onEnter(_transition: StateEntry): void {
        this.panel?.handles.close.setLabel(this.finishLabel('Close Controls'));
    }

    protected onExit(): void {
        this.awaitingConfirmation = null;
        this.panel?.handles.season.close();
    }

    private reward(): void {
        const nutrients = this.config.orb_task_nutrients;
        const saved = this.withStore('adding nutrients', store =>
            store.set(FLAG_KEYS.totalNutrients, readNumber(store, FLAG_KEYS.totalNutrients, 0) + nutrients));
        if (saved) this.log(`Task confirmed; +${nutrients} nutrients`);
    }

    private raise(text: string): void {
        this.context.eventBus.publish('TASK_PROMPT', { text, source: 'tree' });
    }

    private refill(): void {
        this.pool = [...this.tasks];
    }
}
