import { UiNode, type Rgba, type UiSurface } from './surface';

// ── Widget notifications ──────────────────────────────────────────────────────

export type SignalListener<T> = (value: T) => void;

/**
 * Per-widget notification channel.  Outer orchestration connects to it; the
 * widget emits on activation or value change.  A throwing listener is logged
 * and the remaining listeners still run.
 */
export class Signal<T> {
    private readonly listeners = new Set<SignalListener<T>>();

    constructor(private readonly owner: string) {}

    public connect(listener: SignalListener<T>): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    public emit(value: T): void {
        for (const listener of Array.from(this.listeners)) {
            try {
                listener(value);
            } catch (error) {
                console.error(`[Widget] Listener on '${this.owner}' threw; continuing delivery`, error);
            }
        }
    }
}

// ── Capabilities ──────────────────────────────────────────────────────────────

export interface Clickable {
    readonly onClick: Signal<void>;
    interactable: boolean;
    /** Pointer activation; ignored (returns false) while hidden or not interactable. */
    click(): boolean;
}

export interface Editable {
    readonly text: string;
    setText(text: string): void;
    readonly onValueChanged: Signal<string>;
    readonly onSubmit: Signal<string>;
}

export interface Rangeable {
    readonly value: number;
    readonly min: number;
    readonly max: number;
    setValue(value: number): void;
    readonly onValueChanged: Signal<number>;
}

export interface Selectable {
    readonly value: number;
    readonly options: readonly string[];
    select(index: number): boolean;
    readonly onValueChanged: Signal<number>;
}

export interface Scrollable {
    readonly scrollOffset: number;
    readonly contentHeight: number;
    readonly viewportHeight: number;
    scrollTo(offset: number): void;
}

export type WidgetKind =
    | 'text'
    | 'button'
    | 'color-button'
    | 'slider'
    | 'text-input'
    | 'scroll-list'
    | 'toggle'
    | 'dropdown';

export abstract class Widget {
    public abstract readonly kind: WidgetKind;

    constructor(public readonly node: UiNode) {}

    public get name(): string {
        return this.node.name;
    }

    /** Whether pointer/ray input can currently reach this widget. */
    protected get reachable(): boolean {
        return this.node.visibleInHierarchy && (this.node.graphic?.raycastTarget ?? false);
    }
}

// ── Variants ──────────────────────────────────────────────────────────────────

export class TextWidget extends Widget {
    public readonly kind = 'text';

    public get text(): string {
        return this.node.text ?? '';
    }

    public setText(text: string): void {
        this.node.setText(text);
    }
}

export class ButtonWidget extends Widget implements Clickable {
    public readonly kind: WidgetKind = 'button';
    public readonly onClick: Signal<void>;
    public interactable = true;

    constructor(node: UiNode, public readonly label: TextWidget) {
        super(node);
        this.onClick = new Signal<void>(node.path());
    }

    public setLabel(text: string): void {
        this.label.setText(text);
    }

    public click(): boolean {
        if (!this.interactable || !this.reachable) return false;
        this.onClick.emit();
        return true;
    }
}

/** Swatch button: the graphic colour is the content; an outline marks selection. */
export class ColorButtonWidget extends ButtonWidget {
    public readonly kind: WidgetKind = 'color-button';

    constructor(node: UiNode, label: TextWidget, private readonly outline: UiNode) {
        super(node, label);
    }

    public get color(): Rgba | null {
        return this.node.graphic ? { ...this.node.graphic.color } : null;
    }

    public get selected(): boolean {
        return this.outline.visible;
    }

    public setSelected(selected: boolean): void {
        this.outline.setVisible(selected);
    }
}

export class SliderWidget extends Widget implements Rangeable {
    public readonly kind = 'slider';
    public readonly onValueChanged: Signal<number>;
    private current: number;

    constructor(
        node: UiNode,
        private readonly fill: UiNode,
        private readonly handle: UiNode,
        public readonly min: number,
        public readonly max: number,
        initial: number,
    ) {
        super(node);
        this.onValueChanged = new Signal<number>(node.path());
        this.current = this.clamp(initial);
        this.placeHandle();
    }

    public get value(): number {
        return this.current;
    }

    /** Sets the value (clamped to range); notifies only when it changed. */
    public setValue(value: number): void {
        const next = this.clamp(value);
        if (next === this.current) return;
        this.current = next;
        this.placeHandle();
        this.onValueChanged.emit(next);
    }

    public setValueWithoutNotify(value: number): void {
        this.current = this.clamp(value);
        this.placeHandle();
    }

    /** Pointer drag to a normalised position along the track. */
    public dragTo(normalized: number): boolean {
        if (!this.reachable) return false;
        const t = Math.min(1, Math.max(0, normalized));
        this.setValue(this.min + t * (this.max - this.min));
        return true;
    }

    public get normalizedValue(): number {
        return (this.current - this.min) / (this.max - this.min);
    }

    private clamp(value: number): number {
        if (Number.isNaN(value)) return this.min;
        return Math.min(this.max, Math.max(this.min, value));
    }

    private placeHandle(): void {
        const width = this.node.size.x;
        const t = this.normalizedValue;
        this.fill.size.x = width * t;
        this.fill.position.x = -width / 2 + (width * t) / 2;
        this.handle.position.x = -width / 2 + width * t;
    }
}

export class TextInputWidget extends Widget implements Editable {
    public readonly kind = 'text-input';
    public readonly onValueChanged: Signal<string>;
    public readonly onSubmit: Signal<string>;

    constructor(node: UiNode, private readonly content: TextWidget, public readonly placeholder: TextWidget) {
        super(node);
        this.onValueChanged = new Signal<string>(node.path());
        this.onSubmit = new Signal<string>(node.path());
    }

    public get text(): string {
        return this.content.text;
    }

    public setText(text: string): void {
        if (text === this.content.text) return;
        this.content.setText(text);
        this.placeholder.node.setVisible(text.length === 0);
        this.onValueChanged.emit(text);
    }

    /** Keyboard entry; ignored while hidden. */
    public type(text: string): boolean {
        if (!this.reachable) return false;
        this.setText(text);
        return true;
    }

    /** Enter key; ignored while hidden. */
    public submit(): boolean {
        if (!this.reachable) return false;
        this.onSubmit.emit(this.text);
        return true;
    }
}

/**
 * Clipped viewport over a stacked content list.  Content height follows the
 * items but never drops below the viewport height.
 */
export class ScrollListWidget extends Widget implements Scrollable {
    public readonly kind = 'scroll-list';
    private offset = 0;

    constructor(
        private readonly surface: UiSurface,
        node: UiNode,
        public readonly viewport: UiNode,
        public readonly content: UiNode,
    ) {
        super(node);
    }

    public get items(): readonly UiNode[] {
        return this.content.children;
    }

    public get contentHeight(): number {
        return this.content.size.y;
    }

    public get viewportHeight(): number {
        return this.viewport.size.y;
    }

    public get scrollOffset(): number {
        return this.offset;
    }

    public get maxScroll(): number {
        return Math.max(0, this.contentHeight - this.viewportHeight);
    }

    public scrollTo(offset: number): void {
        this.offset = Math.min(this.maxScroll, Math.max(0, offset));
        this.content.position.y = this.viewportHeight / 2 + this.offset;
    }

    public scrollToBottom(): void {
        this.scrollTo(this.maxScroll);
    }

    /** Append a full-width item slot of the given height and re-stack the content. */
    public addItem(name: string, height: number): UiNode {
        const item = UiNode.mount(this.surface, this.content, name, { x: 0, y: 0 }, { x: this.viewport.size.x, y: height });
        this.relayout();
        return item;
    }

    public clear(): void {
        for (const item of [...this.content.children]) {
            item.remove();
        }
        this.relayout();
    }

    public relayout(): void {
        this.content.applyLayout();
        this.scrollTo(this.offset);
    }
}

/** Two-state option item used inside a dropdown's content list. */
export class ToggleWidget extends Widget {
    public readonly kind = 'toggle';
    public readonly onPressed: Signal<void>;

    constructor(node: UiNode, private readonly checkmark: UiNode, public readonly label: TextWidget) {
        super(node);
        this.onPressed = new Signal<void>(node.path());
    }

    public get isOn(): boolean {
        return this.checkmark.visible;
    }

    public setIsOn(on: boolean): void {
        this.checkmark.setVisible(on);
    }

    public press(): boolean {
        if (!this.reachable) return false;
        this.onPressed.emit();
        return true;
    }
}
