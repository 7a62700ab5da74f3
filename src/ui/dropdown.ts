/**
 * dropdown.ts: composite single-select dropdown.
 *
 *   Root (raycast target, activates toggle())
 *   ├── Label           current option text
 *   ├── Arrow           ▼
 *   └── Template        hidden until opened
 *       └── Viewport    clip = true
 *           └── Content vertical stack, height = optionCount × itemHeight
 *               └── Item i (ToggleWidget: Checkmark + Label)
 *
 * Exactly one option toggle is on.  The dropdown owns the exclusivity, so two
 * dropdowns on the same panel never interfere with each other.
 */

import type { UiNode } from './surface';
import { Signal, TextWidget, ToggleWidget, Widget, type Selectable } from './widgets';

export interface DropdownParts {
    label: TextWidget;
    arrow: TextWidget;
    template: UiNode;
    viewport: UiNode | null;
    content: UiNode | null;
    items: ToggleWidget[];
}

export class DropdownWidget extends Widget implements Selectable {
    public readonly kind = 'dropdown';
    public readonly onValueChanged: Signal<number>;
    public readonly options: readonly string[];
    /** True when construction left the widget without a usable option list. */
    public readonly inert: boolean;

    private readonly parts: DropdownParts;
    private current = 0;

    constructor(node: UiNode, parts: DropdownParts, options: readonly string[], initial: number) {
        super(node);
        this.parts = parts;
        this.options = [...options];
        this.onValueChanged = new Signal<number>(node.path());

        if (options.length === 0) {
            console.warn(`[WidgetFactory] Dropdown '${node.name}' built with no options; left inert`);
            this.inert = true;
        } else if (!parts.viewport || !parts.content || parts.items.length !== options.length) {
            console.error(`[WidgetFactory] Dropdown '${node.name}' is missing its viewport or option items; left inert`);
            this.inert = true;
        } else {
            this.inert = false;
        }

        parts.template.setVisible(false);
        if (this.inert) {
            parts.label.setText('');
            return;
        }

        parts.items.forEach((item, index) => {
            item.onPressed.connect(() => {
                this.select(index);
            });
        });
        this.current = Number.isInteger(initial) && initial >= 0 && initial < options.length ? initial : 0;
        this.applySelection();
    }

    public get value(): number {
        return this.current;
    }

    public get selectedText(): string {
        return this.options[this.current] ?? '';
    }

    public get label(): TextWidget {
        return this.parts.label;
    }

    public get items(): readonly ToggleWidget[] {
        return this.parts.items;
    }

    public get isOpen(): boolean {
        return this.parts.template.visible;
    }

    /** Label/arrow activation: open or collapse the option list. */
    public toggle(): boolean {
        if (this.inert || !this.reachable) return false;
        this.parts.template.setVisible(!this.parts.template.visible);
        return true;
    }

    public close(): void {
        this.parts.template.setVisible(false);
    }

    /**
     * Select an option by index.  Updates the label and collapses the list;
     * notifies listeners only when the selection actually changed.
     */
    public select(index: number): boolean {
        if (this.inert) return false;
        if (!Number.isInteger(index) || index < 0 || index >= this.options.length) {
            console.warn(`[Dropdown] '${this.name}' has no option ${index}`);
            return false;
        }
        this.close();
        if (index === this.current) return false;

        this.current = index;
        this.applySelection();
        this.onValueChanged.emit(index);
        return true;
    }

    public setValueWithoutNotify(index: number): void {
        if (this.inert || index < 0 || index >= this.options.length) return;
        this.current = index;
        this.applySelection();
    }

    private applySelection(): void {
        this.parts.items.forEach((item, i) => item.setIsOn(i === this.current));
        this.parts.label.setText(this.selectedText);
    }
}
