/**
 * widget_factory.ts: builds primitive and composite widgets on a UiSurface.
 *
 * Every builder takes (parent, name, position, size, options) with position
 * relative to the parent's centre.  Construction is deterministic and fills
 * missing options with neutral defaults instead of throwing.  Interactive
 * widgets get a raycast-target graphic; plain text gets a graphic that lets
 * rays pass through to whatever sits behind it.
 */

import { UiNode, type Rgba, type UiSurface, type Vec2 } from './surface';
import {
    ButtonWidget,
    ColorButtonWidget,
    ScrollListWidget,
    SliderWidget,
    TextInputWidget,
    TextWidget,
    ToggleWidget,
} from './widgets';
import { DropdownWidget } from './dropdown';

export const PALETTE = {
    panel: { r: 0.08, g: 0.1, b: 0.16, a: 0.9 },
    subPanel: { r: 0.12, g: 0.14, b: 0.22, a: 0.95 },
    button: { r: 0.25, g: 0.45, b: 0.85, a: 1 },
    field: { r: 1, g: 1, b: 1, a: 0.12 },
    text: { r: 1, g: 1, b: 1, a: 1 },
    placeholder: { r: 0.7, g: 0.7, b: 0.7, a: 1 },
    accent: { r: 0.3, g: 0.9, b: 0.6, a: 1 },
    clear: { r: 0, g: 0, b: 0, a: 0 },
} satisfies Record<string, Rgba>;

const DEFAULT_FONT_SIZE = 24;
const DEFAULT_ITEM_HEIGHT = 30;
const DEFAULT_VISIBLE_ITEMS = 5;

export interface TextOptions {
    text?: string;
    fontSize?: number;
}

export interface ButtonOptions {
    label?: string;
    fontSize?: number;
    color?: Rgba;
}

export interface ColorButtonOptions {
    color?: Rgba;
}

export interface SliderOptions {
    min?: number;
    max?: number;
    value?: number;
}

export interface TextInputOptions {
    placeholder?: string;
    fontSize?: number;
}

export interface ScrollListOptions {
    spacing?: number;
}

export interface DropdownOptions {
    options?: readonly string[];
    itemHeight?: number;
    value?: number;
    maxVisibleItems?: number;
    fontSize?: number;
}

export class WidgetFactory {
    constructor(
        private readonly surface: UiSurface,
        private readonly defaultItemHeight: number = DEFAULT_ITEM_HEIGHT,
    ) {}

    /** Root-level panel, centred on the surface. */
    public panel(name: string, size: Vec2, color: Rgba = PALETTE.panel): UiNode {
        const node = this.node(this.surface.root, name, { x: 0, y: 0 }, size);
        node.graphic = { color: { ...color }, raycastTarget: true };
        return node;
    }

    public subPanel(parent: UiNode, name: string, position: Vec2, size: Vec2, color: Rgba = PALETTE.subPanel): UiNode {
        const node = this.node(parent, name, position, size);
        node.graphic = { color: { ...color }, raycastTarget: true };
        return node;
    }

    public text(parent: UiNode, name: string, position: Vec2, size: Vec2, options: TextOptions = {}): TextWidget {
        const node = this.node(parent, name, position, size);
        node.graphic = { color: { ...PALETTE.text }, raycastTarget: false };
        node.fontSize = this.fontSize(options.fontSize);
        node.setText(options.text ?? '');
        return new TextWidget(node);
    }

    public button(parent: UiNode, name: string, position: Vec2, size: Vec2, options: ButtonOptions = {}): ButtonWidget {
        const node = this.node(parent, name, position, size);
        node.graphic = { color: { ...(options.color ?? PALETTE.button) }, raycastTarget: true };
        const label = this.text(node, 'Label', { x: 0, y: 0 }, size, { text: options.label, fontSize: options.fontSize });
        return new ButtonWidget(node, label);
    }

    public colorButton(parent: UiNode, name: string, position: Vec2, size: Vec2, options: ColorButtonOptions = {}): ColorButtonWidget {
        const node = this.node(parent, name, position, size);
        node.graphic = { color: { ...(options.color ?? PALETTE.text) }, raycastTarget: true };
        const outline = this.node(node, 'Outline', { x: 0, y: 0 }, { x: size.x + 8, y: size.y + 8 });
        outline.graphic = { color: { ...PALETTE.accent }, raycastTarget: false };
        outline.setVisible(false);
        const label = this.text(node, 'Label', { x: 0, y: 0 }, size, { text: '' });
        return new ColorButtonWidget(node, label, outline);
    }

    public slider(parent: UiNode, name: string, position: Vec2, size: Vec2, options: SliderOptions = {}): SliderWidget {
        let min = this.finite(options.min, 0);
        let max = this.finite(options.max, 1);
        if (max <= min) {
            console.warn(`[WidgetFactory] Slider '${name}' has empty range [${min}, ${max}]; using [${min}, ${min + 1}]`);
            max = min + 1;
        }
        const value = this.finite(options.value, min);

        const node = this.node(parent, name, position, size);
        node.graphic = { color: { ...PALETTE.field }, raycastTarget: true };
        const fill = this.node(node, 'Fill', { x: 0, y: 0 }, { x: 0, y: size.y });
        fill.graphic = { color: { ...PALETTE.accent }, raycastTarget: false };
        const handle = this.node(node, 'Handle', { x: 0, y: 0 }, { x: size.y, y: size.y });
        handle.graphic = { color: { ...PALETTE.text }, raycastTarget: true };
        return new SliderWidget(node, fill, handle, min, max, value);
    }

    public textInput(parent: UiNode, name: string, position: Vec2, size: Vec2, options: TextInputOptions = {}): TextInputWidget {
        const node = this.node(parent, name, position, size);
        node.graphic = { color: { ...PALETTE.field }, raycastTarget: true };
        const inner = { x: Math.max(0, size.x - 20), y: Math.max(0, size.y - 10) };
        const placeholder = this.text(node, 'Placeholder', { x: 0, y: 0 }, inner, {
            text: options.placeholder ?? '',
            fontSize: options.fontSize,
        });
        const content = this.text(node, 'Text', { x: 0, y: 0 }, inner, { text: '', fontSize: options.fontSize });
        return new TextInputWidget(node, content, placeholder);
    }

    public scrollList(parent: UiNode, name: string, position: Vec2, size: Vec2, options: ScrollListOptions = {}): ScrollListWidget {
        const node = this.node(parent, name, position, size);
        node.graphic = { color: { ...PALETTE.field }, raycastTarget: true };
        const viewport = this.node(node, 'Viewport', { x: 0, y: 0 }, size);
        viewport.clip = true;
        const content = this.node(viewport, 'Content', { x: 0, y: size.y / 2 }, { x: size.x, y: size.y });
        content.layout = { spacing: Math.max(0, this.finite(options.spacing, 0)), minHeight: size.y };
        const list = new ScrollListWidget(this.surface, node, viewport, content);
        list.relayout();
        return list;
    }

    /**
     * Composite single-select dropdown.  The option list sits in a clipped
     * viewport below the label; content height is optionCount × itemHeight.
     */
    public dropdown(parent: UiNode, name: string, position: Vec2, size: Vec2, options: DropdownOptions = {}): DropdownWidget {
        const labels = options.options ?? [];
        let itemHeight = this.finite(options.itemHeight, this.defaultItemHeight);
        if (itemHeight <= 0) {
            console.warn(`[WidgetFactory] Dropdown '${name}' item height ${itemHeight} is not positive; using ${this.defaultItemHeight}`);
            itemHeight = this.defaultItemHeight;
        }
        const visibleItems = Math.max(1, Math.floor(this.finite(options.maxVisibleItems, DEFAULT_VISIBLE_ITEMS)));
        const fontSize = options.fontSize;

        const node = this.node(parent, name, position, size);
        node.graphic = { color: { ...PALETTE.field }, raycastTarget: true };

        const label = this.text(node, 'Label', { x: -15, y: 0 }, { x: Math.max(0, size.x - 40), y: size.y }, { fontSize });
        const arrow = this.text(node, 'Arrow', { x: size.x / 2 - 20, y: 0 }, { x: 30, y: size.y }, { text: '▼', fontSize });

        const templateHeight = Math.min(Math.max(labels.length, 1), visibleItems) * itemHeight;
        const template = this.node(node, 'Template', { x: 0, y: -(size.y / 2 + templateHeight / 2) }, { x: size.x, y: templateHeight });
        template.graphic = { color: { ...PALETTE.subPanel }, raycastTarget: true };

        const items: ToggleWidget[] = [];
        let viewport: UiNode | null = null;
        let content: UiNode | null = null;
        if (labels.length > 0) {
            viewport = this.node(template, 'Viewport', { x: 0, y: 0 }, { x: size.x, y: templateHeight });
            viewport.clip = true;
            content = this.node(viewport, 'Content', { x: 0, y: templateHeight / 2 }, { x: size.x, y: 0 });
            content.layout = { spacing: 0 };
            for (const [index, text] of labels.entries()) {
                items.push(this.optionItem(content, index, text, { x: size.x, y: itemHeight }, fontSize));
            }
            content.applyLayout();
        }

        return new DropdownWidget(
            node,
            { label, arrow, template, viewport, content, items },
            labels,
            this.finite(options.value, 0),
        );
    }

    private optionItem(content: UiNode, index: number, text: string, size: Vec2, fontSize: number | undefined): ToggleWidget {
        const node = this.node(content, `Item ${index}: ${text}`, { x: 0, y: 0 }, size);
        node.graphic = { color: { ...PALETTE.clear }, raycastTarget: true };
        const checkmark = this.node(node, 'Checkmark', { x: -size.x / 2 + 12, y: 0 }, { x: 16, y: 16 });
        checkmark.graphic = { color: { ...PALETTE.accent }, raycastTarget: false };
        checkmark.setVisible(false);
        const label = this.text(node, 'Label', { x: 12, y: 0 }, { x: Math.max(0, size.x - 40), y: size.y }, { text, fontSize });
        return new ToggleWidget(node, checkmark, label);
    }

    private node(parent: UiNode, name: string, position: Vec2, size: Vec2): UiNode {
        return UiNode.mount(this.surface, parent, name, position, {
            x: Math.max(0, this.finite(size.x, 0)),
            y: Math.max(0, this.finite(size.y, 0)),
        });
    }

    private fontSize(value: number | undefined): number {
        const size = this.finite(value, DEFAULT_FONT_SIZE);
        return size > 0 ? size : DEFAULT_FONT_SIZE;
    }

    private finite(value: number | undefined, fallback: number): number {
        return value !== undefined && Number.isFinite(value) ? value : fallback;
    }
}
