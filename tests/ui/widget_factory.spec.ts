import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fc from 'fast-check';
import { HeadlessSurface, describeTree } from '../../src/ui/surface';
import { WidgetFactory } from '../../src/ui/widget_factory';

const arbOptions = fc.array(fc.string({ minLength: 1, maxLength: 12 }), { minLength: 1, maxLength: 12 });

describe('WidgetFactory: primitives', () => {
    let surface: HeadlessSurface;
    let factory: WidgetFactory;

    beforeEach(() => {
        surface = new HeadlessSurface();
        factory = new WidgetFactory(surface);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('Given a text widget, Then it lets rays through and uses the default font size', () => {
        const text = factory.text(surface.root, 'Caption', { x: 0, y: 0 }, { x: 100, y: 30 }, { text: 'Hello' });
        expect(text.text).toBe('Hello');
        expect(text.node.graphic?.raycastTarget).toBe(false);
        expect(text.node.fontSize).toBe(24);
    });

    it('Given a button, Then it is a raycast target with a Label child', () => {
        const button = factory.button(surface.root, 'Go', { x: 0, y: 0 }, { x: 100, y: 30 }, { label: 'Go!' });
        expect(button.node.graphic?.raycastTarget).toBe(true);
        expect(button.node.find('Label')?.text).toBe('Go!');
    });

    it('Given a visible button, When clicked, Then onClick fires; When hidden, Then the click is ignored', () => {
        const button = factory.button(surface.root, 'Go', { x: 0, y: 0 }, { x: 100, y: 30 });
        const listener = jest.fn();
        button.onClick.connect(listener);

        expect(button.click()).toBe(true);
        button.node.setVisible(false);
        expect(button.click()).toBe(false);
        expect(listener).toHaveBeenCalledTimes(1);
    });

    it('Given a non-interactable button, When clicked, Then nothing fires', () => {
        const button = factory.button(surface.root, 'Go', { x: 0, y: 0 }, { x: 100, y: 30 });
        const listener = jest.fn();
        button.onClick.connect(listener);
        button.interactable = false;

        expect(button.click()).toBe(false);
        expect(listener).not.toHaveBeenCalled();
    });

    it('Given negative or non-finite sizes, When building, Then sizes are clamped to zero', () => {
        const text = factory.text(surface.root, 'Odd', { x: 0, y: 0 }, { x: -5, y: Number.NaN });
        expect(text.node.size).toEqual({ x: 0, y: 0 });
    });

    it('Given a slider with an empty range, When built, Then warns and widens the range by one', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const slider = factory.slider(surface.root, 'S', { x: 0, y: 0 }, { x: 100, y: 20 }, { min: 2, max: 2 });

        expect(warn).toHaveBeenCalledWith("[WidgetFactory] Slider 'S' has empty range [2, 2]; using [2, 3]");
        expect(slider.min).toBe(2);
        expect(slider.max).toBe(3);
    });

    it('Given a slider, When set out of range, Then the value clamps and notifies once per change', () => {
        const slider = factory.slider(surface.root, 'S', { x: 0, y: 0 }, { x: 100, y: 20 }, { min: 0, max: 1, value: 0.5 });
        const listener = jest.fn();
        slider.onValueChanged.connect(listener);

        slider.setValue(4);
        slider.setValue(1);
        slider.setValue(Number.NaN);

        expect(slider.value).toBe(0);
        expect(listener.mock.calls).toEqual([[1], [0]]);
    });

    it('Given a slider, When dragged halfway, Then the value and fill follow', () => {
        const slider = factory.slider(surface.root, 'S', { x: 0, y: 0 }, { x: 100, y: 20 }, { min: 0.8, max: 3, value: 0.8 });
        expect(slider.dragTo(0.5)).toBe(true);
        expect(slider.value).toBeCloseTo(1.9);
        expect(slider.node.find('Fill')?.size.x).toBeCloseTo(50);
    });

    it('Given a text input, When text is typed and cleared, Then the placeholder hides and returns', () => {
        const input = factory.textInput(surface.root, 'In', { x: 0, y: 0 }, { x: 200, y: 40 }, { placeholder: 'Type...' });
        const placeholder = input.node.find('Placeholder');

        input.type('hello');
        expect(input.text).toBe('hello');
        expect(placeholder?.visible).toBe(false);

        input.setText('');
        expect(placeholder?.visible).toBe(true);
    });

    it('Given a scroll list, When items exceed the viewport, Then it scrolls within bounds', () => {
        const list = factory.scrollList(surface.root, 'List', { x: 0, y: 0 }, { x: 300, y: 100 }, { spacing: 10 });
        expect(list.contentHeight).toBe(100);

        list.addItem('A', 60);
        list.addItem('B', 60);
        expect(list.contentHeight).toBe(130);
        expect(list.maxScroll).toBe(30);

        list.scrollToBottom();
        expect(list.scrollOffset).toBe(30);
        expect(list.content.position.y).toBe(80);

        list.scrollTo(-10);
        expect(list.scrollOffset).toBe(0);

        list.clear();
        expect(list.items).toHaveLength(0);
        expect(list.contentHeight).toBe(100);
    });
});

describe('WidgetFactory: dropdown construction', () => {

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('Given identical parameters on two surfaces, When built, Then the subtrees are identical', () => {
        fc.assert(
            fc.property(arbOptions, fc.integer({ min: 1, max: 80 }), fc.integer({ min: 0, max: 20 }), (options, itemHeight, value) => {
                const a = new HeadlessSurface();
                const b = new HeadlessSurface();
                const first = new WidgetFactory(a).dropdown(a.root, 'D', { x: 10, y: 20 }, { x: 260, y: 40 }, { options, itemHeight, value });
                const second = new WidgetFactory(b).dropdown(b.root, 'D', { x: 10, y: 20 }, { x: 260, y: 40 }, { options, itemHeight, value });
                expect(describeTree(first.node)).toEqual(describeTree(second.node));
            }),
        );
    });

    it('Given n options and an item height, When built, Then the content height is n × item height', () => {
        fc.assert(
            fc.property(arbOptions, fc.integer({ min: 1, max: 80 }), (options, itemHeight) => {
                const surface = new HeadlessSurface();
                const dropdown = new WidgetFactory(surface).dropdown(surface.root, 'D', { x: 0, y: 0 }, { x: 260, y: 40 }, { options, itemHeight });
                const content = dropdown.node.find('Template/Viewport/Content');
                expect(content?.size.y).toBe(options.length * itemHeight);
                expect(dropdown.items).toHaveLength(options.length);
            }),
        );
    });

    it('Given the default layout, When built, Then the option list sits in a clipped viewport below the label', () => {
        const surface = new HeadlessSurface();
        const dropdown = new WidgetFactory(surface, 30).dropdown(surface.root, 'D', { x: 0, y: 0 }, { x: 260, y: 40 }, {
            options: ['a', 'b', 'c'],
        });
        const template = dropdown.node.find('Template');
        const viewport = dropdown.node.find('Template/Viewport');

        expect(template?.visible).toBe(false);
        expect(template?.position).toEqual({ x: 0, y: -65 });
        expect(template?.size).toEqual({ x: 260, y: 90 });
        expect(viewport?.clip).toBe(true);
        expect(dropdown.node.find('Template/Viewport/Content/Item 1: b/Label')?.text).toBe('b');
    });

    it('Given a non-positive item height, When built, Then warns and uses the factory default', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const surface = new HeadlessSurface();
        const dropdown = new WidgetFactory(surface, 25).dropdown(surface.root, 'D', { x: 0, y: 0 }, { x: 260, y: 40 }, {
            options: ['a', 'b'],
            itemHeight: 0,
        });

        expect(warn).toHaveBeenCalledWith("[WidgetFactory] Dropdown 'D' item height 0 is not positive; using 25");
        expect(dropdown.node.find('Template/Viewport/Content')?.size.y).toBe(50);
    });
});
