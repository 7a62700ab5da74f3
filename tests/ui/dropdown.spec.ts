import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fc from 'fast-check';
import { HeadlessSurface } from '../../src/ui/surface';
import { WidgetFactory } from '../../src/ui/widget_factory';
import type { DropdownWidget } from '../../src/ui/dropdown';
import { SEASONS } from '../../src/ui/panel_builder';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function buildSeasons(value?: number): DropdownWidget {
    const surface = new HeadlessSurface();
    return new WidgetFactory(surface).dropdown(surface.root, 'SeasonDropdown', { x: 0, y: 0 }, { x: 260, y: 40 }, {
        options: SEASONS,
        value,
    });
}

function checkedItems(dropdown: DropdownWidget): number[] {
    return dropdown.items.flatMap((item, i) => (item.isOn ? [i] : []));
}

afterEach(() => {
    jest.restoreAllMocks();
});

describe('DropdownWidget: selection', () => {
    let dropdown: DropdownWidget;

    beforeEach(() => {
        dropdown = buildSeasons();
    });

    it('Given five seasons, When built, Then the first option is selected and the list is closed', () => {
        expect(dropdown.value).toBe(0);
        expect(dropdown.label.text).toBe('Default');
        expect(dropdown.options).toHaveLength(5);
        expect(dropdown.isOpen).toBe(false);
        expect(checkedItems(dropdown)).toEqual([0]);
    });

    it('Given the list is open, When option 2 is pressed, Then Summer is shown, the list closes and listeners hear 2 once', () => {
        const listener = jest.fn();
        dropdown.onValueChanged.connect(listener);

        expect(dropdown.toggle()).toBe(true);
        expect(dropdown.isOpen).toBe(true);
        expect(dropdown.items[2]?.press()).toBe(true);

        expect(dropdown.value).toBe(2);
        expect(dropdown.label.text).toBe('Summer');
        expect(dropdown.isOpen).toBe(false);
        expect(checkedItems(dropdown)).toEqual([2]);
        expect(listener.mock.calls).toEqual([[2]]);
    });

    it('Given the list is closed, When an option is pressed, Then the press is ignored', () => {
        expect(dropdown.items[3]?.press()).toBe(false);
        expect(dropdown.value).toBe(0);
    });

    it('Given the dropdown is hidden, When toggled, Then nothing opens', () => {
        dropdown.node.setVisible(false);
        expect(dropdown.toggle()).toBe(false);
        expect(dropdown.isOpen).toBe(false);
    });

    it('Given the current option, When selected again, Then no notification is sent', () => {
        const listener = jest.fn();
        dropdown.onValueChanged.connect(listener);
        expect(dropdown.select(0)).toBe(false);
        expect(listener).not.toHaveBeenCalled();
    });

    it('Given an index out of range, When selected, Then warns and keeps the selection', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        expect(dropdown.select(7)).toBe(false);
        expect(warn).toHaveBeenCalledWith("[Dropdown] 'SeasonDropdown' has no option 7");
        expect(dropdown.value).toBe(0);
    });

    it('Given setValueWithoutNotify, When applied, Then label updates silently', () => {
        const listener = jest.fn();
        dropdown.onValueChanged.connect(listener);
        dropdown.setValueWithoutNotify(4);
        expect(dropdown.label.text).toBe('Winter');
        expect(listener).not.toHaveBeenCalled();
    });

    it('Given an out-of-range initial value, When built, Then selection falls back to 0', () => {
        expect(buildSeasons(9).value).toBe(0);
        expect(buildSeasons(3).selectedText).toBe('Autumn');
    });

    it('Given any sequence of selections, Then exactly one option is on and notifications equal the changes', () => {
        fc.assert(
            fc.property(fc.array(fc.integer({ min: 0, max: 4 }), { maxLength: 30 }), sequence => {
                const subject = buildSeasons();
                const heard: number[] = [];
                subject.onValueChanged.connect(value => heard.push(value));

                let expected = 0;
                const changes: number[] = [];
                for (const index of sequence) {
                    subject.select(index);
                    if (index !== expected) changes.push(index);
                    expected = index;
                }

                expect(subject.value).toBe(expected);
                expect(checkedItems(subject)).toEqual([expected]);
                expect(heard).toEqual(changes);
            }),
        );
    });
});

describe('DropdownWidget: inert', () => {

    it('Given no options, When built, Then warns, shows an empty label and ignores toggle and select', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const surface = new HeadlessSurface();
        const dropdown = new WidgetFactory(surface).dropdown(surface.root, 'Empty', { x: 0, y: 0 }, { x: 200, y: 40 }, { options: [] });

        expect(warn).toHaveBeenCalledWith("[WidgetFactory] Dropdown 'Empty' built with no options; left inert");
        expect(dropdown.inert).toBe(true);
        expect(dropdown.label.text).toBe('');
        expect(dropdown.toggle()).toBe(false);
        expect(dropdown.select(0)).toBe(false);
        expect(dropdown.node.find('Template/Viewport')).toBeUndefined();
    });
});
