import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { DEFAULT_CONFIG } from '../../src/kernel/config';
import { HeadlessSurface, type NodeChange } from '../../src/ui/surface';
import { PanelBuilder, OVERLAY_TITLE, SEASONS } from '../../src/ui/panel_builder';
import { PRIMARY_PANELS } from '../../src/ui/panels';

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Surface whose host refuses to mount one named node. */
class RejectingSurface extends HeadlessSurface {
    constructor(private readonly rejected: string) {
        super();
    }

    public commit(change: NodeChange): void {
        if (change.kind === 'mount' && change.node.name === this.rejected) {
            throw new Error(`host refused ${this.rejected}`);
        }
        super.commit(change);
    }
}

afterEach(() => {
    jest.restoreAllMocks();
});

describe('PanelBuilder: buildAll', () => {

    it('Given a surface, When built, Then every panel exists and is hidden in the first frame', () => {
        const surface = new HeadlessSurface();
        const registry = new PanelBuilder(surface, DEFAULT_CONFIG).buildAll();

        expect(registry.names()).toEqual([...PRIMARY_PANELS, 'TaskOverlay']);
        for (const name of registry.names()) {
            expect(registry.root(name)?.visible).toBe(false);
        }
        expect(surface.frames).toEqual([{ index: 0, visibleRoots: [] }]);
    });

    it('Given buildAll() already ran, When called again, Then returns the same registry and commits nothing', () => {
        const surface = new HeadlessSurface();
        const builder = new PanelBuilder(surface, DEFAULT_CONFIG);
        const first = builder.buildAll();
        const commits = surface.commits;

        expect(builder.buildAll()).toBe(first);
        expect(surface.commits).toBe(commits);
        expect(surface.root.children).toHaveLength(9);
    });

    it('Given the host rejects the tree panel, When built, Then it is logged and absent while the others build', () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const surface = new RejectingSurface('TreeControlPanel');
        const registry = new PanelBuilder(surface, DEFAULT_CONFIG).buildAll();

        expect(registry.has('TreeControl')).toBe(false);
        expect(surface.root.find('TreeControlPanel')).toBeUndefined();
        expect(registry.names()).toHaveLength(8);
        expect(registry.has('History')).toBe(true);
        expect(error.mock.calls[0]?.[0]).toBe("[PanelBuilder] Failed to build panel 'TreeControl'; transitions to it will be refused");
    });

    it('Given a host failure midway through a panel, When built, Then the partial panel is unmounted', () => {
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const surface = new RejectingSurface('SeasonDropdown');
        const registry = new PanelBuilder(surface, DEFAULT_CONFIG).buildAll();

        expect(registry.has('TreeControl')).toBe(false);
        expect(surface.root.find('TreeControlPanel')).toBeUndefined();
    });
});

describe('PanelBuilder: panel content', () => {
    const surface = new HeadlessSurface();
    const registry = new PanelBuilder(surface, DEFAULT_CONFIG).buildAll();

    it('Given the tree panel, Then the season dropdown lists the five seasons starting at Default', () => {
        const season = registry.get('TreeControl')?.handles.season;
        expect(season?.options).toEqual([...SEASONS]);
        expect(season?.selectedText).toBe('Default');
        expect(season?.node.path()).toBe('Canvas/TreeControlPanel/SeasonDropdown');
    });

    it('Given the altruistic panel, Then the counter starts at zero of the required touches', () => {
        expect(registry.get('Altruistic')?.handles.touches.text).toBe('Touches: 0/3');
        expect(registry.get('Altruistic')?.handles.cameraPreview.visible).toBe(false);
    });

    it('Given the overlay, Then it covers the canvas and carries its title', () => {
        const overlay = registry.get('TaskOverlay');
        expect(overlay?.root.size).toEqual({ x: 1600, y: 1000 });
        expect(overlay?.handles.title.text).toBe(OVERLAY_TITLE);
        expect(overlay?.handles.dismiss.label.text).toBe('Got it!');
    });

    it('Given the hub, Then the sidebar holds the five activity buttons', () => {
        const sidebar = registry.get('MainMenu')?.handles.sidebar;
        expect(sidebar?.children.map(child => child.name)).toEqual([
            'BreathingButton', 'AltruisticButton', 'TreeButton', 'HistoryButton', 'ChatButton',
        ]);
    });

    it('Given the history panel, Then its entry list floors at the viewport height', () => {
        const list = registry.get('History')?.handles.list;
        expect(list?.viewportHeight).toBe(400);
        expect(list?.contentHeight).toBe(400);
    });
});
