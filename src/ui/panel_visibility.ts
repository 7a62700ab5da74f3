import type { UiSurface } from './surface';
import { PRIMARY_PANELS, type PanelRegistry, type PrimaryPanelName } from './panels';

/**
 * Sole owner of panel visibility flags.  Primary panels are mutually
 * exclusive; the TaskOverlay is an independent layer on top.  Each call
 * finishes all of its hide/show commits before presenting a frame, so no
 * frame ever shows two primaries.  Widget values are never touched here.
 */
export class PanelVisibilityController {
    constructor(private readonly panels: PanelRegistry, private readonly surface: UiSurface) {}

    /**
     * Hide every other primary panel, then show `name`.  Returns false (and
     * changes nothing) when that panel was never built.
     */
    public show(name: PrimaryPanelName): boolean {
        const target = this.panels.root(name);
        if (!target) {
            console.error(`[PanelVisibility] Panel '${name}' is not built; keeping current panel`);
            return false;
        }
        for (const other of PRIMARY_PANELS) {
            if (other !== name) this.panels.root(other)?.setVisible(false);
        }
        target.setVisible(true);
        this.surface.present();
        return true;
    }

    /** Hide every primary panel and the overlay. */
    public hideAll(): void {
        for (const name of this.panels.names()) {
            this.panels.root(name)?.setVisible(false);
        }
        this.surface.present();
    }

    /** Set the overlay text and reveal it, whatever primary is showing. */
    public showOverlay(text: string): boolean {
        const overlay = this.panels.get('TaskOverlay');
        if (!overlay) {
            console.error('[PanelVisibility] TaskOverlay is not built; prompt not shown');
            return false;
        }
        overlay.handles.message.setText(text);
        overlay.root.setVisible(true);
        this.surface.present();
        return true;
    }

    public hideOverlay(): void {
        this.panels.root('TaskOverlay')?.setVisible(false);
        this.surface.present();
    }

    public isVisible(name: PrimaryPanelName | 'TaskOverlay'): boolean {
        return this.panels.root(name)?.visible ?? false;
    }

    public get overlayVisible(): boolean {
        return this.isVisible('TaskOverlay');
    }

    /** Currently visible primary panels (at most one outside of a misuse). */
    public visiblePrimaries(): PrimaryPanelName[] {
        return PRIMARY_PANELS.filter(name => this.isVisible(name));
    }
}
