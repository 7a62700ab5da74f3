/**
 * surface.ts: retained UI node tree and the host-facing surface contract.
 *
 * Layout logic builds against `UiSurface`, never against a host scene graph.
 * A host (world-space canvas, DOM, test harness) implements `commit()` to mirror
 * node changes and `present()` to mark a frame boundary.
 *
 * Coordinates: a node's `position` is the offset of its centre from its
 * parent's centre, in canvas units (+y up).  `size` is width/height.
 */

export interface Vec2 {
    x: number;
    y: number;
}

export interface Rgba {
    r: number;
    g: number;
    b: number;
    a: number;
}

/** Visible target graphic; `raycastTarget` makes pointer/ray hits land on the node. */
export interface Graphic {
    color: Rgba;
    raycastTarget: boolean;
}

/** Automatic top-down stacking for list content (dropdown options, transcript, cards). */
export interface StackLayout {
    spacing: number;
    /** Floor for the stacked height (a scroll list never shrinks below its viewport). */
    minHeight?: number;
}

export type NodeChange =
    | { kind: 'mount'; node: UiNode }
    | { kind: 'visibility'; node: UiNode; visible: boolean }
    | { kind: 'content'; node: UiNode; text: string }
    | { kind: 'layout'; node: UiNode }
    | { kind: 'unmount'; node: UiNode };

export interface UiSurface {
    readonly root: UiNode;
    commit(change: NodeChange): void;
    /** Frame boundary: everything committed since the last call is shown together. */
    present(): void;
}

export class UiNode {
    public readonly name: string;
    public readonly parent: UiNode | null;
    public readonly children: UiNode[] = [];
    public readonly position: Vec2;
    public readonly size: Vec2;

    public graphic: Graphic | null = null;
    public clip = false;
    public layout: StackLayout | null = null;
    public fontSize: number | null = null;

    private readonly surface: UiSurface | null;
    private visibleSelf = true;
    private textContent: string | null = null;

    /** Root nodes are created by the surface itself and are never mounted. */
    public static createRoot(name: string, size: Vec2): UiNode {
        return new UiNode(null, name, null, { x: 0, y: 0 }, size);
    }

    public static mount(surface: UiSurface, parent: UiNode, name: string, position: Vec2, size: Vec2): UiNode {
        const node = new UiNode(surface, name, parent, position, size);
        parent.children.push(node);
        surface.commit({ kind: 'mount', node });
        return node;
    }

    private constructor(surface: UiSurface | null, name: string, parent: UiNode | null, position: Vec2, size: Vec2) {
        this.surface = surface;
        this.name = name;
        this.parent = parent;
        this.position = { ...position };
        this.size = { ...size };
    }

    public get visible(): boolean {
        return this.visibleSelf;
    }

    /** Visible and every ancestor visible. */
    public get visibleInHierarchy(): boolean {
        let node: UiNode | null = this;
        while (node) {
            if (!node.visibleSelf) return false;
            node = node.parent;
        }
        return true;
    }

    public setVisible(visible: boolean): void {
        if (this.visibleSelf === visible) return;
        this.visibleSelf = visible;
        this.surface?.commit({ kind: 'visibility', node: this, visible });
    }

    public get text(): string | null {
        return this.textContent;
    }

    public setText(text: string): void {
        if (this.textContent === text) return;
        this.textContent = text;
        this.surface?.commit({ kind: 'content', node: this, text });
    }

    public path(): string {
        return this.parent ? `${this.parent.path()}/${this.name}` : this.name;
    }

    /** Resolve a slash-separated path of child names relative to this node. */
    public find(path: string): UiNode | undefined {
        let node: UiNode | undefined = this;
        for (const segment of path.split('/')) {
            if (!node) return undefined;
            node = node.children.find(child => child.name === segment);
        }
        return node;
    }

    public remove(): void {
        if (!this.parent) return;
        const siblings = this.parent.children;
        const index = siblings.indexOf(this);
        if (index !== -1) siblings.splice(index, 1);
        this.surface?.commit({ kind: 'unmount', node: this });
    }

    /**
     * Re-stack children top-down when this node carries a StackLayout.
     * Children keep their own height; the node's height becomes the stacked
     * total.  Stacked containers are pivoted at their top edge, so child i sits at
     * y = -(sum of previous heights and spacings) - height / 2.
     */
    public applyLayout(): void {
        if (!this.layout) return;
        let offset = 0;
        this.children.forEach((child, index) => {
            if (index > 0) offset += this.layout?.spacing ?? 0;
            child.position.x = 0;
            child.position.y = -(offset + child.size.y / 2);
            offset += child.size.y;
        });
        this.size.y = Math.max(offset, this.layout.minHeight ?? 0);
        this.surface?.commit({ kind: 'layout', node: this });
    }
}

/** Structural fingerprint of a subtree; identical parameters give identical lines. */
export function describeTree(node: UiNode, depth = 0): string[] {
    const flags = [
        node.visible ? 'visible' : 'hidden',
        node.clip ? 'clip' : null,
        node.layout ? `stack(${node.layout.spacing})` : null,
        node.graphic?.raycastTarget ? 'raycast' : null,
    ].filter((flag): flag is string => flag !== null);

    const line =
        `${'  '.repeat(depth)}${node.name} ` +
        `@(${node.position.x},${node.position.y}) ` +
        `[${node.size.x}x${node.size.y}] ` +
        flags.join(' ') +
        (node.text !== null ? ` "${node.text}"` : '');

    return [line, ...node.children.flatMap(child => describeTree(child, depth + 1))];
}

export interface FrameSnapshot {
    index: number;
    /** Names of root-level nodes that were visible at the frame boundary. */
    visibleRoots: string[];
}

/**
 * In-process surface: records commits and, at each `present()`, which
 * root-level panels were visible.  Used headless and by the tests.
 */
export class HeadlessSurface implements UiSurface {
    public readonly root: UiNode;
    public readonly frames: FrameSnapshot[] = [];
    private commitCount = 0;

    constructor(name = 'Canvas', size: Vec2 = { x: 1600, y: 1000 }) {
        this.root = UiNode.createRoot(name, size);
    }

    public commit(_change: NodeChange): void {
        this.commitCount++;
    }

    public present(): void {
        this.frames.push({
            index: this.frames.length,
            visibleRoots: this.root.children.filter(child => child.visible).map(child => child.name),
        });
    }

    public get commits(): number {
        return this.commitCount;
    }
}
