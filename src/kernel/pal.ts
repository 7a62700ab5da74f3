/** Thrown when a controller requires a host collaborator that was never registered. */
export class MissingCollaboratorError extends Error {
    constructor(key: string) {
        super(
            `[PAL] MISSING COLLABORATOR: "${key}" is not registered.\n` +
            `  Register it before initAll(): pal.register('${key}', implementation).`
        );
        this.name = 'MissingCollaboratorError';
    }
}

/**
 * Path Abstraction Layer: the typed registry of host collaborators.
 * Only the bootstrap knows the host; controllers resolve what they need by key.
 */
export class PathAbstractionLayer<M extends object> {
    private readonly registry: Partial<M> = {};

    public register<K extends keyof M>(key: K, value: M[K]): void {
        if (this.registry[key] !== undefined) {
            console.warn(`[PAL] Overwriting existing key: ${String(key)}`);
        }
        this.registry[key] = value;
    }

    public has<K extends keyof M>(key: K): boolean {
        return this.registry[key] !== undefined;
    }

    public resolve<K extends keyof M>(key: K): M[K] | undefined {
        return this.registry[key];
    }

    public require<K extends keyof M>(key: K): M[K] {
        const value: M[K] | undefined = this.registry[key];
        if (value === undefined) {
            throw new MissingCollaboratorError(String(key));
        }
        return value;
    }

    public clear(): void {
        for (const key of Object.keys(this.registry)) {
            Reflect.deleteProperty(this.registry, key);
        }
    }
}
