import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { MissingCollaboratorError, PathAbstractionLayer } from '../../src/kernel/pal';

interface Collaborators {
    clock: () => Date;
    label: string;
}

describe('PathAbstractionLayer', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('Given a registered key, When resolved, Then returns the value', () => {
        const pal = new PathAbstractionLayer<Collaborators>();
        pal.register('label', 'test');

        expect(pal.has('label')).toBe(true);
        expect(pal.resolve('label')).toBe('test');
        expect(pal.require('label')).toBe('test');
    });

    it('Given a missing key, When resolved, Then returns undefined', () => {
        const pal = new PathAbstractionLayer<Collaborators>();
        expect(pal.has('clock')).toBe(false);
        expect(pal.resolve('clock')).toBeUndefined();
    });

    it('Given a missing key, When required, Then throws MissingCollaboratorError naming the key', () => {
        const pal = new PathAbstractionLayer<Collaborators>();
        expect(() => pal.require('clock')).toThrow(MissingCollaboratorError);
        expect(() => pal.require('clock')).toThrow(/MISSING COLLABORATOR: "clock"/);
    });

    it('Given a registered key, When registered again, Then warns and overwrites', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const pal = new PathAbstractionLayer<Collaborators>();
        pal.register('label', 'first');
        pal.register('label', 'second');

        expect(warn).toHaveBeenCalledWith('[PAL] Overwriting existing key: label');
        expect(pal.require('label')).toBe('second');
    });

    it('Given registered keys, When cleared, Then nothing resolves', () => {
        const pal = new PathAbstractionLayer<Collaborators>();
        pal.register('label', 'test');
        pal.register('clock', () => new Date(0));
        pal.clear();

        expect(pal.has('label')).toBe(false);
        expect(pal.has('clock')).toBe(false);
    });
});
