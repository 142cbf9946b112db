import { describe, it, expect } from 'vitest';
import { resolveCompilerOptions, DEFAULT_COMPILER_OPTIONS, DEFAULT_SOURCE_KIND } from '../../src/core/config.js';
import { StructuralError } from '../../src/core/errors.js';

function optionsError(run: () => unknown): StructuralError {
    try {
        run();
    } catch (err) {
        if (err instanceof StructuralError) return err;
        throw err;
    }
    throw new Error('expected resolveCompilerOptions to throw');
}

// ============================================================================
// Defaults
// ============================================================================

describe('resolveCompilerOptions — defaults', () => {
    it('fills every omitted option from the defaults', () => {
        const options = resolveCompilerOptions({ bindingNames: ['json'] });
        expect(options.bindingNames).toEqual(['json']);
        expect(options.customModifiers.size).toBe(0);
        expect(options.atomicTypes.size).toBe(0);
        expect(options.maxDepth).toBe(DEFAULT_COMPILER_OPTIONS.maxDepth);
        expect(options.maxDepth).toBe(32);
        expect(options.sourceKind).toBe(DEFAULT_SOURCE_KIND);
    });

    it('keeps provided options and turns lists into sets', () => {
        const options = resolveCompilerOptions({
            bindingNames: ['header', 'query'],
            customModifiers: ['trim'],
            atomicTypes: ['Money'],
            maxDepth: 4,
            sourceKind: 'http',
        });
        expect(options.sourceKind).toBe('http');
        expect(options.customModifiers.has('trim')).toBe(true);
        expect(options.atomicTypes.has('Money')).toBe(true);
        expect(options.maxDepth).toBe(4);
    });

    it('freezes the resolved options', () => {
        const options = resolveCompilerOptions({ bindingNames: ['json'] });
        expect(Object.isFrozen(options)).toBe(true);
        expect(Object.isFrozen(options.bindingNames)).toBe(true);
    });
});

// ============================================================================
// Validation
// ============================================================================

describe('resolveCompilerOptions — validation', () => {
    it('requires at least one binding name', () => {
        const err = optionsError(() => resolveCompilerOptions({ bindingNames: [] }));
        expect(err.code).toBe('INVALID_OPTIONS');
        expect(err.message).toBe('invalid compiler options: bindingNames: at least one binding name is required');
    });

    it('rejects reserved tag keys as binding names', () => {
        const err = optionsError(() => resolveCompilerOptions({ bindingNames: ['json', 'default'] }));
        expect(err.message).toBe('invalid compiler options: bindingNames.1: is a reserved tag key');
    });

    it('rejects binding names that are not identifiers', () => {
        const err = optionsError(() => resolveCompilerOptions({ bindingNames: ['has space'] }));
        expect(err.message).toBe('invalid compiler options: bindingNames.0: must be a non-empty identifier');
    });

    it('rejects duplicate binding names', () => {
        const err = optionsError(() => resolveCompilerOptions({ bindingNames: ['json', 'json'] }));
        expect(err.message).toBe('invalid compiler options: bindingNames: binding names must be unique');
    });

    it('rejects custom modifiers that shadow standard ones', () => {
        const err = optionsError(() => resolveCompilerOptions({
            bindingNames: ['json'],
            customModifiers: ['omitempty'],
        }));
        expect(err.message).toBe('invalid compiler options: customModifiers.0: is a standard modifier');
    });

    it('rejects a non-positive depth', () => {
        const err = optionsError(() => resolveCompilerOptions({ bindingNames: ['json'], maxDepth: 0 }));
        expect(err.code).toBe('INVALID_OPTIONS');
        expect(err.message.startsWith('invalid compiler options: maxDepth: ')).toBe(true);
    });

    it('rejects an empty source kind', () => {
        const err = optionsError(() => resolveCompilerOptions({ bindingNames: ['json'], sourceKind: '' }));
        expect(err.message).toBe('invalid compiler options: sourceKind: must be a non-empty name');
    });

    it('keeps the zod error as cause', () => {
        const err = optionsError(() => resolveCompilerOptions({ bindingNames: [] }));
        expect(err.cause).toBeInstanceOf(Error);
    });
});
