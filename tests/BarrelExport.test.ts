import { describe, it, expect } from 'vitest';

// ============================================================================
// Barrel Export Verification
// Ensures all public API exports are accessible from the package entry point
// ============================================================================

describe('Barrel Export (src/index.ts)', () => {
    it('should export the result helpers and error classes', async () => {
        const mod = await import('../src/index.js');

        expect(mod.succeed).toBeTypeOf('function');
        expect(mod.fail).toBeTypeOf('function');
        expect(mod.OK).toEqual({ ok: true, value: undefined });

        expect(mod.BindError).toBeDefined();
        expect(mod.GrammarError).toBeDefined();
        expect(mod.ExtractionError).toBeDefined();
        expect(mod.BindingUnsatisfiedError).toBeDefined();
        expect(mod.CoercionError).toBeDefined();
        expect(mod.StructuralError).toBeDefined();
        expect(mod.FieldError).toBeDefined();
        expect(mod.isBindError).toBeTypeOf('function');
        expect(mod.resolveCompilerOptions).toBeTypeOf('function');
        expect(mod.DEFAULT_SOURCE_KIND).toBe('default');
    });

    it('should export schema builders and zero values', async () => {
        const mod = await import('../src/index.js');

        expect(mod.field.string).toBeTypeOf('function');
        expect(mod.field.record).toBeTypeOf('function');
        expect(mod.defineRecord).toBeTypeOf('function');
        expect(mod.defineCustomType).toBeTypeOf('function');
        expect(mod.createRecord).toBeTypeOf('function');
        expect(mod.resetRecord).toBeTypeOf('function');
        expect(mod.NIL_UUID).toBe('00000000-0000-0000-0000-000000000000');
    });

    it('should export the grammar, compiler and executor', async () => {
        const mod = await import('../src/index.js');

        expect(mod.subValue).toBeTypeOf('function');
        expect(mod.allSubValues).toBeTypeOf('function');
        expect(mod.decodeFieldTag).toBeTypeOf('function');
        expect(mod.SCOPE_DELIMITER).toBe("'");
        expect(mod.BindingCompiler).toBeDefined();
        expect(mod.ChainExecutor).toBeDefined();
        expect(mod.coerce).toBeTypeOf('function');
        expect(mod.found).toBeTypeOf('function');
    });

    it('should export the parser, cache, adapters and observability', async () => {
        const mod = await import('../src/index.js');

        expect(mod.BindingParser).toBeDefined();
        expect(mod.SourceValueCache).toBeDefined();
        expect(mod.Lazy).toBeDefined();
        expect(mod.recordSource.name).toBe('record');
        expect(mod.httpRequestSource.name).toBe('http');
        expect(mod.createDebugObserver).toBeTypeOf('function');
        expect(mod.SpanStatusCode).toEqual({ UNSET: 0, OK: 1, ERROR: 2 });
    });
});
