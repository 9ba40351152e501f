import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { demoApplication_create } from '../app/demoApplication.js';
import { CaptureSink } from '../cli/output.js';
import { FlagBinder } from '../cli/FlagBinder.js';
import { param_define, type ParamContext } from '../params/ParamBuilder.js';
import { ParamRegistry } from '../params/ParamRegistry.js';
import {
    ini_parse,
    ini_serialize,
    iniFile_load,
    iniFile_save,
    type IniLoadResult,
    type IniParseReport,
    type IniSaveResult
} from './iniCodec.js';
import { MemoryTextStore, type TextStore } from './TextStore.js';

describe('ini codec', (): void => {
    let context: ParamContext;

    beforeEach((): void => {
        context = { registry: new ParamRegistry(), binder: new FlagBinder() };
    });

    it('serializes the demo program section by section', (): void => {
        const app = demoApplication_create({ sink: new CaptureSink() });
        expect(app.ini_serialize()).toBe(
            '[Basic Types]\n\nBool Param = true\n\n' +
            '[EnumTypes]\n\nDouble Enum = 0.3\n\n' +
            '[Vector Types]\n\nDouble Vec = 1,2,3,4\n\n' +
            '[Special]\n\nFile = \nSlider = 0.333\n\n'
        );
    });

    it('restores serialized values', (): void => {
        param_define(context, 'double', 'Special', 'Slider').value_set(0.333);
        param_define(context, 'string-vector', 'Special', 'Names').value_set(['a', 'b']);
        param_define(context, 'file', 'Special', 'File').value_set('');
        const saved: string = ini_serialize(context.registry);

        param_define(context, 'double', 'Special', 'Slider').value_set(0);
        param_define(context, 'string-vector', 'Special', 'Names').value_set([]);
        param_define(context, 'file', 'Special', 'File').value_set('elsewhere');
        const report: IniParseReport = ini_parse(context.registry, saved);

        expect(report).toEqual({ applied: 3, unknown: [] });
        expect(ini_serialize(context.registry)).toBe(saved);
    });

    it('reads keys before any section header into Global', (): void => {
        const threads = param_define(context, 'integer', 'Global', 'Threads');
        ini_parse(context.registry, 'Threads = 8\n');
        expect(threads.value_get()).toBe(8);
    });

    it('skips comments and short lines', (): void => {
        const threads = param_define(context, 'integer', 'Global', 'Threads');
        const report: IniParseReport = ini_parse(context.registry, '# Threads = 3\n\n;\nThreads=4\n');
        expect(threads.value_get()).toBe(4);
        expect(report.applied).toBe(1);
    });

    it('splits at the first equals sign and trims both sides', (): void => {
        const expr = param_define(context, 'string', 'S', 'Expr');
        ini_parse(context.registry, '[S]\r\n  Expr   =  a=b  \r\n');
        expect(expr.value_get()).toBe('a=b');
    });

    it('treats a line without equals sign as an empty value', (): void => {
        const name = param_define(context, 'string', 'S', 'Name').value_set('before');
        ini_parse(context.registry, '[S]\nName\n');
        expect(name.value_get()).toBe('');
    });

    it('reports undeclared keys without creating them', (): void => {
        param_define(context, 'integer', 'S', 'K');
        const report: IniParseReport = ini_parse(context.registry, '[S]\nK = 1\n[Nope]\nX = 2\n');

        expect(report).toEqual({ applied: 1, unknown: [{ section: 'Nope', key: 'X', line: 4 }] });
        expect(context.registry.record_has('Nope', 'X')).toBe(false);
        expect(context.registry.sections_list()).toEqual(['S']);
    });

    describe('files', (): void => {
        it('round-trips through a store', (): void => {
            const store: MemoryTextStore = new MemoryTextStore();
            const slider = param_define(context, 'double', 'Special', 'Slider').value_set(0.25);

            expect(iniFile_save(context.registry, store, 'a.ini')).toEqual({ ok: true });
            slider.value_set(1);
            const result: IniLoadResult = iniFile_load(context.registry, store, 'a.ini');

            expect(result).toEqual({ ok: true, report: { applied: 1, unknown: [] } });
            expect(slider.value_get()).toBe(0.25);
        });

        it('leaves the registry untouched when the file is missing', (): void => {
            const slider = param_define(context, 'double', 'Special', 'Slider').value_set(0.5);
            const result: IniLoadResult = iniFile_load(context.registry, new MemoryTextStore(), 'missing.ini');

            expect(result).toEqual({ ok: false, error: 'Cannot read ini file: missing.ini' });
            expect(slider.value_get()).toBe(0.5);
        });

        it('reports write failures', (): void => {
            const failing: TextStore = {
                text_read: (): string | null => null,
                text_write: (): void => {
                    throw new Error('disk full');
                }
            };
            const result: IniSaveResult = iniFile_save(context.registry, failing, 'out.ini');
            expect(result).toEqual({ ok: false, error: 'Cannot write ini file out.ini: disk full' });
        });
    });

    it('restores any value without surrounding blanks', (): void => {
        const text = fc.string().filter((s: string): boolean => s === s.trim());
        fc.assert(
            fc.property(fc.double(), fc.integer({ min: -2147483648, max: 2147483647 }), text,
                (d: number, n: number, s: string): boolean => {
                    const registry: ParamRegistry = new ParamRegistry();
                    const local: ParamContext = { registry, binder: new FlagBinder() };
                    const store: MemoryTextStore = new MemoryTextStore();
                    param_define(local, 'double', 'S', 'D').value_set(d);
                    param_define(local, 'integer', 'S', 'N').value_set(n);
                    param_define(local, 'string', 'T', 'Str').value_set(s);

                    iniFile_save(registry, store, 'p.ini');
                    param_define(local, 'double', 'S', 'D').value_set(0);
                    param_define(local, 'integer', 'S', 'N').value_set(0);
                    param_define(local, 'string', 'T', 'Str').value_set('');
                    iniFile_load(registry, store, 'p.ini');

                    return Object.is(param_define(local, 'double', 'S', 'D').value_get(), d) &&
                        param_define(local, 'integer', 'S', 'N').value_get() === n &&
                        param_define(local, 'string', 'T', 'Str').value_get() === s;
                })
        );
    });
});
