/**
 * @file Command-Line Application
 *
 * Bundles what a self-describing program needs: the parameter registry,
 * the flag binder, application metadata, an output sink and a text store
 * for ini files. Construct one per program (or per test) and pass it to
 * declarations; nothing is global.
 *
 * @example
 * ```typescript
 * const app = new Application({ title: 'resample', description: 'Resample a volume.' });
 * app.param_define('double', 'Output', 'Spacing').declare('Voxel spacing in mm', 's').value_set(1);
 * app.commandLine_parse(argv);
 * const spacing: number = app.param_access('double', 'Output', 'Spacing').value_get();
 * ```
 *
 * @module app
 */

import { FlagBinder } from '../cli/FlagBinder.js';
import { commandLine_parse, type CommandLineHost, type CommandLineResult } from '../cli/commandLine.js';
import { consoleSink_create, type OutputSink } from '../cli/output.js';
import { synopsis_render } from '../cli/synopsis.js';
import type { ColorMode } from '../config/settings.js';
import {
    ini_parse,
    ini_serialize,
    iniFile_load,
    iniFile_save,
    type IniLoadResult,
    type IniParseReport,
    type IniSaveResult,
    type IniUnknownKey
} from '../ini/iniCodec.js';
import { FileTextStore, type TextStore } from '../ini/TextStore.js';
import { manifest_render } from '../manifest/xmlManifest.js';
import type { ParamKind } from '../params/kinds.js';
import { param_access, param_define, type ParamBuilder } from '../params/ParamBuilder.js';
import { ParamRegistry } from '../params/ParamRegistry.js';
import { AppMetadata, type MetadataInit } from './metadata.js';

/**
 * @property title - Program name, used in the usage line and manifest
 * @property description - One-paragraph summary
 * @property metadata - Further manifest fields (version, license, ...)
 * @property sink - Output destination (default: process streams)
 * @property store - Ini file I/O (default: local filesystem)
 * @property color - Diagnostic colouring for the default sink
 */
export interface ApplicationOptions {
    title: string;
    description?: string;
    metadata?: MetadataInit;
    sink?: OutputSink;
    store?: TextStore;
    color?: ColorMode;
}

export class Application implements CommandLineHost {
    public readonly registry: ParamRegistry = new ParamRegistry();
    public readonly binder: FlagBinder = new FlagBinder();
    public readonly metadata: AppMetadata;
    public readonly sink: OutputSink;
    private readonly store: TextStore;

    constructor(options: ApplicationOptions) {
        this.metadata = new AppMetadata({
            ...options.metadata,
            title: options.title,
            description: options.description ?? options.metadata?.description ?? ''
        });
        this.sink = options.sink ?? consoleSink_create(options.color);
        this.store = options.store ?? new FileTextStore();
    }

    // ─── Declarations ───────────────────────────────────────────

    /**
     * Declare a parameter; see `param_define` for replace semantics.
     */
    public param_define<K extends ParamKind>(kind: K, section: string, key: string): ParamBuilder<K> {
        return param_define(this, kind, section, key);
    }

    /**
     * Access a parameter through a kind without replacing its record.
     */
    public param_access<K extends ParamKind>(kind: K, section: string, key: string): ParamBuilder<K> {
        return param_access(this, kind, section, key);
    }

    // ─── Command Line ───────────────────────────────────────────

    /**
     * Apply command-line arguments; handled tokens are removed from `argv`.
     */
    public commandLine_parse(argv: string[]): CommandLineResult {
        return commandLine_parse(this, argv);
    }

    // ─── Ini Persistence ────────────────────────────────────────

    public ini_serialize(): string {
        return ini_serialize(this.registry);
    }

    public ini_parse(text: string): IniParseReport {
        const report: IniParseReport = ini_parse(this.registry, text);
        this.unknownKeys_report(report.unknown);
        return report;
    }

    /**
     * Load an ini file, reporting undeclared keys on stderr.
     *
     * @returns false if the file cannot be read; the registry is unchanged.
     */
    public ini_load(path: string): boolean {
        return this.iniFile_load(path).ok;
    }

    /**
     * Load an ini file and return the detailed outcome.
     */
    public iniFile_load(path: string): IniLoadResult {
        const result: IniLoadResult = iniFile_load(this.registry, this.store, path);
        if (result.ok) {
            this.unknownKeys_report(result.report.unknown);
        }
        return result;
    }

    /**
     * Save every parameter to an ini file.
     *
     * @returns false if the file cannot be written.
     */
    public ini_save(path: string): boolean {
        return this.iniFile_save(path).ok;
    }

    public iniFile_save(path: string): IniSaveResult {
        return iniFile_save(this.registry, this.store, path);
    }

    private unknownKeys_report(unknown: IniUnknownKey[]): void {
        for (const entry of unknown) {
            this.sink.stderr_write(`Ignored unknown ini parameter [${entry.section}] ${entry.key} (line ${entry.line})\n`);
        }
    }

    // ─── Rendering ──────────────────────────────────────────────

    public manifest_render(): string {
        return manifest_render(this.registry, this.metadata);
    }

    public synopsis_render(): string {
        return synopsis_render(this.registry, this.binder, this.metadata);
    }
}
