/**
 * @file Output Sinks
 *
 * Where the framework writes human-facing text: the manifest and synopsis
 * go to stdout, command-line diagnostics to stderr. The application takes
 * a sink at construction so tests can capture both streams.
 *
 * @module cli
 */

import { Chalk, chalkStderr, type ChalkInstance } from 'chalk';
import { colorMode_resolve, type ColorMode, type ResolvedColorMode } from '../config/settings.js';

export interface OutputSink {
    stdout_write(text: string): void;
    stderr_write(text: string): void;
}

/**
 * Resolve the chalk instance used for stderr under a colour mode.
 */
function stderrChalk_resolve(mode: ColorMode): ChalkInstance {
    switch (mode) {
        case 'always':
            return new Chalk({ level: chalkStderr.level > 0 ? chalkStderr.level : 1 });
        case 'never':
            return new Chalk({ level: 0 });
        default:
            return chalkStderr;
    }
}

/**
 * Sink backed by the process streams. Diagnostics are coloured yellow
 * when the terminal (or the colour setting) allows it.
 */
export function consoleSink_create(color?: ColorMode): OutputSink {
    const resolved: ResolvedColorMode = colorMode_resolve(color);
    const paint: ChalkInstance = stderrChalk_resolve(resolved.mode);
    return {
        stdout_write: (text: string): void => {
            process.stdout.write(text);
        },
        stderr_write: (text: string): void => {
            process.stderr.write(paint.yellow(text));
        }
    };
}

/**
 * In-memory sink; keeps every write in order.
 */
export class CaptureSink implements OutputSink {
    public readonly stdout: string[] = [];
    public readonly stderr: string[] = [];

    public stdout_write(text: string): void {
        this.stdout.push(text);
    }

    public stderr_write(text: string): void {
        this.stderr.push(text);
    }

    public stdout_text(): string {
        return this.stdout.join('');
    }

    public stderr_text(): string {
        return this.stderr.join('');
    }
}
