/**
 * @file Text Store
 *
 * Whole-file text I/O used by ini load/save. The ini codec never touches
 * the filesystem directly; it goes through this interface so tests can run
 * against memory.
 *
 * Methods follow the project's subject_verb naming.
 *
 * @module ini
 */

import fs from 'fs';

export interface TextStore {
    /** Read a whole file. Returns null if it cannot be read. */
    text_read(path: string): string | null;

    /**
     * Replace a file's contents.
     *
     * @throws On I/O failure.
     */
    text_write(path: string, text: string): void;
}

/**
 * Store backed by the local filesystem (UTF-8).
 */
export class FileTextStore implements TextStore {
    public text_read(path: string): string | null {
        try {
            return fs.readFileSync(path, 'utf-8');
        } catch {
            return null;
        }
    }

    public text_write(path: string, text: string): void {
        fs.writeFileSync(path, text, 'utf-8');
    }
}

/**
 * Store backed by a map of path → contents.
 */
export class MemoryTextStore implements TextStore {
    private readonly files: Map<string, string> = new Map();

    constructor(initial: Record<string, string> = {}) {
        for (const [path, text] of Object.entries(initial)) {
            this.files.set(path, text);
        }
    }

    public text_read(path: string): string | null {
        return this.files.get(path) ?? null;
    }

    public text_write(path: string, text: string): void {
        this.files.set(path, text);
    }

    public paths_list(): string[] {
        return Array.from(this.files.keys());
    }
}
