import { IFileSystem } from './fileSystem';
import * as path from 'path';

export class MemoryFileSystem implements IFileSystem {
    readonly path = path.posix;

    // Map of path -> content
    private files = new Map<string, string>();

    private normalize(filePath: string): string {
        return filePath.replace(/\\/g, '/').replace(/^[a-zA-Z]:/, '');
    }

    constructor(initialFiles: Record<string, string> = {}) {
        for (const [p, content] of Object.entries(initialFiles)) {
            this.files.set(this.normalize(p), content);
        }
    }

    async readFile(filePath: string): Promise<string> {
        const content = this.files.get(this.normalize(filePath));
        if (content === undefined) {
            throw new Error(`File not found: ${filePath}`);
        }
        return content;
    }

    async writeFile(filePath: string, content: string): Promise<void> {
        this.files.set(this.normalize(filePath), content);
    }

    async exists(filePath: string): Promise<boolean> {
        return this.files.has(this.normalize(filePath));
    }

    // Helper for tests
    toJson(): Record<string, string> {
        const result: Record<string, string> = {};
        const sorted = Array.from(this.files.entries()).sort(([a], [b]) => a.localeCompare(b));
        for (const [p, content] of sorted) {
            result[p] = content;
        }
        return result;
    }
}
