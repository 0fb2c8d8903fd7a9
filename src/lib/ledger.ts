import { IFileSystem } from './fileSystem';
import { PatchOperation, PatchTarget } from './models';
import { computeHash, isRecord } from './utils';

export interface LedgerEntry {
    key: string;
    targetFile: string;
    tag: string;
    replacementHash: string;
    /** Hash of the whole file right after the edit */
    resultHash: string;
    backupPath?: string;
    appliedAt: string;
}

interface LedgerFile {
    version: 1;
    entries: LedgerEntry[];
}

export function ledgerPathFor(targetFile: string): string {
    return `${targetFile}.patch-ledger.json`;
}

function targetKey(target: PatchTarget): string {
    switch (target.type) {
        case 'range':
            return `range:${target.range.start}-${target.range.end}`;
        case 'anchor':
            return [
                'anchor',
                JSON.stringify(target.marker),
                `#${target.occurrence ?? 1}`,
                target.openDelimiter ?? '{',
                target.span ?? 'body',
                target.edit,
            ].join(':');
        case 'ensure-line':
            return `ensure-line:${JSON.stringify(target.afterPrefix ?? '')}`;
    }
}

/** Identifies an edit by where it goes and what kind of edit it is. */
export function ledgerKey(op: PatchOperation): string {
    return `${targetKey(op.target)}@${op.tag}`;
}

function isLedgerEntry(value: unknown): value is LedgerEntry {
    return isRecord(value)
        && typeof value.key === 'string'
        && typeof value.targetFile === 'string'
        && typeof value.tag === 'string'
        && typeof value.replacementHash === 'string'
        && typeof value.resultHash === 'string'
        && typeof value.appliedAt === 'string'
        && (value.backupPath === undefined || typeof value.backupPath === 'string');
}

/**
 * Record of the operations applied to one target file, persisted beside it.
 * An operation counts as applied when the ledger holds the same edit with the same
 * replacement and the file still hashes to what that edit produced.
 */
export class PatchLedger {
    private readonly entries = new Map<string, LedgerEntry>();
    private loading: Promise<void> | undefined;

    constructor(private readonly fs: IFileSystem, public readonly filePath: string) {}

    /** Safe to call any number of times; the file is read once. */
    load(): Promise<void> {
        if (!this.loading) {
            this.loading = this.read();
        }
        return this.loading;
    }

    private async read(): Promise<void> {
        if (!await this.fs.exists(this.filePath)) {
            return;
        }
        const data: unknown = JSON.parse(await this.fs.readFile(this.filePath));
        if (!isRecord(data) || data.version !== 1 || !Array.isArray(data.entries)) {
            throw new Error(`Unrecognized patch ledger: ${this.filePath}`);
        }
        for (const entry of data.entries) {
            if (isLedgerEntry(entry)) {
                this.entries.set(entry.key, entry);
            }
        }
    }

    get size(): number {
        return this.entries.size;
    }

    get(op: PatchOperation): LedgerEntry | undefined {
        return this.entries.get(ledgerKey(op));
    }

    isApplied(op: PatchOperation, currentContent: string): boolean {
        const entry = this.get(op);
        return entry !== undefined
            && entry.replacementHash === computeHash(op.replacementText)
            && entry.resultHash === computeHash(currentContent);
    }

    /** Records every operation of one transaction and rewrites the ledger file once. */
    async record(ops: PatchOperation[], resultContent: string, backupPath: string | undefined, now: Date = new Date()): Promise<LedgerEntry[]> {
        await this.load();
        const resultHash = computeHash(resultContent);
        const recorded = ops.map(op => {
            const entry: LedgerEntry = {
                key: ledgerKey(op),
                targetFile: op.targetFile,
                tag: op.tag,
                replacementHash: computeHash(op.replacementText),
                resultHash,
                backupPath,
                appliedAt: now.toISOString(),
            };
            this.entries.set(entry.key, entry);
            return entry;
        });

        const file: LedgerFile = { version: 1, entries: [...this.entries.values()] };
        await this.fs.writeFile(this.filePath, JSON.stringify(file, null, 2));
        return recorded;
    }
}
