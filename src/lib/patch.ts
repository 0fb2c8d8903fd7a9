import { UnbalancedAnchorError, declarationStart, locateAnchor } from './anchor';
import { IFileSystem } from './fileSystem';
import { PatchLedger, ledgerPathFor } from './ledger';
import { LineRange, Logger, PatchOperation, PatchResult, PatchTarget, describePatch, describeTarget } from './models';
import {
    detectLineEnding,
    formatCompactTimestamp,
    getLineStarts,
    lineOfOffset,
    normalizeLineEndings,
    splitLines,
} from './utils';

export class RangeOutOfBoundsError extends Error {
    constructor(public readonly range: LineRange, public readonly lineCount: number) {
        super(`Line range ${range.start}..${range.end} is outside 1..${lineCount}`);
    }
}

export class PatchConflictError extends Error {
    constructor(public readonly first: PatchOperation, public readonly second: PatchOperation) {
        super(`Overlapping edits in ${first.targetFile}: ${describeTarget(first.target)} and ${describeTarget(second.target)}`);
    }
}

/** A replacement of `[start, end)` (offsets) by `text`. Insertions have `start === end`. */
export interface ResolvedEdit {
    start: number;
    end: number;
    text: string;
}

export function backupPathFor(targetFile: string, tag: string, timestamp?: Date): string {
    const base = tag ? `${targetFile}.bak_${tag}` : `${targetFile}.bak`;
    return timestamp ? `${base}_${formatCompactTimestamp(timestamp)}` : base;
}

function resolveRange(content: string, range: LineRange, replacementText: string): ResolvedEdit {
    const starts = getLineStarts(content);
    const lineCount = starts.length;
    const { start: first, end: last } = range;
    if (!Number.isInteger(first) || !Number.isInteger(last) || first < 1 || last > lineCount || first > last) {
        throw new RangeOutOfBoundsError(range, lineCount);
    }

    const eol = detectLineEnding(content) ?? '\n';
    // An empty payload deletes the lines.
    const payload = replacementText === '' ? [] : splitLines(replacementText);

    let start = starts[first - 1];
    const end = last < lineCount ? starts[last] : content.length;
    const lastHasTerminator = last < lineCount || content.endsWith('\n');

    if (lastHasTerminator) {
        return { start, end, text: payload.map(line => line + eol).join('') };
    }
    if (payload.length === 0 && start > 0) {
        // Deleting up to an unterminated last line also removes the line break before it.
        start -= content[start - 2] === '\r' ? 2 : 1;
    }
    return { start, end, text: payload.join(eol) };
}

/** Inserting text that is already right there counts as replacing it with itself. */
function insertAt(content: string, at: number, text: string, side: 'before' | 'after'): ResolvedEdit {
    if (side === 'before' && text.length > 0 && at >= text.length && content.slice(at - text.length, at) === text) {
        return { start: at - text.length, end: at, text };
    }
    if (side === 'after' && text.length > 0 && content.startsWith(text, at)) {
        return { start: at, end: at + text.length, text };
    }
    return { start: at, end: at, text };
}

function resolveEnsureLine(content: string, replacementText: string, afterPrefix: string | undefined): ResolvedEdit {
    const line = replacementText.replace(/\r?\n$/, '');
    const lines = splitLines(content);
    if (lines.some(l => l.trim() === line.trim())) {
        return { start: 0, end: 0, text: '' };
    }

    const eol = detectLineEnding(content) ?? '\n';
    let last = -1;
    if (afterPrefix !== undefined) {
        lines.forEach((l, i) => {
            if (l.trimStart().startsWith(afterPrefix)) last = i;
        });
    }
    if (last === -1) {
        return { start: 0, end: 0, text: line + eol };
    }

    const starts = getLineStarts(content);
    if (last + 1 < starts.length) {
        return { start: starts[last + 1], end: starts[last + 1], text: line + eol };
    }
    const end = content.length;
    return { start: end, end, text: content.endsWith('\n') ? line + eol : eol + line };
}

export function resolveEdit(content: string, target: PatchTarget, replacementText: string): ResolvedEdit {
    if (target.type === 'range') {
        return resolveRange(content, target.range, replacementText);
    }
    if (target.type === 'ensure-line') {
        return resolveEnsureLine(content, replacementText, target.afterPrefix);
    }

    const anchor = locateAnchor(content, target.marker, {
        occurrence: target.occurrence,
        openDelimiter: target.openDelimiter,
    });
    const spanStart = target.span === 'declaration' ? declarationStart(content, anchor) : anchor.bodyStart;
    const text = normalizeLineEndings(replacementText, detectLineEnding(content) ?? '\n');
    if (anchor.kind === 'statement' && (target.edit === 'prepend-body' || target.edit === 'append-body')) {
        throw new UnbalancedAnchorError(target.marker, `statement has no body to ${target.edit}`);
    }

    switch (target.edit) {
        case 'insert-before':
            return insertAt(content, spanStart, text, 'before');
        case 'prepend-body':
            return insertAt(content, anchor.bodyStart + 1, text, 'after');
        case 'append-body':
            return insertAt(content, anchor.bodyEnd - 1, text, 'before');
        case 'insert-after':
            return insertAt(content, anchor.bodyEnd, text, 'after');
        case 'replace':
            return { start: spanStart, end: anchor.bodyEnd, text };
    }
}

export function applyEdit(content: string, target: PatchTarget, replacementText: string): string {
    const { start, end, text } = resolveEdit(content, target, replacementText);
    return content.slice(0, start) + text + content.slice(end);
}

function linesOf(content: string, edit: ResolvedEdit): LineRange {
    return {
        start: lineOfOffset(content, edit.start),
        end: lineOfOffset(content, Math.max(edit.start, edit.end - 1)),
    };
}

export interface PatchApplierOptions {
    logger?: Logger;
    /** Keep a ledger of applied operations beside each target file. Defaults to true. */
    useLedger?: boolean;
    now?: () => Date;
}

interface PendingEdit {
    index: number;
    edit: ResolvedEdit;
}

export class PatchApplier {
    private readonly ledgers = new Map<string, PatchLedger>();
    private readonly logger: Logger;
    private readonly useLedger: boolean;
    private readonly now: () => Date;

    constructor(private readonly fs: IFileSystem, options: PatchApplierOptions = {}) {
        this.logger = options.logger ?? console.log;
        this.useLedger = options.useLedger ?? true;
        this.now = options.now ?? (() => new Date());
    }

    ledgerFor(targetFile: string): PatchLedger | undefined {
        if (!this.useLedger) {
            return undefined;
        }
        let ledger = this.ledgers.get(targetFile);
        if (!ledger) {
            ledger = new PatchLedger(this.fs, ledgerPathFor(targetFile));
            this.ledgers.set(targetFile, ledger);
        }
        return ledger;
    }

    async apply(op: PatchOperation): Promise<PatchResult> {
        const [result] = await this.applyBatch([op]);
        return result;
    }

    /**
     * Applies several edits to one file as a single transaction: every edit is resolved
     * against the same content, then one backup and one write happen.
     * Nothing is written if any edit fails to resolve.
     */
    async applyBatch(ops: PatchOperation[]): Promise<PatchResult[]> {
        if (ops.length === 0) {
            return [];
        }
        const { targetFile, tag, timestamped } = ops[0];
        for (const op of ops) {
            if (op.targetFile !== targetFile || op.tag !== tag) {
                throw new Error('All operations of a batch must share the target file and the tag');
            }
        }

        const content = await this.fs.readFile(targetFile);
        const ledger = this.ledgerFor(targetFile);
        await ledger?.load();

        const results: PatchResult[] = [];
        const pending: PendingEdit[] = [];
        ops.forEach((op, index) => {
            if (ledger?.isApplied(op, content)) {
                results[index] = { operation: op, status: 'already-applied' };
                return;
            }
            const edit = resolveEdit(content, op.target, op.replacementText);
            const unchanged = content.slice(edit.start, edit.end) === edit.text;
            results[index] = { operation: op, status: unchanged ? 'unchanged' : 'applied', lines: linesOf(content, edit) };
            if (!unchanged) {
                pending.push({ index, edit });
            }
        });

        pending.sort((a, b) => a.edit.start - b.edit.start);
        for (let i = 1; i < pending.length; i++) {
            const prev = pending[i - 1];
            const cur = pending[i];
            if (cur.edit.start < prev.edit.end || cur.edit.start === prev.edit.start) {
                throw new PatchConflictError(ops[prev.index], ops[cur.index]);
            }
        }

        if (pending.length > 0) {
            let next = content;
            for (let i = pending.length - 1; i >= 0; i--) {
                const { start, end, text } = pending[i].edit;
                next = next.slice(0, start) + text + next.slice(end);
            }

            const backupPath = backupPathFor(targetFile, tag, timestamped ? this.now() : undefined);
            // The backup must be complete before the target is touched.
            await this.fs.writeFile(backupPath, content);
            await this.fs.writeFile(targetFile, next);

            for (const { index } of pending) {
                results[index].backupPath = backupPath;
            }
            await ledger?.record(pending.map(p => ops[p.index]), next, backupPath, this.now());
        }

        for (const result of results) {
            this.logger(describePatch(result));
        }
        return results;
    }
}
