import { IChecker, runCheck } from './checker';
import { Diagnostic, formatLocation } from './diagnostics';
import { IFileSystem } from './fileSystem';
import { Logger, PatchOperation, PatchResult } from './models';
import { PatchApplier } from './patch';
import { splitLines } from './utils';

export type RepairState = 'idle' | 'checking' | 'diagnosing' | 'patching' | 'done' | 'aborted';

export const DEFAULT_MAX_ITERATIONS = 10;
/** Hard ceiling whatever the caller asks for. */
export const MAX_ITERATIONS_LIMIT = 1000;

export interface RepairPolicy {
    readonly name: string;
    matches(diagnostic: Diagnostic): boolean;
    /** `content` is the current text of the target file. */
    buildPatch(diagnostic: Diagnostic, targetFile: string, content: string): PatchOperation;
}

export interface RepairReport {
    state: 'done' | 'aborted';
    outcome: 'no-actionable-diagnostics' | 'IterationCapExceeded';
    iterations: number;
    patches: PatchResult[];
    /** Diagnostics of the last check */
    remaining: Diagnostic[];
}

/** A step of the loop failed; `patches` lists what was applied before that. */
export class RepairFailedError extends Error {
    constructor(public readonly reason: unknown, public readonly patches: PatchResult[], public readonly iterations: number) {
        super(`Repair failed after ${patches.length} patch(es): ${reason instanceof Error ? reason.message : String(reason)}`);
    }
}

interface RepairProgress {
    iterations: number;
    patches: PatchResult[];
}

export interface RepairLoopOptions {
    maxIterations?: number;
    /** Directory the checker reports paths relative to */
    cwd?: string;
    logger?: Logger;
}

export interface CommentOutLineOptions {
    /** Diagnostic codes to act on; any code when omitted */
    codes?: string[];
    /** Tested against the rendered headline */
    headlinePattern?: RegExp;
    note?: string;
    commentPrefix?: string;
    tag?: string;
}

/** Neutralizes the line a diagnostic points at by replacing it with a comment, keeping its indentation. */
export class CommentOutLinePolicy implements RepairPolicy {
    readonly name: string;

    constructor(private readonly options: CommentOutLineOptions = {}) {
        this.name = options.note ? `comment-out (${options.note})` : 'comment-out';
    }

    matches(diagnostic: Diagnostic): boolean {
        if (diagnostic.severity !== 'error') return false;
        const { codes, headlinePattern } = this.options;
        if (codes && (!diagnostic.code || !codes.includes(diagnostic.code))) return false;
        if (headlinePattern && !headlinePattern.test(diagnostic.renderedHeadline)) return false;
        return true;
    }

    buildPatch(diagnostic: Diagnostic, targetFile: string, content: string): PatchOperation {
        const line = diagnostic.primaryLocation?.line ?? 0;
        const original = splitLines(content)[line - 1] ?? '';
        const indent = /^[ \t]*/.exec(original)?.[0] ?? '';
        const prefix = this.options.commentPrefix ?? '//';
        const note = this.options.note ?? diagnostic.renderedHeadline;

        return {
            targetFile,
            target: { type: 'range', range: { start: line, end: line } },
            replacementText: `${indent}${prefix} AUTO-FIX: ${note}`,
            tag: this.options.tag ?? 'repair',
            description: `comment out line ${line}`,
        };
    }
}

export function strayClosingDelimiterPolicy(): CommentOutLinePolicy {
    return new CommentOutLinePolicy({
        headlinePattern: /unexpected closing delimiter/,
        note: 'commented out stray closing brace',
    });
}

/**
 * Check, diagnose, patch, repeat. Runs until no diagnostic the policy accepts points
 * into the target file, or until the iteration cap would be exceeded.
 */
export class RepairLoop {
    private _state: RepairState = 'idle';
    private readonly maxIterations: number;
    private readonly logger: Logger;

    constructor(
        private readonly fs: IFileSystem,
        private readonly checker: IChecker,
        private readonly applier: PatchApplier,
        private readonly policy: RepairPolicy,
        private readonly options: RepairLoopOptions = {},
    ) {
        const requested = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
        this.maxIterations = Math.max(0, Math.min(Math.floor(requested), MAX_ITERATIONS_LIMIT));
        this.logger = options.logger ?? console.log;
    }

    get state(): RepairState {
        return this._state;
    }

    private transition(next: RepairState): void {
        this.logger(`[repair] ${this._state} -> ${next}`);
        this._state = next;
    }

    private pointsInto(diagnostic: Diagnostic, targetFile: string): boolean {
        const location = diagnostic.primaryLocation;
        if (!location || location.line < 1) return false;
        const cwd = this.options.cwd ?? '.';
        return this.fs.path.resolve(cwd, location.file) === this.fs.path.resolve(cwd, targetFile);
    }

    async run(targetFile: string): Promise<RepairReport> {
        if (this._state !== 'idle') {
            throw new Error(`Repair loop already used (state: ${this._state})`);
        }
        const progress: RepairProgress = { iterations: 0, patches: [] };

        try {
            return await this.loop(targetFile, progress);
        } catch (e) {
            this.transition('aborted');
            this.logger(`[repair] failed after ${progress.patches.length} patch(es): ${e instanceof Error ? e.message : String(e)}`);
            throw new RepairFailedError(e, progress.patches, progress.iterations);
        }
    }

    private async loop(targetFile: string, progress: RepairProgress): Promise<RepairReport> {
        const { patches } = progress;
        while (true) {
            this.transition('checking');
            const { diagnostics } = runCheck(this.checker);

            this.transition('diagnosing');
            const actionable = diagnostics.find(d => this.policy.matches(d) && this.pointsInto(d, targetFile));
            if (!actionable) {
                this.transition('done');
                this.logger(`[repair] no actionable diagnostics left after ${patches.length} patch(es)`);
                return { state: 'done', outcome: 'no-actionable-diagnostics', iterations: progress.iterations, patches, remaining: diagnostics };
            }

            if (progress.iterations >= this.maxIterations) {
                this.transition('aborted');
                this.logger(`[repair] WARNING: iteration cap of ${this.maxIterations} reached with `
                    + `${formatLocation(actionable.primaryLocation)} still reported; `
                    + `${patches.length} patch(es) applied, manual review required`);
                return { state: 'aborted', outcome: 'IterationCapExceeded', iterations: progress.iterations, patches, remaining: diagnostics };
            }

            this.transition('patching');
            progress.iterations++;
            this.logger(`[repair] pass ${progress.iterations}: ${actionable.renderedHeadline} at ${formatLocation(actionable.primaryLocation)}`);
            const content = await this.fs.readFile(targetFile);
            const op = this.policy.buildPatch(actionable, targetFile, content);
            patches.push(await this.applier.apply(op));
        }
    }
}
