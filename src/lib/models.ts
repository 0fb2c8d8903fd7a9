import { OpenDelimiter } from './scanner';

export type Logger = (message: string) => void;

export interface LineRange {
    /** 1-based, inclusive */
    start: number;
    /** 1-based, inclusive */
    end: number;
}

/**
 * - `insert-before`: at the span start (before the opening delimiter, or the marker line for declarations)
 * - `prepend-body`: just after the opening delimiter
 * - `append-body`: just before the closing delimiter
 * - `insert-after`: just after the closing delimiter
 * - `replace`: the whole span
 */
export type AnchorEdit = 'insert-before' | 'prepend-body' | 'append-body' | 'insert-after' | 'replace';

export type PatchTarget =
    | { type: 'range', range: LineRange }
    | {
        type: 'anchor',
        marker: string,
        edit: AnchorEdit,
        occurrence?: number,
        openDelimiter?: OpenDelimiter,
        /** `declaration` widens the span start to the beginning of the marker's line. */
        span?: 'body' | 'declaration',
    }
    /** Inserts the replacement line unless an equal line (ignoring surrounding whitespace) exists. */
    | {
        type: 'ensure-line',
        /** Insert after the last line starting with this prefix; at the top when none does. */
        afterPrefix?: string,
    };

export interface PatchOperation {
    targetFile: string;
    target: PatchTarget;
    replacementText: string;
    /** Backups with the same tag overwrite each other; different tags do not. */
    tag: string;
    /** Appends a UTC timestamp to the backup name. */
    timestamped?: boolean;
    description?: string;
}

export type PatchStatus = 'applied' | 'unchanged' | 'already-applied';

export interface PatchResult {
    operation: PatchOperation;
    status: PatchStatus;
    /** Set when a backup was written. */
    backupPath?: string;
    /** 1-based lines of the edited region in the content before the edit; not set for ledger skips. */
    lines?: LineRange;
}

export function describeTarget(target: PatchTarget): string {
    switch (target.type) {
        case 'range':
            return `lines ${target.range.start}..${target.range.end}`;
        case 'anchor': {
            const occurrence = target.occurrence ?? 1;
            const suffix = occurrence === 1 ? '' : ` (occurrence ${occurrence})`;
            return `${target.edit} ${target.span ?? 'body'} of ${JSON.stringify(target.marker)}${suffix}`;
        }
        case 'ensure-line':
            return target.afterPrefix === undefined
                ? 'ensure line'
                : `ensure line after last ${JSON.stringify(target.afterPrefix)}`;
    }
}

export function describePatch(result: PatchResult): string {
    const { operation } = result;
    const what = operation.description ?? describeTarget(operation.target);
    switch (result.status) {
        case 'applied':
            return `Patched "${operation.targetFile}": ${what} (backup: ${result.backupPath})`;
        case 'unchanged':
            return `Unchanged "${operation.targetFile}": ${what} already matches`;
        case 'already-applied':
            return `Skipped "${operation.targetFile}": ${what} already recorded in ledger`;
    }
}
