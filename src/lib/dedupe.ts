import { declarationStart, locateAll } from './anchor';
import { IFileSystem } from './fileSystem';
import { LineRange, Logger, PatchOperation, PatchResult } from './models';
import { PatchApplier } from './patch';
import { lineOfOffset, splitLines } from './utils';

export interface DedupeOptions {
    commentPrefix?: string;
    tag?: string;
    logger?: Logger;
}

export interface DedupeReport {
    /** The marker, or the line for line-level deduplication */
    marker: string;
    occurrences: number;
    results: PatchResult[];
}

export function commentOutLines(text: string, prefix: string = '//'): string {
    return splitLines(text)
        .map(line => line.trimStart().startsWith(prefix) ? line : `${prefix} ${line}`)
        .join('\n');
}

/**
 * Keeps the first occurrence of a declaration and comments out every later one.
 * The first code occurrence in the file is always the canonical one.
 */
export async function commentOutDuplicates(
    fs: IFileSystem,
    applier: PatchApplier,
    targetFile: string,
    marker: string,
    options: DedupeOptions = {},
): Promise<DedupeReport> {
    const logger = options.logger ?? console.log;
    const content = await fs.readFile(targetFile);
    const anchors = locateAll(content, marker);

    if (anchors.length <= 1) {
        logger(`No duplicates of ${JSON.stringify(marker)} in ${targetFile}`);
        return { marker, occurrences: anchors.length, results: [] };
    }
    logger(`Found ${anchors.length} occurrences of ${JSON.stringify(marker)}; keeping the first`);

    const ops: PatchOperation[] = anchors.slice(1).map((anchor, i): PatchOperation => {
        const span = content.slice(declarationStart(content, anchor), anchor.bodyEnd);
        return {
            targetFile,
            target: { type: 'anchor', marker, occurrence: i + 2, edit: 'replace', span: 'declaration' },
            replacementText: commentOutLines(span, options.commentPrefix),
            tag: options.tag ?? 'dedupe',
            description: `comment out duplicate at line ${lineOfOffset(content, anchor.markerOffset)}`,
        };
    });

    const results = await applier.applyBatch(ops);
    return { marker, occurrences: anchors.length, results };
}

/** Groups sorted line numbers into runs of consecutive lines. */
function toRuns(lines: number[]): LineRange[] {
    const runs: LineRange[] = [];
    for (const line of lines) {
        const last = runs[runs.length - 1];
        if (last && last.end + 1 === line) {
            last.end = line;
        } else {
            runs.push({ start: line, end: line });
        }
    }
    return runs;
}

/** Keeps the first copy of an exact line and deletes every later copy. */
export async function removeDuplicateLines(
    fs: IFileSystem,
    applier: PatchApplier,
    targetFile: string,
    line: string,
    options: DedupeOptions = {},
): Promise<DedupeReport> {
    const logger = options.logger ?? console.log;
    const wanted = line.replace(/\r?\n$/, '');
    const content = await fs.readFile(targetFile);
    const matches = splitLines(content).flatMap((l, i) => l === wanted ? [i + 1] : []);

    if (matches.length <= 1) {
        logger(`No duplicates of ${JSON.stringify(wanted)} in ${targetFile}`);
        return { marker: wanted, occurrences: matches.length, results: [] };
    }
    logger(`Found ${matches.length} copies of ${JSON.stringify(wanted)}; keeping the first`);

    const ops = toRuns(matches.slice(1)).map((range): PatchOperation => ({
        targetFile,
        target: { type: 'range', range },
        replacementText: '',
        tag: options.tag ?? 'dedupe',
        description: range.start === range.end
            ? `remove duplicate line ${range.start}`
            : `remove duplicate lines ${range.start}..${range.end}`,
    }));

    const results = await applier.applyBatch(ops);
    return { marker: wanted, occurrences: matches.length, results };
}
