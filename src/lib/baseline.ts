import { Diagnostic, diagnosticsFromMessages, fingerprintMessage } from './diagnostics';
import { IFileSystem } from './fileSystem';
import { Logger } from './models';
import { isRecord } from './utils';

export interface Baseline {
    /** ISO-8601 */
    timestamp: string;
    returnCode: number;
    diagnostics: Diagnostic[];
    fingerprintSet: Set<string>;
}

/** On-disk shape of a baseline. */
interface BaselineFile {
    timestamp: string;
    return_code: number;
    messages: unknown[];
    error_keys: string[];
}

export interface DiagnosticDiff {
    added: Set<string>;
    resolved: Set<string>;
    unchanged: number;
    /** Share of the baseline that was resolved, 0-100 */
    progressPercent: number;
}

export function fingerprint(diagnostic: Diagnostic): string {
    return fingerprintMessage(diagnostic.message);
}

/** Fingerprints that take part in diffs: those of error-level diagnostics. */
export function trackedFingerprints(diagnostics: Diagnostic[]): string[] {
    return diagnostics.filter(d => d.severity === 'error').map(fingerprint);
}

export function createBaseline(diagnostics: Diagnostic[], returnCode: number, now: Date = new Date()): Baseline {
    return {
        timestamp: now.toISOString(),
        returnCode,
        diagnostics,
        fingerprintSet: new Set(trackedFingerprints(diagnostics)),
    };
}

export function diffFingerprints(baseline: Iterable<string>, current: Iterable<string>): DiagnosticDiff {
    const prev = new Set(baseline);
    const cur = new Set(current);

    const added = new Set([...cur].filter(k => !prev.has(k)));
    const resolved = new Set([...prev].filter(k => !cur.has(k)));
    const unchanged = [...cur].filter(k => prev.has(k)).length;

    return {
        added,
        resolved,
        unchanged,
        progressPercent: (resolved.size / Math.max(prev.size, 1)) * 100,
    };
}

export function diffAgainstBaseline(baseline: Baseline, current: Diagnostic[]): DiagnosticDiff {
    return diffFingerprints(baseline.fingerprintSet, trackedFingerprints(current));
}

function isBaselineFile(value: unknown): value is BaselineFile {
    if (!isRecord(value)) return false;
    const keys = value.error_keys;
    return typeof value.timestamp === 'string'
        && typeof value.return_code === 'number'
        && Array.isArray(value.messages)
        && Array.isArray(keys)
        && keys.every(k => typeof k === 'string');
}

export class BaselineStore {
    constructor(private readonly fs: IFileSystem, private readonly logger: Logger = console.log) {}

    /** Missing or unreadable baselines load as `undefined`. */
    async load(filePath: string): Promise<Baseline | undefined> {
        if (!await this.fs.exists(filePath)) {
            return undefined;
        }

        let data: unknown;
        try {
            data = JSON.parse(await this.fs.readFile(filePath));
        } catch (e) {
            this.logger(`Ignoring unreadable baseline ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
            return undefined;
        }
        if (!isBaselineFile(data)) {
            this.logger(`Ignoring baseline ${filePath}: unexpected format`);
            return undefined;
        }

        return {
            timestamp: data.timestamp,
            returnCode: data.return_code,
            diagnostics: diagnosticsFromMessages(data.messages),
            fingerprintSet: new Set(data.error_keys),
        };
    }

    /** Replaces the stored baseline in a single write. */
    async save(filePath: string, baseline: Baseline): Promise<void> {
        const data: BaselineFile = {
            timestamp: baseline.timestamp,
            return_code: baseline.returnCode,
            messages: baseline.diagnostics.map(d => d.raw),
            error_keys: trackedFingerprints(baseline.diagnostics),
        };
        await this.fs.writeFile(filePath, JSON.stringify(data, null, 2));
    }
}
