import { computeHash, isRecord } from './utils';

export const COMPILER_MESSAGE_REASON = 'compiler-message';
export const NO_CODE = 'nocode';

export interface RawSpan {
    is_primary?: boolean;
    file_name?: string;
    line_start?: number;
    column_start?: number;
}

/** Typed view of the `message` object of a compiler-message entry. */
export interface RawCompilerMessage {
    level?: string;
    message?: string;
    code?: { code?: string } | null;
    spans?: RawSpan[];
    rendered?: string | null;
}

export type Severity = 'error' | 'warning' | 'other';

export interface SourceLocation {
    file: string;
    line: number;
    column: number;
}

export interface Diagnostic {
    severity: Severity;
    /** `level` as the checker reported it */
    level: string;
    code?: string;
    primaryLocation?: SourceLocation;
    renderedHeadline: string;
    rendered: string;
    fingerprint: string;
    message: RawCompilerMessage;
    /** The message object exactly as received */
    raw: Record<string, unknown>;
}

export interface DiagnosticParseSkipped {
    lineNumber: number;
    reason: 'invalid-json' | 'not-an-object' | 'missing-message';
    text: string;
}

export function toSeverity(level: string): Severity {
    switch (level) {
        case 'error':
            return 'error';
        case 'warning':
            return 'warning';
        default:
            return 'other';
    }
}

function toRawMessage(value: Record<string, unknown>): RawCompilerMessage {
    const message: RawCompilerMessage = {};
    if (typeof value.level === 'string') message.level = value.level;
    if (typeof value.message === 'string') message.message = value.message;
    if (typeof value.rendered === 'string') message.rendered = value.rendered;

    const code = value.code;
    if (isRecord(code) && typeof code.code === 'string') {
        message.code = { code: code.code };
    } else {
        message.code = null;
    }

    message.spans = [];
    if (Array.isArray(value.spans)) {
        for (const span of value.spans) {
            if (!isRecord(span)) continue;
            const raw: RawSpan = {};
            if (typeof span.is_primary === 'boolean') raw.is_primary = span.is_primary;
            if (typeof span.file_name === 'string') raw.file_name = span.file_name;
            if (typeof span.line_start === 'number') raw.line_start = span.line_start;
            if (typeof span.column_start === 'number') raw.column_start = span.column_start;
            message.spans.push(raw);
        }
    }
    return message;
}

export function primaryLocationOf(message: RawCompilerMessage): SourceLocation | undefined {
    const span = (message.spans ?? []).find(s => s.is_primary === true);
    if (!span || span.file_name === undefined) {
        return undefined;
    }
    return { file: span.file_name, line: span.line_start ?? 0, column: span.column_start ?? 0 };
}

export function formatLocation(location: SourceLocation | undefined): string {
    return location ? `${location.file}:${location.line}:${location.column}` : '';
}

/**
 * Identity of a message across runs: level, code, primary location and the first two
 * rendered lines. The rest of the rendered text is left out on purpose.
 */
export function fingerprintMessage(message: RawCompilerMessage): string {
    const code = message.code?.code || NO_CODE;
    const level = message.level ?? '';
    const render = (message.rendered ?? '').split(/\r?\n/).slice(0, 2).join(' | ').trim();
    const fileLine = formatLocation(primaryLocationOf(message));
    return computeHash(`${level}|${code}|${fileLine}|${render}`, 'sha1');
}

export function toDiagnostic(raw: Record<string, unknown>): Diagnostic {
    const message = toRawMessage(raw);
    const level = message.level ?? '';
    const rendered = message.rendered ?? '';
    const headline = (rendered.split(/\r?\n/)[0] ?? '').trim() || (message.message ?? '');
    return {
        severity: toSeverity(level),
        level,
        code: message.code?.code || undefined,
        primaryLocation: primaryLocationOf(message),
        renderedHeadline: headline,
        rendered,
        fingerprint: fingerprintMessage(message),
        message,
        raw,
    };
}

/**
 * Parses a newline-delimited JSON stream. Lines that are blank, not JSON, or not a
 * compiler message are dropped; the malformed ones are reported through `onSkip`.
 */
export function parseDiagnostics(lines: Iterable<string>, onSkip?: (skipped: DiagnosticParseSkipped) => void): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    let lineNumber = 0;

    for (const line of lines) {
        lineNumber++;
        const text = line.trim();
        if (text.length === 0) continue;

        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch {
            onSkip?.({ lineNumber, reason: 'invalid-json', text });
            continue;
        }

        if (!isRecord(parsed)) {
            onSkip?.({ lineNumber, reason: 'not-an-object', text });
            continue;
        }
        if (parsed.reason !== COMPILER_MESSAGE_REASON) continue;

        if (!isRecord(parsed.message)) {
            onSkip?.({ lineNumber, reason: 'missing-message', text });
            continue;
        }
        diagnostics.push(toDiagnostic(parsed.message));
    }
    return diagnostics;
}

export function parseDiagnosticStream(raw: string, onSkip?: (skipped: DiagnosticParseSkipped) => void): Diagnostic[] {
    return parseDiagnostics(raw.split(/\r?\n/), onSkip);
}

/** Rebuilds diagnostics from raw messages, e.g. those stored in a baseline. */
export function diagnosticsFromMessages(messages: unknown[]): Diagnostic[] {
    return messages.filter(isRecord).map(toDiagnostic);
}

export interface DiagnosticSummary {
    totalErrors: number;
    totalWarnings: number;
    /** Error counts by code */
    byCode: Record<string, number>;
    /** Error counts by primary file */
    byFile: Record<string, number>;
}

export function summarizeDiagnostics(diagnostics: Diagnostic[]): DiagnosticSummary {
    const errors = diagnostics.filter(d => d.severity === 'error');
    const byCode: Record<string, number> = {};
    const byFile: Record<string, number> = {};

    for (const d of errors) {
        const code = d.code ?? NO_CODE;
        byCode[code] = (byCode[code] ?? 0) + 1;
        if (d.primaryLocation) {
            byFile[d.primaryLocation.file] = (byFile[d.primaryLocation.file] ?? 0) + 1;
        }
    }

    return {
        totalErrors: errors.length,
        totalWarnings: diagnostics.filter(d => d.severity === 'warning').length,
        byCode,
        byFile,
    };
}
