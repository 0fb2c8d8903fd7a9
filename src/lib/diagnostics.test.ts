import {
    DiagnosticParseSkipped,
    parseDiagnosticStream,
    parseDiagnostics,
    summarizeDiagnostics,
    toDiagnostic,
} from './diagnostics';
import { computeHash } from './utils';

const unresolvedName = {
    level: 'error',
    message: 'cannot find value `x` in this scope',
    code: { code: 'E0425' },
    spans: [
        { is_primary: false, file_name: 'src/lib.rs', line_start: 1, column_start: 1 },
        { is_primary: true, file_name: 'src/main.rs', line_start: 10, column_start: 5 },
    ],
    rendered: 'error[E0425]: cannot find value `x`\n --> src/main.rs:10:5\n  |\n',
};

function compilerMessage(message: object): string {
    return JSON.stringify({ reason: 'compiler-message', message });
}

describe('parseDiagnostics', () => {
    it('keeps compiler messages and reports malformed lines', () => {
        const skipped: DiagnosticParseSkipped[] = [];
        const diagnostics = parseDiagnostics([
            'Compiling demo v0.1.0',
            '',
            compilerMessage(unresolvedName),
            JSON.stringify({ reason: 'build-finished', success: false }),
            '{not json',
            '[1, 2]',
            JSON.stringify({ reason: 'compiler-message' }),
        ], s => skipped.push(s));

        expect(diagnostics).toHaveLength(1);
        expect(skipped.map(s => [s.lineNumber, s.reason])).toEqual([
            [1, 'invalid-json'],
            [5, 'invalid-json'],
            [6, 'not-an-object'],
            [7, 'missing-message'],
        ]);
    });

    it('reads severity, code, location and headline', () => {
        const [d] = parseDiagnosticStream(compilerMessage(unresolvedName) + '\r\n');
        expect(d.severity).toBe('error');
        expect(d.code).toBe('E0425');
        expect(d.primaryLocation).toEqual({ file: 'src/main.rs', line: 10, column: 5 });
        expect(d.renderedHeadline).toBe('error[E0425]: cannot find value `x`');
        expect(d.raw).toEqual(unresolvedName);
    });

    it('falls back to the message when nothing is rendered', () => {
        const d = toDiagnostic({ level: 'warning', message: 'unused variable', spans: [] });
        expect(d.severity).toBe('warning');
        expect(d.code).toBeUndefined();
        expect(d.primaryLocation).toBeUndefined();
        expect(d.renderedHeadline).toBe('unused variable');
    });

    it('maps unknown levels to other', () => {
        expect(toDiagnostic({ level: 'failure-note' }).severity).toBe('other');
        expect(toDiagnostic({}).severity).toBe('other');
    });
});

describe('fingerprint', () => {
    it('hashes level, code, location and the first two rendered lines', () => {
        const d = toDiagnostic(unresolvedName);
        const expected = computeHash(
            'error|E0425|src/main.rs:10:5|error[E0425]: cannot find value `x` |  --> src/main.rs:10:5',
            'sha1',
        );
        expect(d.fingerprint).toBe(expected);
    });

    it('ignores rendered lines after the second', () => {
        const other = toDiagnostic({ ...unresolvedName, rendered: unresolvedName.rendered + '  = help: something else\n' });
        expect(other.fingerprint).toBe(toDiagnostic(unresolvedName).fingerprint);
    });

    it('changes with the location', () => {
        const moved = toDiagnostic({
            ...unresolvedName,
            spans: [{ is_primary: true, file_name: 'src/main.rs', line_start: 11, column_start: 5 }],
        });
        expect(moved.fingerprint).not.toBe(toDiagnostic(unresolvedName).fingerprint);
    });

    it('uses nocode for messages without a code', () => {
        const d = toDiagnostic({ level: 'error', rendered: 'error: oops' });
        expect(d.fingerprint).toBe(computeHash('error|nocode||error: oops', 'sha1'));
    });
});

describe('summarizeDiagnostics', () => {
    it('counts errors by code and file', () => {
        const summary = summarizeDiagnostics([
            toDiagnostic(unresolvedName),
            toDiagnostic({ ...unresolvedName, spans: [{ is_primary: true, file_name: 'src/util.rs', line_start: 2, column_start: 1 }] }),
            toDiagnostic({ level: 'error', rendered: 'error: oops' }),
            toDiagnostic({ level: 'warning', code: { code: 'dead_code' }, rendered: 'warning: unused' }),
        ]);
        expect(summary).toEqual({
            totalErrors: 3,
            totalWarnings: 1,
            byCode: { E0425: 2, nocode: 1 },
            byFile: { 'src/main.rs': 1, 'src/util.rs': 1 },
        });
    });
});
