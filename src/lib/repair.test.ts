import { CheckerOutput, ExternalCheckerFailedError, IChecker } from './checker';
import { toDiagnostic } from './diagnostics';
import { MemoryFileSystem } from './memoryFileSystem';
import { PatchApplier, RangeOutOfBoundsError } from './patch';
import { CommentOutLinePolicy, RepairFailedError, RepairLoop, strayClosingDelimiterPolicy } from './repair';

class FakeChecker implements IChecker {
    calls = 0;

    constructor(private readonly outputs: CheckerOutput[]) {}

    run(): CheckerOutput {
        const output = this.outputs[Math.min(this.calls, this.outputs.length - 1)];
        this.calls++;
        return output;
    }
}

function compilerMessage(file: string, line: number, headline: string, level = 'error', code?: string): string {
    return JSON.stringify({
        reason: 'compiler-message',
        message: {
            level,
            message: headline,
            code: code ? { code } : null,
            spans: [{ is_primary: true, file_name: file, line_start: line, column_start: 1 }],
            rendered: `${level}: ${headline}\n --> ${file}:${line}:1\n`,
        },
    });
}

function failing(stdout: string): CheckerOutput {
    return { stdout, stderr: '', returnCode: 101 };
}

const clean: CheckerOutput = { stdout: '', stderr: '', returnCode: 0 };
const target = '/src/main.rs';
const strayBrace = compilerMessage('src/main.rs', 3, 'unexpected closing delimiter: `}`');

describe('RepairLoop', () => {
    it('stops after the cap while the checker keeps reporting', async () => {
        const fs = new MemoryFileSystem({ [target]: 'fn a() {\n}\n}\n' });
        const checker = new FakeChecker([failing(strayBrace)]);
        const logs: string[] = [];
        const loop = new RepairLoop(fs, checker, new PatchApplier(fs, { logger: () => {} }), strayClosingDelimiterPolicy(), {
            maxIterations: 3,
            cwd: '/',
            logger: m => logs.push(m),
        });

        const report = await loop.run(target);

        expect(report.state).toBe('aborted');
        expect(report.outcome).toBe('IterationCapExceeded');
        expect(report.iterations).toBe(3);
        expect(report.patches.map(p => p.status)).toEqual(['applied', 'already-applied', 'already-applied']);
        expect(checker.calls).toBe(4);
        expect(loop.state).toBe('aborted');
        expect(await fs.readFile(target)).toBe('fn a() {\n}\n// AUTO-FIX: commented out stray closing brace\n');
        expect(logs.filter(l => l.startsWith('[repair] WARNING:'))).toEqual([
            '[repair] WARNING: iteration cap of 3 reached with src/main.rs:3:1 still reported; 3 patch(es) applied, manual review required',
        ]);
    });

    it('finishes once nothing actionable is reported', async () => {
        const fs = new MemoryFileSystem({ [target]: 'fn a() {\n    }\n}\n' });
        const checker = new FakeChecker([failing(compilerMessage('src/main.rs', 2, 'unexpected closing delimiter: `}`')), clean]);
        const logs: string[] = [];
        const loop = new RepairLoop(fs, checker, new PatchApplier(fs, { logger: () => {} }), strayClosingDelimiterPolicy(), {
            cwd: '/',
            logger: m => logs.push(m),
        });

        const report = await loop.run(target);

        expect(report.state).toBe('done');
        expect(report.outcome).toBe('no-actionable-diagnostics');
        expect(report.iterations).toBe(1);
        expect(report.remaining).toEqual([]);
        expect(await fs.readFile(target)).toBe('fn a() {\n    // AUTO-FIX: commented out stray closing brace\n}\n');
        expect(await fs.readFile('/src/main.rs.bak_repair')).toBe('fn a() {\n    }\n}\n');
        expect(logs.slice(0, 3)).toEqual([
            '[repair] idle -> checking',
            '[repair] checking -> diagnosing',
            '[repair] diagnosing -> patching',
        ]);
    });

    it('ignores diagnostics in other files and warnings', async () => {
        const fs = new MemoryFileSystem({ [target]: 'fn a() {}\n' });
        const stdout = [
            compilerMessage('src/other.rs', 1, 'unexpected closing delimiter: `}`'),
            compilerMessage('src/main.rs', 1, 'unexpected closing delimiter: `}`', 'warning'),
        ].join('\n');
        const loop = new RepairLoop(fs, new FakeChecker([failing(stdout)]), new PatchApplier(fs, { logger: () => {} }),
            strayClosingDelimiterPolicy(), { cwd: '/', logger: () => {} });

        const report = await loop.run(target);

        expect(report.state).toBe('done');
        expect(report.patches).toEqual([]);
        expect(report.remaining).toHaveLength(2);
        expect(fs.toJson()).toEqual({ [target]: 'fn a() {}\n' });
    });

    it('fails when the checker fails without diagnostics', async () => {
        const fs = new MemoryFileSystem({ [target]: 'fn a() {}\n' });
        const checker = new FakeChecker([{ stdout: '', stderr: 'boom\n', returnCode: 101 }]);
        const loop = new RepairLoop(fs, checker, new PatchApplier(fs, { logger: () => {} }), strayClosingDelimiterPolicy(), {
            logger: () => {},
        });

        await expect(loop.run(target)).rejects.toThrow('Repair failed after 0 patch(es): Checker failed with exit code 101: boom');
        expect(loop.state).toBe('aborted');
        expect(fs.toJson()).toEqual({ [target]: 'fn a() {}\n' });
    });

    it('reports the patches applied before a failing step', async () => {
        const fs = new MemoryFileSystem({ [target]: 'fn a() {\n}\n}\n' });
        const checker = new FakeChecker([
            failing(strayBrace),
            failing(compilerMessage('src/main.rs', 9, 'unexpected closing delimiter: `}`')),
        ]);
        const loop = new RepairLoop(fs, checker, new PatchApplier(fs, { logger: () => {} }), strayClosingDelimiterPolicy(), {
            cwd: '/',
            logger: () => {},
        });

        const error = await loop.run(target).then(() => undefined, (e: unknown) => e);

        expect(error).toBeInstanceOf(RepairFailedError);
        if (!(error instanceof RepairFailedError)) return;
        expect(error.message).toBe('Repair failed after 1 patch(es): Line range 9..9 is outside 1..3');
        expect(error.reason).toBeInstanceOf(RangeOutOfBoundsError);
        expect(error.iterations).toBe(2);
        expect(error.patches.map(p => [p.status, p.lines])).toEqual([['applied', { start: 3, end: 3 }]]);
        expect(loop.state).toBe('aborted');
        expect(await fs.readFile(target)).toBe('fn a() {\n}\n// AUTO-FIX: commented out stray closing brace\n');
    });

    it('keeps the patches when a later check fails', async () => {
        const fs = new MemoryFileSystem({ [target]: 'fn a() {\n}\n}\n' });
        const checker = new FakeChecker([failing(strayBrace), { stdout: '', stderr: 'boom', returnCode: 101 }]);
        const loop = new RepairLoop(fs, checker, new PatchApplier(fs, { logger: () => {} }), strayClosingDelimiterPolicy(), {
            cwd: '/',
            logger: () => {},
        });

        const error = await loop.run(target).then(() => undefined, (e: unknown) => e);

        expect(error).toBeInstanceOf(RepairFailedError);
        if (!(error instanceof RepairFailedError)) return;
        expect(error.reason).toBeInstanceOf(ExternalCheckerFailedError);
        expect(error.patches).toHaveLength(1);
    });

    it('cannot be run twice', async () => {
        const fs = new MemoryFileSystem({ [target]: 'fn a() {}\n' });
        const loop = new RepairLoop(fs, new FakeChecker([clean]), new PatchApplier(fs, { logger: () => {} }),
            strayClosingDelimiterPolicy(), { logger: () => {} });

        await loop.run(target);
        await expect(loop.run(target)).rejects.toThrow('Repair loop already used (state: done)');
    });
});

describe('CommentOutLinePolicy', () => {
    const diagnostic = toDiagnostic({
        level: 'error',
        code: { code: 'E0599' },
        spans: [{ is_primary: true, file_name: 'src/main.rs', line_start: 2, column_start: 9 }],
        rendered: 'error[E0599]: no method named `frob` found',
    });

    it('filters by code and headline', () => {
        expect(new CommentOutLinePolicy().matches(diagnostic)).toBe(true);
        expect(new CommentOutLinePolicy({ codes: ['E0599'] }).matches(diagnostic)).toBe(true);
        expect(new CommentOutLinePolicy({ codes: ['E0425'] }).matches(diagnostic)).toBe(false);
        expect(new CommentOutLinePolicy({ headlinePattern: /no method named/ }).matches(diagnostic)).toBe(true);
        expect(new CommentOutLinePolicy({ headlinePattern: /mismatched/ }).matches(diagnostic)).toBe(false);
    });

    it('replaces the line with a comment carrying the headline', () => {
        const op = new CommentOutLinePolicy({ tag: 'frob' }).buildPatch(diagnostic, target, 'fn a() {\n\tx.frob();\n}\n');
        expect(op).toEqual({
            targetFile: target,
            target: { type: 'range', range: { start: 2, end: 2 } },
            replacementText: '\t// AUTO-FIX: error[E0599]: no method named `frob` found',
            tag: 'frob',
            description: 'comment out line 2',
        });
    });
});
