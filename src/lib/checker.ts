import { spawnSync } from 'child_process';
import { Diagnostic, DiagnosticParseSkipped, parseDiagnosticStream } from './diagnostics';

export interface CheckerOutput {
    stdout: string;
    stderr: string;
    /** -1 when the process was killed by a signal (e.g. on timeout) */
    returnCode: number;
}

/** Runs the external checker to completion. Blocking by contract. */
export interface IChecker {
    run(): CheckerOutput;
}

export class ExternalCheckerFailedError extends Error {
    constructor(public readonly returnCode: number, public readonly detail: string) {
        super(`Checker failed with exit code ${returnCode}${detail ? `: ${detail}` : ''}`);
    }
}

export interface CommandCheckerOptions {
    cwd?: string;
    /** Milliseconds; without it the call may block indefinitely. */
    timeoutMs?: number;
}

export class CommandChecker implements IChecker {
    constructor(
        private readonly command: string,
        private readonly extraArgs: string[] = [],
        private readonly options: CommandCheckerOptions = {},
    ) {}

    get commandLine(): string {
        return [this.command, ...this.extraArgs.map(a => JSON.stringify(a))].join(' ');
    }

    run(): CheckerOutput {
        const result = spawnSync(this.commandLine, {
            shell: true,
            cwd: this.options.cwd,
            timeout: this.options.timeoutMs,
            encoding: 'utf-8',
            maxBuffer: 256 * 1024 * 1024,
        });

        if (result.error) {
            throw new ExternalCheckerFailedError(-1, result.error.message);
        }
        return {
            stdout: result.stdout,
            stderr: result.stderr,
            returnCode: result.status ?? -1,
        };
    }
}

export interface CheckResult {
    diagnostics: Diagnostic[];
    returnCode: number;
    skipped: DiagnosticParseSkipped[];
}

function lastLines(text: string, count: number): string {
    return text.trim().split(/\r?\n/).slice(-count).join('\n');
}

/** Runs the checker and parses its stream. A failing run that yields no diagnostics is an error. */
export function runCheck(checker: IChecker): CheckResult {
    const output = checker.run();
    const skipped: DiagnosticParseSkipped[] = [];
    const diagnostics = parseDiagnosticStream(output.stdout, s => skipped.push(s));

    if (output.returnCode !== 0 && diagnostics.length === 0) {
        throw new ExternalCheckerFailedError(output.returnCode, lastLines(output.stderr, 5));
    }
    return { diagnostics, returnCode: output.returnCode, skipped };
}
