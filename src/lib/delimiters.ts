import { CloseDelimiter, PositionedToken, closingFor, isOpenDelimiter, iterateTokens } from './scanner';

interface OpenEntry {
    token: PositionedToken;
    expected: CloseDelimiter;
}

export type DelimiterProblem =
    | { type: 'unmatched-close', token: PositionedToken }
    | { type: 'mismatched', token: PositionedToken, opener: PositionedToken, expected: CloseDelimiter }
    | { type: 'unclosed', token: PositionedToken, expected: CloseDelimiter };

export interface DelimiterReport {
    problems: DelimiterProblem[];
    /** Opens minus closes over the whole text */
    finalDepth: number;
    /** Lines where the running depth went below zero */
    negativeDepthLines: number[];
}

/** Stack-based balance check over the code-state delimiters of a whole file. */
export function analyzeDelimiters(text: string): DelimiterReport {
    const problems: DelimiterProblem[] = [];
    const negativeDepthLines: number[] = [];
    const stack: OpenEntry[] = [];
    let depth = 0;

    for (const token of iterateTokens(text)) {
        const ch = token.char;
        if (isOpenDelimiter(ch)) {
            stack.push({ token, expected: closingFor[ch] });
            depth++;
            continue;
        }

        depth--;
        if (depth < 0 && negativeDepthLines[negativeDepthLines.length - 1] !== token.line) {
            negativeDepthLines.push(token.line);
        }

        const open = stack.pop();
        if (!open) {
            problems.push({ type: 'unmatched-close', token });
        } else if (open.expected !== ch) {
            problems.push({ type: 'mismatched', token, opener: open.token, expected: open.expected });
        }
    }

    for (const open of stack) {
        problems.push({ type: 'unclosed', token: open.token, expected: open.expected });
    }
    problems.sort((a, b) => a.token.offset - b.token.offset);

    return { problems, finalDepth: depth, negativeDepthLines };
}

export function describeProblem(problem: DelimiterProblem): string {
    const { token } = problem;
    switch (problem.type) {
        case 'unmatched-close':
            return `${token.line}:${token.column}: Unmatched closing ${token.char}`;
        case 'mismatched':
            return `${token.line}:${token.column}: Closing ${token.char} does not match ${problem.opener.char} `
                + `opened at ${problem.opener.line}:${problem.opener.column}`;
        case 'unclosed':
            return `${token.line}:${token.column}: ${token.char} is never closed (expected ${problem.expected})`;
    }
}

export function problemLines(report: DelimiterReport): number[] {
    return [...new Set(report.problems.map(p => p.token.line))].sort((a, b) => a - b);
}
