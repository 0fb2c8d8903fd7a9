import { DiagnosticDiff } from './baseline';
import { Diagnostic, DiagnosticSummary, NO_CODE, formatLocation } from './diagnostics';
import { DelimiterReport, describeProblem } from './delimiters';

export function formatCounter(counts: Record<string, number>, top: number = 10): string {
    const items = Object.entries(counts).sort((a, b) => b[1] - a[1]).slice(0, top);
    if (items.length === 0) {
        return '  (none)';
    }
    return items.map(([key, count]) => `  ${key.padStart(12)} × ${count}`).join('\n');
}

export function formatSummary(summary: DiagnosticSummary): string {
    return [
        '=== check summary ===',
        `errors:   ${summary.totalErrors}`,
        `warnings: ${summary.totalWarnings}`,
        '',
        'Top error codes:',
        formatCounter(summary.byCode),
        '',
        'Top files with errors:',
        formatCounter(summary.byFile),
    ].join('\n');
}

export function formatDiagnosticLine(diagnostic: Diagnostic): string {
    return `  [${diagnostic.code ?? NO_CODE}] ${formatLocation(diagnostic.primaryLocation)}  ${diagnostic.renderedHeadline}`;
}

export function formatDiff(diff: DiagnosticDiff, current: Diagnostic[], maxExamples: number = 5): string {
    const lines = [
        '=== diff vs previous run ===',
        `new errors:   ${diff.added.size}`,
        `resolved:     ${diff.resolved.size}`,
        `unchanged:    ${diff.unchanged}`,
        '',
        `progress since last run: ${diff.progressPercent.toFixed(1)}% of prior errors resolved`,
    ];

    const examples = current.filter(d => d.severity === 'error' && diff.added.has(d.fingerprint)).slice(0, maxExamples);
    if (examples.length > 0) {
        lines.push('', 'New error examples:', ...examples.map(formatDiagnosticLine));
    }
    return lines.join('\n');
}

/** Prints `radius` lines around each focus line, marking the focus with `>>`. */
export function formatContext(lines: string[], focusLines: number[], radius: number = 6): string {
    const blocks: string[] = [];
    for (const focus of focusLines) {
        const from = Math.max(1, focus - radius);
        const to = Math.min(lines.length, focus + radius);
        const block = [`--- context ${from}..${to} (focus ${focus}) ---`];
        for (let i = from; i <= to; i++) {
            const mark = i === focus ? '>>' : '  ';
            block.push(`${mark} ${String(i).padStart(5)}: ${lines[i - 1]}`);
        }
        blocks.push(block.join('\n'));
    }
    return blocks.join('\n\n');
}

export function formatDelimiterReport(file: string, report: DelimiterReport, listProblems: boolean): string {
    const closingErrors = report.problems.filter(p => p.type !== 'unclosed').length;
    const lines = [`${file}: closing-errors=${closingErrors}, unclosed=${report.problems.length - closingErrors}, final_depth=${report.finalDepth}`];
    if (listProblems) {
        lines.push(...report.problems.map(p => ` - ${describeProblem(p)}`));
    }
    if (report.negativeDepthLines.length > 0) {
        lines.push(`Depth went negative at: ${report.negativeDepthLines.slice(0, 10).join(', ')}`);
    }
    return lines.join('\n');
}
