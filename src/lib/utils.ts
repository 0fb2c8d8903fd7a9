import * as crypto from 'crypto';
import { glob } from 'glob';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export type HashAlgorithm = 'sha1' | 'sha256';

export function computeHash(content: string | Buffer, algorithm: HashAlgorithm = 'sha256'): string {
    const hash = crypto.createHash(algorithm);
    hash.update(content);
    return hash.digest('hex');
}

export function normalizeGlob(patterns: string[], cwd: string): string[] {
    const files: string[] = [];
    for (const pattern of patterns) {
        const matches = glob.sync(pattern, { cwd, absolute: true, nodir: true });
        files.push(...matches.sort());
    }
    return files;
}

export type LineEnding = '\n' | '\r\n';

export function detectLineEnding(content: string): LineEnding | undefined {
    const crlf = content.indexOf('\r\n');
    const lf = content.indexOf('\n');

    if (crlf !== -1) {
        return '\r\n';
    }
    if (lf !== -1) return '\n';
    return undefined;
}

export function normalizeLineEndings(content: string, lineEnding: string): string {
    if (lineEnding === '\r\n') {
        return content.replace(/\r?\n/g, '\r\n');
    } else if (lineEnding === '\n') {
        return content.replace(/\r\n/g, '\n');
    }
    return content;
}

/**
 * Offsets where each line of `content` starts. A trailing line break does not open a new line,
 * so the length of the result is the line count.
 */
export function getLineStarts(content: string): number[] {
    if (content.length === 0) {
        return [];
    }
    const starts = [0];
    let idx = content.indexOf('\n');
    while (idx !== -1 && idx + 1 < content.length) {
        starts.push(idx + 1);
        idx = content.indexOf('\n', idx + 1);
    }
    return starts;
}

/** 1-based line number containing `offset`. */
export function lineOfOffset(content: string, offset: number): number {
    let line = 1;
    for (let i = 0; i < offset && i < content.length; i++) {
        if (content.charCodeAt(i) === 10) line++;
    }
    return line;
}

export function lineStartOf(content: string, offset: number): number {
    return offset === 0 ? 0 : content.lastIndexOf('\n', offset - 1) + 1;
}

export function splitLines(content: string): string[] {
    const lines = content.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

export function formatCompactTimestamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`
        + `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}
