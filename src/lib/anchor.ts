import { OpenDelimiter, PositionedToken, closingFor, isOpenDelimiter, iterateTokens, lexStatesAt } from './scanner';
import { lineStartOf } from './utils';

export interface Anchor {
    /** `statement` when a `;` ends the declaration before any block opens. */
    kind: 'block' | 'statement';
    signatureMarker: string;
    /** Offset where the marker occurrence starts. */
    markerOffset: number;
    /** Offset of the opening delimiter; the marker offset for statements. */
    bodyStart: number;
    /** Offset just after the closing delimiter that brings the depth back to zero, or just after the `;`. */
    bodyEnd: number;
}

export interface LocateOptions {
    openDelimiter?: OpenDelimiter;
    /** 1-based. The first occurrence is the canonical one. */
    occurrence?: number;
    /** Ignore marker occurrences that start inside a comment or a string literal. Defaults to true. */
    codeOnly?: boolean;
}

export class AnchorNotFoundError extends Error {
    constructor(public readonly marker: string, public readonly occurrence: number = 1) {
        super(occurrence === 1
            ? `Marker not found: ${JSON.stringify(marker)}`
            : `Occurrence ${occurrence} of marker not found: ${JSON.stringify(marker)}`);
    }
}

export class UnbalancedAnchorError extends Error {
    constructor(public readonly marker: string, public readonly detail: string) {
        super(`Unbalanced anchor for ${JSON.stringify(marker)}: ${detail}`);
    }
}

export function findMarkerOccurrences(buffer: string, marker: string, codeOnly: boolean = true): number[] {
    if (marker.length === 0) {
        return [];
    }

    const offsets: number[] = [];
    let idx = buffer.indexOf(marker);
    while (idx !== -1) {
        offsets.push(idx);
        idx = buffer.indexOf(marker, idx + marker.length);
    }

    if (!codeOnly || offsets.length === 0) {
        return offsets;
    }
    const states = lexStatesAt(buffer, offsets);
    return offsets.filter((_, i) => states[i].kind === 'code');
}

/** Offset of the first code-state `;` in `[from, to)` that is not nested in `leading`'s delimiters, or -1. */
function statementEnd(buffer: string, from: number, to: number, leading: PositionedToken[]): number {
    const candidates: number[] = [];
    for (let i = buffer.indexOf(';', from); i !== -1 && i < to; i = buffer.indexOf(';', i + 1)) {
        candidates.push(i);
    }
    if (candidates.length === 0) {
        return -1;
    }

    const states = lexStatesAt(buffer, candidates);
    for (let i = 0; i < candidates.length; i++) {
        if (states[i].kind !== 'code') continue;
        const depth = leading
            .filter(t => t.offset < candidates[i])
            .reduce((d, t) => d + (isOpenDelimiter(t.char) ? 1 : -1), 0);
        if (depth <= 0) {
            return candidates[i];
        }
    }
    return -1;
}

/**
 * Anchors on the block that follows `markerOffset`. A `;` at the marker's nesting level
 * before any opening delimiter makes it a statement anchor spanning marker to `;`,
 * and a closing delimiter of the enclosing scope ends the search.
 */
export function anchorAt(buffer: string, marker: string, markerOffset: number, openDelimiter: OpenDelimiter = '{'): Anchor {
    const close = closingFor[openDelimiter];
    const tokens = iterateTokens(buffer, markerOffset);
    const leading: PositionedToken[] = [];
    let opener: PositionedToken | undefined;
    let limit = buffer.length;
    let outer = 0;

    for (let next = tokens.next(); !next.done; next = tokens.next()) {
        const token = next.value;
        if (token.char === openDelimiter) {
            opener = token;
            limit = token.offset;
            break;
        }
        if (token.char === close && outer === 0) {
            limit = token.offset;
            break;
        }
        outer += isOpenDelimiter(token.char) ? 1 : -1;
        leading.push(token);
    }

    const end = statementEnd(buffer, markerOffset, limit, leading);
    if (end !== -1) {
        return { kind: 'statement', signatureMarker: marker, markerOffset, bodyStart: markerOffset, bodyEnd: end + 1 };
    }
    if (!opener) {
        throw new UnbalancedAnchorError(marker, `no opening '${openDelimiter}' after the marker`);
    }

    let depth = 1;
    for (let next = tokens.next(); !next.done; next = tokens.next()) {
        const token = next.value;
        if (token.char === openDelimiter) {
            depth++;
        } else if (token.char === close) {
            depth--;
            if (depth === 0) {
                return { kind: 'block', signatureMarker: marker, markerOffset, bodyStart: opener.offset, bodyEnd: token.offset + 1 };
            }
        }
    }
    throw new UnbalancedAnchorError(marker, `no matching '${close}' before end of buffer`);
}

/**
 * Where a declaration-wide span starts: the start of the marker's line, or just after the
 * last `;` or `}` of code that ends an earlier item on that line.
 */
export function declarationStart(buffer: string, anchor: Anchor): number {
    const lineStart = lineStartOf(buffer, anchor.markerOffset);
    const candidates: number[] = [];
    for (let i = lineStart; i < anchor.markerOffset; i++) {
        if (buffer[i] === ';' || buffer[i] === '}') candidates.push(i);
    }
    if (candidates.length === 0) {
        return lineStart;
    }

    const states = lexStatesAt(buffer, candidates);
    for (let i = candidates.length - 1; i >= 0; i--) {
        if (states[i].kind === 'code') {
            let start = candidates[i] + 1;
            while (start < anchor.markerOffset && (buffer[start] === ' ' || buffer[start] === '\t')) start++;
            return start;
        }
    }
    return lineStart;
}
