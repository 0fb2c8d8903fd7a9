import { lineOfOffset, lineStartOf } from './utils';

export type QuoteChar = '"' | "'";

export type LexState =
    | { kind: 'code' }
    | { kind: 'line-comment' }
    | { kind: 'block-comment' }
    | { kind: 'string', delimiter: QuoteChar };

export const CODE_STATE: LexState = { kind: 'code' };

export type DelimiterKind = 'OpenBrace' | 'CloseBrace' | 'OpenParen' | 'CloseParen' | 'OpenBracket' | 'CloseBracket';

export type DelimiterChar = '{' | '}' | '(' | ')' | '[' | ']';
export type OpenDelimiter = '{' | '(' | '[';
export type CloseDelimiter = '}' | ')' | ']';

const delimiterKinds: Record<DelimiterChar, DelimiterKind> = {
    '{': 'OpenBrace',
    '}': 'CloseBrace',
    '(': 'OpenParen',
    ')': 'CloseParen',
    '[': 'OpenBracket',
    ']': 'CloseBracket',
};

export const closingFor: Record<OpenDelimiter, CloseDelimiter> = {
    '{': '}',
    '(': ')',
    '[': ']',
};

export interface Token {
    kind: DelimiterKind;
    char: DelimiterChar;
    /** 1-based */
    line: number;
    /** 1-based */
    column: number;
}

export interface PositionedToken extends Token {
    /** 0-based offset into the scanned text */
    offset: number;
}

export interface ScanResult {
    tokens: Token[];
    endState: LexState;
}

export function isDelimiterChar(ch: string): ch is DelimiterChar {
    return Object.prototype.hasOwnProperty.call(delimiterKinds, ch);
}

export function isOpenDelimiter(ch: DelimiterChar): ch is OpenDelimiter {
    return ch === '{' || ch === '(' || ch === '[';
}

/**
 * Runs the state machine over `line` without applying the end-of-line rules.
 * `onToken` receives the 0-based index of every delimiter seen in code state.
 */
function advance(line: string, state: LexState, onToken?: (ch: DelimiterChar, index: number) => void): LexState {
    let i = 0;
    const n = line.length;

    while (i < n) {
        const ch = line[i];
        const next = i + 1 < n ? line[i + 1] : '';

        switch (state.kind) {
            case 'line-comment':
                return state;
            case 'block-comment':
                if (ch === '*' && next === '/') {
                    state = CODE_STATE;
                    i += 2;
                } else {
                    i++;
                }
                continue;
            case 'string':
                if (ch === '\\') {
                    // The escaped character is consumed whatever it is.
                    i += 2;
                    continue;
                }
                if (ch === state.delimiter) {
                    state = CODE_STATE;
                }
                i++;
                continue;
            case 'code':
                if (ch === '/' && next === '/') {
                    return { kind: 'line-comment' };
                }
                if (ch === '/' && next === '*') {
                    state = { kind: 'block-comment' };
                    i += 2;
                    continue;
                }
                if (ch === '"' || ch === "'") {
                    state = { kind: 'string', delimiter: ch };
                    i++;
                    continue;
                }
                if (onToken && isDelimiterChar(ch)) {
                    onToken(ch, i);
                }
                i++;
                continue;
        }
    }
    return state;
}

function endOfLine(state: LexState): LexState {
    if (state.kind === 'line-comment') {
        return CODE_STATE;
    }
    // Character literals never span lines; an unterminated one is most likely a lifetime.
    // The delimiters after it on the same line are lost: `struct S<'a> {` yields no token.
    if (state.kind === 'string' && state.delimiter === "'") {
        return CODE_STATE;
    }
    return state;
}

export function scanLine(line: string, startState: LexState = CODE_STATE, lineNumber: number = 1): ScanResult {
    const tokens: Token[] = [];
    const state = advance(line, startState, (ch, index) => {
        tokens.push({ kind: delimiterKinds[ch], char: ch, line: lineNumber, column: index + 1 });
    });
    return { tokens, endState: endOfLine(state) };
}

/**
 * Streams the delimiter tokens of `text`, starting at `startOffset` in `startState`.
 * Lines are scanned one at a time with the state carried across line breaks.
 */
export function* iterateTokens(text: string, startOffset: number = 0, startState: LexState = CODE_STATE): Generator<PositionedToken> {
    let state = startState;
    let pos = startOffset;
    let lineNumber = lineOfOffset(text, startOffset);
    let columnShift = startOffset - lineStartOf(text, startOffset);

    while (pos <= text.length) {
        let lineEnd = text.indexOf('\n', pos);
        if (lineEnd === -1) lineEnd = text.length;

        const result = scanLine(text.substring(pos, lineEnd), state, lineNumber);
        for (const token of result.tokens) {
            yield {
                ...token,
                column: token.column + columnShift,
                offset: pos + token.column - 1,
            };
        }
        state = result.endState;

        if (lineEnd === text.length) break;
        pos = lineEnd + 1;
        lineNumber++;
        columnShift = 0;
    }
}

export function scanText(text: string, startOffset: number = 0, startState: LexState = CODE_STATE): PositionedToken[] {
    return [...iterateTokens(text, startOffset, startState)];
}

/**
 * Returns the lexical state in effect at each of the given offsets, in one pass over `text`.
 * The result is aligned with `offsets`.
 */
export function lexStatesAt(text: string, offsets: number[]): LexState[] {
    const order = offsets.map((offset, idx) => ({ offset, idx })).sort((a, b) => a.offset - b.offset);
    const result: LexState[] = new Array<LexState>(offsets.length).fill(CODE_STATE);

    let state: LexState = CODE_STATE;
    let lineStart = 0;
    let k = 0;

    while (k < order.length && lineStart <= text.length) {
        let lineEnd = text.indexOf('\n', lineStart);
        if (lineEnd === -1) lineEnd = text.length;
        const line = text.substring(lineStart, lineEnd);

        while (k < order.length && order[k].offset <= lineEnd) {
            const column = order[k].offset - lineStart;
            result[order[k].idx] = advance(line.substring(0, column), state);
            k++;
        }

        state = endOfLine(advance(line, state));
        if (lineEnd === text.length) break;
        lineStart = lineEnd + 1;
    }
    return result;
}
