/**
 * Line-at-a-time lexer for Lua-style sources. It only knows enough to separate
 * code from comments and string literals; it is not a parser.
 */

export type LexerMode = 'code' | 'long-comment' | 'long-string';

export interface LexerState {
    mode: LexerMode;
    /** Number of `=` signs in the open long bracket */
    level: number;
}

export const INITIAL_LEXER_STATE: LexerState = { mode: 'code', level: 0 };

export interface ScannedLine {
    /**
     * The line's code with comments removed and every string literal
     * collapsed to `""`
     */
    code: string;
    /** True when anything other than whitespace, comments or long-bracket continuation remains */
    hasCode: boolean;
    endState: LexerState;
}

/** Placeholder emitted for string literals so keyword scans never see their contents */
export const STRING_PLACEHOLDER = '""';

/**
 * Level of the long bracket opening at `pos` (`[[` is 0, `[==[` is 2),
 * or -1 when there is none
 */
export function longBracketLevel(text: string, pos: number): number {
    if (text[pos] !== '[') {
        return -1;
    }
    let i = pos + 1;
    while (text[i] === '=') {
        i++;
    }
    return text[i] === '[' ? i - pos - 1 : -1;
}

/**
 * Index just past the `]=*]` close of the given level, searching from `from`,
 * or -1 when the bracket stays open past the end of the line
 */
export function findLongBracketClose(text: string, from: number, level: number): number {
    const closer = `]${'='.repeat(level)}]`;
    const idx = text.indexOf(closer, from);
    return idx === -1 ? -1 : idx + closer.length;
}

function skipQuotedString(text: string, start: number): number {
    const quote = text[start];
    let i = start + 1;
    while (i < text.length && text[i] !== quote) {
        if (text[i] === '\\') {
            i++;
        }
        i++;
    }
    // Unterminated strings run to the end of the line
    return Math.min(i + 1, text.length);
}

export function scanLine(text: string, state: LexerState): ScannedLine {
    let mode = state.mode;
    let level = state.level;
    let code = '';
    let hasCode = false;
    let i = 0;

    while (i < text.length) {
        if (mode !== 'code') {
            const close = findLongBracketClose(text, i, level);
            if (close === -1) {
                i = text.length;
                break;
            }
            mode = 'code';
            level = 0;
            code += ' ';
            i = close;
            continue;
        }

        const ch = text[i];

        if (ch === '-' && text[i + 1] === '-') {
            const commentLevel = longBracketLevel(text, i + 2);
            if (commentLevel < 0) {
                break;
            }
            mode = 'long-comment';
            level = commentLevel;
            code += ' ';
            i += 2 + commentLevel + 2;
            continue;
        }

        if (ch === '"' || ch === '\'') {
            code += STRING_PLACEHOLDER;
            hasCode = true;
            i = skipQuotedString(text, i);
            continue;
        }

        if (ch === '[') {
            const stringLevel = longBracketLevel(text, i);
            if (stringLevel >= 0) {
                mode = 'long-string';
                level = stringLevel;
                code += STRING_PLACEHOLDER;
                hasCode = true;
                i += stringLevel + 2;
                continue;
            }
        }

        if (ch.trim() !== '') {
            hasCode = true;
        }
        code += ch;
        i++;
    }

    return { code, hasCode, endState: { mode, level } };
}
