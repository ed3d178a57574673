import { BlockType, LineKind } from '../models/CoverageModels';
import { INITIAL_LEXER_STATE, LexerState, scanLine } from './LuaLexer';

/**
 * A block found by static analysis, before it is attached to a session
 */
export interface BlockDefinition {
    key: string;
    startLine: number;
    endLine: number;
    type: BlockType;
    parentKey: string | null;
}

export interface FunctionDefinition {
    /** Declared or assigned name; empty when the function is anonymous */
    name: string;
    definedLine: number;
    endLine: number;
}

export interface SourceAnalysis {
    /** kinds[0] describes line 1 */
    kinds: LineKind[];
    blocks: BlockDefinition[];
    functions: FunctionDefinition[];
}

interface OpenBlock {
    type: BlockType;
    startLine: number;
    parent: OpenBlock | null;
    fn: FunctionDefinition | null;
    closesWith: 'end' | 'until';
    key?: string;
}

interface ClosedBlock {
    block: OpenBlock;
    endLine: number;
}

// Keywords never follow `.` or a word character, which skips fields and hex digits
const WORD_PATTERN = /(?<![\w.])[A-Za-z_]\w*/g;
const BLOCK_END_PATTERN = /^(?:end|else|[\s)\]},;])+$/;
const DECLARED_NAME_PATTERN = /^\s*([A-Za-z_][\w.:]*)\s*\(/;
const ASSIGNED_NAME_PATTERN = /([A-Za-z_][\w.]*)\s*=\s*$/;

export function splitLines(source: string): string[] {
    if (source.length === 0) {
        return [];
    }
    const lines = source.split(/\r\n|\r|\n/);
    // A trailing newline does not start another line
    if (lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

function functionName(code: string, keywordIndex: number): string {
    const declared = DECLARED_NAME_PATTERN.exec(code.slice(keywordIndex + 'function'.length));
    if (declared) {
        return declared[1];
    }
    const assigned = ASSIGNED_NAME_PATTERN.exec(code.slice(0, keywordIndex));
    return assigned ? assigned[1] : '';
}

/**
 * Single-pass static analysis: line kinds plus block and function structure.
 * Malformed input never throws; unbalanced blocks close at end of file and an
 * unterminated long comment swallows the remaining lines.
 */
export function analyze(source: string): SourceAnalysis {
    const lines = splitLines(source);
    const kinds: LineKind[] = [];
    const functions: FunctionDefinition[] = [];
    const closed: ClosedBlock[] = [];
    const stack: OpenBlock[] = [];

    let state: LexerState = INITIAL_LEXER_STATE;
    let pendingDo = false;

    const open = (type: BlockType, lineNumber: number, closesWith: 'end' | 'until', fn: FunctionDefinition | null = null) => {
        stack.push({
            type,
            startLine: lineNumber,
            parent: stack.length > 0 ? stack[stack.length - 1] : null,
            fn,
            closesWith,
        });
    };

    const close = (lineNumber: number, closer: 'end' | 'until') => {
        // Pop to the nearest block this keyword can close; stray closers are ignored
        let idx = stack.length - 1;
        while (idx >= 0 && stack[idx].closesWith !== closer) {
            idx--;
        }
        if (idx < 0) {
            return false;
        }
        const popped = stack.splice(idx);
        for (const block of popped.reverse()) {
            closed.push({ block, endLine: lineNumber });
            if (block.fn) {
                block.fn.endLine = lineNumber;
            }
        }
        return true;
    };

    lines.forEach((text, index) => {
        const lineNumber = index + 1;

        if (lineNumber === 1 && text.startsWith('#') && state.mode === 'code') {
            kinds.push(LineKind.NonExecutable);
            return;
        }

        const scanned = scanLine(text, state);
        state = scanned.endState;

        if (!scanned.hasCode) {
            kinds.push(LineKind.NonExecutable);
            return;
        }

        let opened = 0;
        let closedCount = 0;

        for (const match of scanned.code.matchAll(WORD_PATTERN)) {
            const word = match[0];
            const position = match.index ?? 0;
            switch (word) {
                case 'function': {
                    const fn: FunctionDefinition = {
                        name: functionName(scanned.code, position),
                        definedLine: lineNumber,
                        endLine: lineNumber,
                    };
                    functions.push(fn);
                    open('function-body', lineNumber, 'end', fn);
                    opened++;
                    break;
                }
                case 'if':
                    open('branch', lineNumber, 'end');
                    opened++;
                    break;
                case 'while':
                case 'for':
                    open('loop', lineNumber, 'end');
                    pendingDo = true;
                    opened++;
                    break;
                case 'do':
                    if (pendingDo) {
                        pendingDo = false;
                    } else {
                        open('other', lineNumber, 'end');
                        opened++;
                    }
                    break;
                case 'repeat':
                    open('loop', lineNumber, 'until');
                    opened++;
                    break;
                case 'end':
                    if (close(lineNumber, 'end')) {
                        closedCount++;
                    }
                    break;
                case 'until':
                    if (close(lineNumber, 'until')) {
                        closedCount++;
                    }
                    break;
                default:
                    break;
            }
        }

        const code = scanned.code.trim();
        if (BLOCK_END_PATTERN.test(code)) {
            kinds.push(LineKind.BlockEnd);
        } else if (opened > closedCount) {
            kinds.push(LineKind.BlockStart);
        } else {
            kinds.push(LineKind.Executable);
        }
    });

    const lastLine = Math.max(lines.length, 1);
    while (stack.length > 0) {
        const block = stack.pop();
        if (block) {
            closed.push({ block, endLine: lastLine });
            if (block.fn) {
                block.fn.endLine = lastLine;
            }
        }
    }

    return { kinds, blocks: toBlockDefinitions(closed), functions };
}

function toBlockDefinitions(closed: ClosedBlock[]): BlockDefinition[] {
    const ordered = [...closed].sort((a, b) =>
        a.block.startLine - b.block.startLine || b.endLine - a.endLine
    );

    const seen = new Map<string, number>();
    for (const { block, endLine } of ordered) {
        const base = `${block.startLine}-${endLine}:${block.type}`;
        const count = (seen.get(base) ?? 0) + 1;
        seen.set(base, count);
        block.key = count === 1 ? base : `${base}#${count}`;
    }

    return ordered.map(({ block, endLine }) => ({
        key: block.key ?? '',
        startLine: block.startLine,
        endLine,
        type: block.type,
        parentKey: block.parent?.key ?? null,
    }));
}

/**
 * Classify every line of `source`; `result[0]` is line 1
 */
export function classify(source: string): LineKind[] {
    return analyze(source).kinds;
}

/**
 * Lines that count towards executable totals
 */
export function isExecutableKind(kind: LineKind): boolean {
    return kind === LineKind.Executable || kind === LineKind.BlockStart;
}
