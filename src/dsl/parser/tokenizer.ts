/**
 * @file DSL Tokenizer
 *
 * Splits DSL text into tokens: brackets, string literals, numbers,
 * symbols and `@attr{…}` references. `;` starts a comment running to the
 * end of the line. Every token records its offset, line and column.
 *
 * @module dsl/parser/tokenizer
 */

import { DslError } from '../../errors/DslError.js';

export type TokenKind = 'open' | 'close' | 'open_bracket' | 'close_bracket' | 'string' | 'number' | 'symbol' | 'attr';

/**
 * @property text - Raw source slice.
 * @property value - Decoded value: unescaped string contents, the body of an
 *   attribute reference, or the raw text for everything else.
 */
export interface Token {
    kind: TokenKind;
    text: string;
    value: string;
    offset: number;
    line: number;
    column: number;
}

const ATTR_PREFIX = '@attr{' as const;
const NUMBER_PATTERN: RegExp = /^[+-]?\d+(\.\d+)?$/;
const DELIMITERS: ReadonlySet<string> = new Set(['(', ')', '[', ']', '"', ';']);

function whitespace_is(ch: string): boolean {
    return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === ',';
}

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r' };

/**
 * Tokenize DSL source.
 *
 * @throws DslError MALFORMED_DOCUMENT on an unterminated string or attribute reference.
 */
export function dsl_tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    let i: number = 0;
    let line: number = 1;
    let column: number = 1;

    const advance = (count: number): void => {
        for (let k: number = 0; k < count; k++) {
            if (source[i] === '\n') {
                line++;
                column = 1;
            } else {
                column++;
            }
            i++;
        }
    };

    while (i < source.length) {
        const ch: string = source[i];

        if (whitespace_is(ch)) {
            advance(1);
            continue;
        }

        if (ch === ';') {
            while (i < source.length && source[i] !== '\n') advance(1);
            continue;
        }

        const start: number = i;
        const startLine: number = line;
        const startColumn: number = column;

        const push = (kind: TokenKind, value: string): void => {
            tokens.push({ kind, text: source.slice(start, i), value, offset: start, line: startLine, column: startColumn });
        };

        if (ch === '(' || ch === ')' || ch === '[' || ch === ']') {
            advance(1);
            const kind: TokenKind = ch === '(' ? 'open' : ch === ')' ? 'close' : ch === '[' ? 'open_bracket' : 'close_bracket';
            push(kind, ch);
            continue;
        }

        if (ch === '"') {
            advance(1);
            let value: string = '';
            let closed: boolean = false;
            while (i < source.length) {
                const c: string = source[i];
                if (c === '\\' && i + 1 < source.length) {
                    const next: string = source[i + 1];
                    value += ESCAPES[next] ?? next;
                    advance(2);
                    continue;
                }
                advance(1);
                if (c === '"') {
                    closed = true;
                    break;
                }
                value += c;
            }
            if (!closed) {
                throw new DslError('MALFORMED_DOCUMENT', `unterminated string literal at ${startLine}:${startColumn}`, {
                    details: { line: startLine, column: startColumn },
                });
            }
            push('string', value);
            continue;
        }

        if (source.startsWith(ATTR_PREFIX, i)) {
            const end: number = source.indexOf('}', i + ATTR_PREFIX.length);
            if (end === -1) {
                throw new DslError('MALFORMED_DOCUMENT', `unterminated attribute reference at ${startLine}:${startColumn}`, {
                    details: { line: startLine, column: startColumn },
                });
            }
            const body: string = source.slice(i + ATTR_PREFIX.length, end);
            advance(end + 1 - i);
            push('attr', body);
            continue;
        }

        while (i < source.length && !whitespace_is(source[i]) && !DELIMITERS.has(source[i])) {
            advance(1);
        }
        const text: string = source.slice(start, i);
        push(NUMBER_PATTERN.test(text) ? 'number' : 'symbol', text);
    }

    return tokens;
}
