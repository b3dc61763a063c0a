/**
 * @file DSL Reader
 *
 * Recursive-descent reader turning tokens into a tree of forms. The
 * reader is lenient about bracket balance: stray or missing closers are
 * recorded as issues and the tree is still produced, so callers can
 * decide whether structure matters to them.
 *
 * @module dsl/parser/reader
 */

import { dsl_tokenize, type Token, type TokenKind } from './tokenizer.js';

export interface Position {
    offset: number;
    line: number;
    column: number;
}

export interface AtomNode extends Position {
    kind: 'string' | 'number' | 'symbol' | 'attr';
    value: string;
}

/**
 * Parenthesised form. `head` is the leading symbol, or null when the
 * form is empty or starts with a non-symbol.
 */
export interface FormNode extends Position {
    kind: 'form';
    head: string | null;
    items: DslNode[];
}

export interface ListNode extends Position {
    kind: 'list';
    items: DslNode[];
}

export type DslNode = AtomNode | FormNode | ListNode;

export interface ReaderIssue extends Position {
    message: string;
}

export interface DslDocument {
    nodes: DslNode[];
    issues: ReaderIssue[];
}

type CloseKind = Extract<TokenKind, 'close' | 'close_bracket'>;

function position_of(token: Token): Position {
    return { offset: token.offset, line: token.line, column: token.column };
}

/**
 * Read DSL source into a document tree.
 *
 * @throws DslError MALFORMED_DOCUMENT from the tokenizer.
 */
export function dsl_read(source: string): DslDocument {
    const tokens: Token[] = dsl_tokenize(source);
    const issues: ReaderIssue[] = [];
    let index: number = 0;

    const issue_add = (token: Token, message: string): void => {
        issues.push({ ...position_of(token), message });
    };

    const sequence_read = (opener: Token, closer: CloseKind): DslNode[] => {
        const items: DslNode[] = [];
        while (index < tokens.length) {
            const token: Token = tokens[index];
            if (token.kind === 'close' || token.kind === 'close_bracket') {
                index++;
                if (token.kind !== closer) {
                    issue_add(token, `mismatched '${token.text}' closing '${opener.text}' opened at ${opener.line}:${opener.column}`);
                }
                return items;
            }
            items.push(node_read());
        }
        issue_add(opener, `unclosed '${opener.text}' opened at ${opener.line}:${opener.column}`);
        return items;
    };

    const node_read = (): DslNode => {
        const token: Token = tokens[index++];
        switch (token.kind) {
            case 'open': {
                const items: DslNode[] = sequence_read(token, 'close');
                const first: DslNode | undefined = items[0];
                const head: string | null = first !== undefined && first.kind === 'symbol' ? first.value : null;
                return { kind: 'form', head, items, ...position_of(token) };
            }
            case 'open_bracket':
                return { kind: 'list', items: sequence_read(token, 'close_bracket'), ...position_of(token) };
            case 'string':
            case 'number':
            case 'symbol':
            case 'attr':
                return { kind: token.kind, value: token.value, ...position_of(token) };
            case 'close':
            case 'close_bracket':
                // Unreachable through sequence_read; top level filters closers first.
                return { kind: 'symbol', value: token.text, ...position_of(token) };
        }
    };

    const nodes: DslNode[] = [];
    while (index < tokens.length) {
        const token: Token = tokens[index];
        if (token.kind === 'close' || token.kind === 'close_bracket') {
            issue_add(token, `unexpected '${token.text}'`);
            index++;
            continue;
        }
        nodes.push(node_read());
    }

    return { nodes, issues };
}

// ─── Traversal ─────────────────────────────────────────────────

export interface FormVisit {
    form: FormNode;
    depth: number;
    parent: FormNode | null;
}

/**
 * Depth-first, document-order list of every form in the document.
 */
export function forms_collect(document: DslDocument): FormVisit[] {
    const visits: FormVisit[] = [];
    const walk = (nodes: readonly DslNode[], depth: number, parent: FormNode | null): void => {
        for (const node of nodes) {
            if (node.kind === 'form') {
                visits.push({ form: node, depth, parent });
                walk(node.items, depth + 1, node);
            } else if (node.kind === 'list') {
                walk(node.items, depth + 1, parent);
            }
        }
    };
    walk(document.nodes, 0, null);
    return visits;
}

/**
 * Arguments of a form (everything after the head).
 */
export function form_args(form: FormNode): DslNode[] {
    return form.head === null ? form.items : form.items.slice(1);
}

/**
 * First string value carried directly by a form, if any.
 */
export function form_firstString(form: FormNode): string | undefined {
    const atom: DslNode | undefined = form_args(form).find((n: DslNode): boolean => n.kind === 'string');
    return atom !== undefined && atom.kind === 'string' ? atom.value : undefined;
}
