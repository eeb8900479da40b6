/**
 * @file lexer.ts
 * Line sanitizing and argument tokenizing for rig definition files
 *
 * Rig files are processed one line at a time. The sanitizer turns raw input
 * into a trimmed, comment-free line (or reports it as skippable); the tokenizer
 * slices that line into argument spans without copying.
 */

//#region Limits

/** Default maximum accepted line length; longer lines are truncated. */
export const DEFAULT_MAX_LINE_LENGTH = 2000;
/** Default maximum number of argument spans per line. */
export const DEFAULT_MAX_ARGS = 50;

//#endregion

//#region Line Sanitizer

const UTF8_DECODER = new TextDecoder('utf-8', { fatal: false });
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Decode one raw line. Invalid UTF-8 sequences (and lone surrogates in
 * already-decoded text) are replaced by '?'.
 */
export function decodeLine(raw: string | Uint8Array): string {
    if (typeof raw === 'string') {
        return raw.replace(LONE_SURROGATE, '?');
    }
    return UTF8_DECODER.decode(raw).replace(/\uFFFD/g, '?');
}

/**
 * Cut a trailing comment off a line.
 *
 * The first ';' always starts a comment. Without one, the last '/' and any
 * run of '/', space or tab directly before it start a comment. Text that
 * merely contains a slash (paths, URLs) is truncated as well.
 */
export function trimTrailingComment(line: string): string {
    const semicolon = line.indexOf(';');
    if (semicolon !== -1) {
        return line.substring(0, semicolon);
    }

    let commentStart = line.lastIndexOf('/');
    if (commentStart === -1) {
        return line;
    }
    while (commentStart > 0) {
        const c = line.charAt(commentStart - 1);
        if (c !== '/' && c !== ' ' && c !== '\t') {
            break;
        }
        --commentStart;
    }
    return line.substring(0, commentStart);
}

/**
 * Produce the processable form of a raw line, or null when the line carries
 * nothing (blank, or a whole-line comment starting with ';' or '/').
 * Lines taken verbatim (the title, comment and description text) pass
 * `trimComments = false`.
 */
export function sanitizeLine(
    raw: string | Uint8Array,
    maxLength: number = DEFAULT_MAX_LINE_LENGTH,
    trimComments: boolean = true
): string | null {
    let line = decodeLine(raw).replace(/^[ \t]+/, '');
    if (line.length === 0 || line.startsWith(';') || line.startsWith('/')) {
        return null;
    }
    if (line.length > maxLength) {
        line = line.substring(0, maxLength);
    }
    if (trimComments) {
        line = trimTrailingComment(line);
    }
    line = line.replace(/[\s]+$/, '');
    return line.length > 0 ? line : null;
}

//#endregion

//#region Tokenizer

/**
 * A view into the current line buffer
 */
export interface ArgSpan {
    start: number;
    length: number;
}

const ARG_SEPARATORS = ' \t:|,';

function isSeparator(c: string): boolean {
    return ARG_SEPARATORS.includes(c);
}

/**
 * Split a line into argument spans. Any run of space, tab, ':', '|' or ','
 * separates arguments. At most `maxArgs` spans are produced.
 */
export function tokenizeLine(line: string, maxArgs: number = DEFAULT_MAX_ARGS): ArgSpan[] {
    const spans: ArgSpan[] = [];
    let pos = 0;
    while (pos < line.length && spans.length < maxArgs) {
        while (pos < line.length && isSeparator(line.charAt(pos))) {
            ++pos;
        }
        if (pos >= line.length) {
            break;
        }
        const start = pos;
        while (pos < line.length && !isSeparator(line.charAt(pos))) {
            ++pos;
        }
        spans.push({ start, length: pos - start });
    }
    return spans;
}

/**
 * Split the payload of a line (text after `offset`) on any of the given
 * delimiter characters. Empty pieces are dropped, pieces are not trimmed.
 */
export function splitPayload(line: string, offset: number, delimiters: string = ','): string[] {
    const pieces: string[] = [];
    let current = '';
    for (let i = offset; i < line.length; ++i) {
        const c = line.charAt(i);
        if (delimiters.includes(c)) {
            if (current.length > 0) {
                pieces.push(current);
            }
            current = '';
        } else {
            current += c;
        }
    }
    if (current.length > 0) {
        pieces.push(current);
    }
    return pieces;
}

/**
 * Split raw input into lines. Byte input is split on '\n' without decoding
 * so each line can be sanitized on its own; a trailing '\r' is dropped.
 */
export function splitLines(source: string | Uint8Array): Array<string | Uint8Array> {
    if (typeof source === 'string') {
        return source.split('\n').map(l => l.endsWith('\r') ? l.slice(0, -1) : l);
    }
    const lines: Uint8Array[] = [];
    let start = 0;
    for (let i = 0; i <= source.length; ++i) {
        if (i === source.length || source[i] === 0x0a) {
            let end = i;
            if (end > start && source[end - 1] === 0x0d) {
                --end;
            }
            lines.push(source.subarray(start, end));
            start = i + 1;
        }
    }
    return lines;
}

//#endregion
