/**
 * @file lexer.test.ts
 * Tests for line sanitizing, tokenizing and payload splitting
 */

import * as assert from 'assert';
import {
    decodeLine,
    sanitizeLine,
    splitLines,
    splitPayload,
    tokenizeLine,
    trimTrailingComment,
} from '../../shared/lexer';

suite('Lexer', () => {
    suite('sanitizeLine', () => {
        test('skips blank and whole-line comment lines', () => {
            assert.strictEqual(sanitizeLine(''), null);
            assert.strictEqual(sanitizeLine('   \t '), null);
            assert.strictEqual(sanitizeLine('; comment'), null);
            assert.strictEqual(sanitizeLine('// note'), null);
            assert.strictEqual(sanitizeLine('   /indented'), null);
        });

        test('strips surrounding whitespace and trailing comments', () => {
            assert.strictEqual(sanitizeLine('\tbeams\t'), 'beams');
            assert.strictEqual(sanitizeLine('nodes ; trailing'), 'nodes');
            assert.strictEqual(sanitizeLine('0, 1 // pair'), '0, 1');
        });

        test('verbatim lines keep trailing comments', () => {
            assert.strictEqual(sanitizeLine('Rig //v2 ; draft  ', undefined, false), 'Rig //v2 ; draft');
        });

        test('a line reduced to nothing is skipped', () => {
            assert.strictEqual(sanitizeLine(' ;'), null);
        });

        test('truncates lines over the maximum length', () => {
            assert.strictEqual(sanitizeLine('abcdef', 3), 'abc');
        });

        test('replaces invalid UTF-8 with question marks', () => {
            assert.strictEqual(sanitizeLine(new Uint8Array([0x6e, 0xff, 0x6f])), 'n?o');
        });
    });

    suite('trimTrailingComment', () => {
        test('the first semicolon starts a comment', () => {
            assert.strictEqual(trimTrailingComment('a; b; c'), 'a');
        });

        test('the last slash and the separators before it start a comment', () => {
            assert.strictEqual(trimTrailingComment('a, b // note'), 'a, b');
            assert.strictEqual(trimTrailingComment('mesh path/to/file'), 'mesh path/to');
        });

        test('lines without comment are unchanged', () => {
            assert.strictEqual(trimTrailingComment('0, 1, 2'), '0, 1, 2');
        });
    });

    suite('decodeLine', () => {
        test('decodes UTF-8 bytes', () => {
            assert.strictEqual(decodeLine(new Uint8Array([0x63, 0xc3, 0xa9])), 'cé');
        });

        test('replaces lone surrogates in strings', () => {
            assert.strictEqual(decodeLine('a\uD800b'), 'a?b');
        });
    });

    suite('tokenizeLine', () => {
        test('splits on runs of separators', () => {
            const spans = tokenizeLine('0, 1:2|3  4');
            assert.deepStrictEqual(spans, [
                { start: 0, length: 1 },
                { start: 3, length: 1 },
                { start: 5, length: 1 },
                { start: 7, length: 1 },
                { start: 10, length: 1 },
            ]);
        });

        test('stops at the maximum argument count', () => {
            assert.strictEqual(tokenizeLine('a b c d', 2).length, 2);
        });

        test('returns no spans for a separator-only line', () => {
            assert.deepStrictEqual(tokenizeLine(', : |'), []);
        });
    });

    suite('splitPayload', () => {
        test('drops empty pieces without trimming', () => {
            assert.deepStrictEqual(splitPayload('a,,b', 0), ['a', 'b']);
            assert.deepStrictEqual(splitPayload('a, b', 0), ['a', ' b']);
        });

        test('starts after the given offset', () => {
            assert.deepStrictEqual(splitPayload('forset 1,2', 6), [' 1', '2']);
        });

        test('accepts several delimiters', () => {
            assert.deepStrictEqual(splitPayload('5, 0 1', 0, ', '), ['5', '0', '1']);
        });
    });

    suite('splitLines', () => {
        test('splits text and drops carriage returns', () => {
            assert.deepStrictEqual(splitLines('a\r\nb\n'), ['a', 'b', '']);
        });

        test('splits bytes without decoding', () => {
            const lines = splitLines(new Uint8Array([0x78, 0x0d, 0x0a, 0x79]));
            assert.deepStrictEqual(lines.map(l => decodeLine(l)), ['x', 'y']);
        });
    });
});
