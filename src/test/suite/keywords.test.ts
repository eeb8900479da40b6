/**
 * @file keywords.test.ts
 * Tests for keyword identification
 */

import * as assert from 'assert';
import { identifyKeyword, Keyword } from '../../shared/keywords';
import { KEYWORD_TABLE } from '../../shared/keywordtable';

suite('Keyword Resolver', () => {
    test('matches a keyword followed by a separator or the end of line', () => {
        assert.deepStrictEqual(identifyKeyword('nodes'), { keyword: Keyword.NODES, length: 5 });
        assert.deepStrictEqual(identifyKeyword('beams:'), { keyword: Keyword.BEAMS, length: 5 });
        assert.deepStrictEqual(identifyKeyword('forset 1-4'), { keyword: Keyword.FORSET, length: 6 });
    });

    test('prefers the longest spelling', () => {
        assert.deepStrictEqual(identifyKeyword('nodes2'), { keyword: Keyword.NODES2, length: 6 });
        assert.deepStrictEqual(identifyKeyword('set_beam_defaults_scale 1, 1, 1, 1'),
            { keyword: Keyword.SET_BEAM_DEFAULTS_SCALE, length: 23 });
        assert.deepStrictEqual(identifyKeyword('end_section'), { keyword: Keyword.END_SECTION, length: 11 });
    });

    test('falls back to a case-insensitive match', () => {
        assert.deepStrictEqual(identifyKeyword('NODES'), { keyword: Keyword.NODES, length: 5 });
        assert.deepStrictEqual(identifyKeyword('tractioncontrol 1, 2'),
            { keyword: Keyword.TRACTION_CONTROL, length: 15 });
    });

    test('does not match a keyword prefix of a longer word', () => {
        assert.strictEqual(identifyKeyword('nodesx'), null);
        assert.strictEqual(identifyKeyword('endless'), null);
    });

    test('lines not starting with a letter are data lines', () => {
        assert.strictEqual(identifyKeyword('1, 2, 3'), null);
        assert.strictEqual(identifyKeyword('-1'), null);
    });

    test('every keyword has a behaviour', () => {
        for (const keyword of Object.values(Keyword)) {
            assert.ok(KEYWORD_TABLE[keyword], `No behaviour for '${keyword}'`);
        }
    });
});
