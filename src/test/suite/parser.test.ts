/**
 * @file parser.test.ts
 * Tests for line dispatch, blocks, modules and the parser lifecycle
 */

import * as assert from 'assert';
import { ConfigService } from '../../configservice';
import { ConfigKey } from '../../interfaces/configinterface';
import { normalizePath } from '../../interfaces/hostinterface';
import { DiagnosticSeverity, DiagnosticSink, ErrorCodes } from '../../shared/diagnostics';
import { BUILTIN_NODE_DEFAULTS } from '../../shared/defaults';
import { RigParser } from '../../shared/parser';
import { CabOption } from '../../shared/rigdef';
import { expectSingleDiagnostic, parseRig, TEST_FILE } from './helpers/rigtesting';

const TRIANGLE_NODES = ['nodes', '0, 0, 0, 0', '1, 1, 0, 0', '2, 0, 1, 0'];

suite('Rig Parser', () => {
    suite('Title and line numbers', () => {
        test('the first meaningful line is the title', () => {
            const result = RigParser.parse('; header\n\n   My Truck  \nglobals\n100, 20', TEST_FILE);
            assert.strictEqual(result.document.name, 'My Truck');
            assert.strictEqual(result.document.root.globals.length, 1);
            assert.deepStrictEqual(result.diagnostics, []);
            assert.strictEqual(result.success, true);
        });

        test('the title keeps comment-like text', () => {
            const result = RigParser.parse('Rig //v2 ; draft\nglobals\n100, 20 // kg', TEST_FILE);
            assert.strictEqual(result.document.name, 'Rig //v2 ; draft');
            assert.strictEqual(result.document.root.globals[0].cargoMass, 20);
            assert.deepStrictEqual(result.diagnostics, []);
        });

        test('blank and comment lines advance the line counter', () => {
            const result = parseRig(['', '; nothing here', 'beams', '0']);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.WARNING,
                code: ErrorCodes.ARGUMENT_COUNT,
                message: 'Not enough arguments (got 1, 2 needed), skipping line',
                line: 5,
                keyword: 'beams',
            });
            assert.strictEqual(result.success, true);
        });

        test('CRLF input is accepted', () => {
            const result = RigParser.parse('Crlf rig\r\nglobals\r\n50, 5, paint\r\n', TEST_FILE);
            assert.strictEqual(result.document.name, 'Crlf rig');
            assert.strictEqual(result.document.root.globals[0].materialName, 'paint');
        });
    });

    suite('Dispatch', () => {
        test('flags are set without closing the open block', () => {
            const result = parseRig(['globals', 'rescuer', '100, 20', 'rollon', 'hideInChooser']);
            const { flags, root } = result.document;
            assert.strictEqual(flags.rescuer, true);
            assert.strictEqual(flags.rollon, true);
            assert.strictEqual(flags.hideInChooser, true);
            assert.strictEqual(flags.forwardCommands, false);
            assert.strictEqual(root.globals.length, 1);
            assert.strictEqual(root.globals[0].dryMass, 100);
        });

        test('keywords match case-insensitively', () => {
            const result = parseRig(['GLOBALS', '7, 1']);
            assert.strictEqual(result.document.root.globals[0].dryMass, 7);
        });

        test('obsolete keywords are skipped silently', () => {
            const result = parseRig(['envmap', 'set_shadows 1', 'rigidifiers', 'globals', '1, 1']);
            assert.deepStrictEqual(result.diagnostics, []);
            assert.strictEqual(result.document.root.globals.length, 1);
        });

        test('data lines outside any block are dropped', () => {
            const result = parseRig(['0, 1, 2', 'stray words']);
            assert.deepStrictEqual(result.diagnostics, []);
        });

        test('maxArgs limits the argument count', () => {
            const result = parseRig(['globals', '1, 2, paint'], { maxArgs: 2 });
            assert.strictEqual(result.document.root.globals[0].materialName, '');
        });
    });

    suite('Modules', () => {
        test('section switches to a named module and end_section returns to root', () => {
            const result = parseRig(['section 1 trailer', 'globals', '10, 5', 'end_section', 'globals', '20, 5']);
            const trailer = result.document.userModules.get('trailer');
            assert.ok(trailer);
            assert.strictEqual(trailer.globals[0].dryMass, 10);
            assert.strictEqual(result.document.root.globals[0].dryMass, 20);
            assert.deepStrictEqual(result.document.allModules().map(m => m.name), ['_Root_', 'trailer']);
        });

        test('end_section in the root module is an error', () => {
            const result = parseRig(['end_section']);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.ERROR,
                code: ErrorCodes.STRUCTURAL,
                message: "Misplaced keyword 'end_section' (already in root module), ignoring...",
                line: 2,
                keyword: 'end_section',
            });
            assert.strictEqual(result.success, false);
        });

        test('re-entering the active module is an error', () => {
            const result = parseRig(['section 1 trailer', 'section 1 trailer']);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.ERROR,
                code: ErrorCodes.STRUCTURAL,
                message: 'Attempt to re-enter current module, ignoring...',
                line: 3,
                keyword: 'section',
            });
        });

        test('a module declared twice collects into one', () => {
            const result = parseRig([
                'section 1 extras', 'globals', '1, 1', 'end_section',
                'section 1 extras', 'globals', '2, 2',
            ]);
            const extras = result.document.userModules.get('extras');
            assert.strictEqual(result.document.userModules.size, 1);
            assert.deepStrictEqual(extras?.globals.map(g => g.dryMass), [1, 2]);
        });

        test('the reserved root name selects the root module', () => {
            const result = parseRig(['section 1 trailer', 'section 1 _Root_', 'globals', '3, 3']);
            assert.strictEqual(result.document.root.globals[0].dryMass, 3);
            assert.strictEqual(result.document.userModules.get('trailer')?.globals.length, 0);
        });

        test('section needs a version and a name', () => {
            const result = parseRig(['section trailer']);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.WARNING,
                code: ErrorCodes.ARGUMENT_COUNT,
                message: 'Not enough arguments (got 2, 3 needed), skipping line',
                line: 2,
                keyword: 'section',
            });
            assert.strictEqual(result.document.userModules.size, 0);
        });
    });

    suite('Raw blocks', () => {
        test('comment blocks swallow keyword lines', () => {
            const result = parseRig(['comment', 'nodes are ignored here', 'end_comment', 'globals', '5, 1']);
            assert.strictEqual(result.document.root.nodes.length, 0);
            assert.strictEqual(result.document.root.globals.length, 1);
            assert.deepStrictEqual(result.diagnostics, []);
        });

        test('description lines are kept verbatim', () => {
            const result = parseRig(['description', 'nodes are strong', 'Hauls gravel: 20t', 'end_description']);
            assert.deepStrictEqual(result.document.root.description, ['nodes are strong', 'Hauls gravel: 20t']);
        });

        test('description lines keep slashes and semicolons', () => {
            const result = parseRig(['description', 'Axle 1/2 // rear ; spare', 'end_description ; done', 'globals', '5, 1 ; kg']);
            assert.deepStrictEqual(result.document.root.description, ['Axle 1/2 // rear ; spare']);
            assert.strictEqual(result.document.root.globals[0].cargoMass, 1);
            assert.deepStrictEqual(result.diagnostics, []);
        });

        test('end also closes a description', () => {
            const result = parseRig(['description', 'first', 'end', 'globals', '9, 9']);
            assert.deepStrictEqual(result.document.root.description, ['first']);
            assert.strictEqual(result.document.root.globals[0].dryMass, 9);
        });
    });

    suite('Submeshes', () => {
        test('texcoords and cab stay attached to the staged submesh', () => {
            const result = parseRig([
                ...TRIANGLE_NODES,
                'submesh', 'texcoords', '0, 0, 0', '1, 1, 0', 'cab', '0, 1, 2, c', 'backmesh',
                'submesh', 'cab', '0, 2, 1',
                'end',
            ]);
            const submeshes = result.document.root.submeshes;
            assert.strictEqual(submeshes.length, 2);
            assert.strictEqual(submeshes[0].texcoords.length, 2);
            assert.strictEqual(submeshes[0].cabTriangles[0].options, CabOption.Contact);
            assert.strictEqual(submeshes[0].backmesh, true);
            assert.strictEqual(submeshes[1].texcoords.length, 0);
            assert.strictEqual(submeshes[1].cabTriangles[0].options, 0);
            assert.strictEqual(submeshes[1].backmesh, false);
            assert.deepStrictEqual(result.diagnostics, []);
        });

        test('another section commits the staged submesh', () => {
            const result = parseRig(['submesh', 'globals', '1, 1']);
            assert.strictEqual(result.document.root.submeshes.length, 1);
        });

        test('finalize commits a submesh left open', () => {
            const result = parseRig(['submesh']);
            assert.strictEqual(result.document.root.submeshes.length, 1);
        });

        test('texcoords without a submesh are rejected', () => {
            const result = parseRig(['texcoords', '0, 0, 0']);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.ERROR,
                code: ErrorCodes.STRUCTURAL,
                message: "'texcoords' must come after 'submesh', skipping line",
                line: 3,
                keyword: 'texcoords',
            });
        });

        test('backmesh without a submesh is rejected', () => {
            const result = parseRig(['backmesh']);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.ERROR,
                code: ErrorCodes.STRUCTURAL,
                message: "must come after 'submesh'",
                line: 2,
                keyword: 'backmesh',
            });
        });
    });

    suite('Camera rails', () => {
        test('rail nodes are collected until the block closes', () => {
            const result = parseRig([...TRIANGLE_NODES, 'camerarail', '0', '1', 'end']);
            const rails = result.document.root.cameraRails;
            assert.strictEqual(rails.length, 1);
            assert.deepStrictEqual(rails[0].nodes.map(n => n.text), ['0', '1']);
            assert.strictEqual(rails[0].nodes[1].numericValid, true);
        });

        test('an empty rail is dropped with a warning', () => {
            const result = parseRig(['camerarail', 'end']);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.WARNING,
                code: ErrorCodes.STRUCTURAL,
                message: "Empty section 'camerarail', ignoring...",
                line: 3,
                keyword: 'end',
            });
            assert.strictEqual(result.document.root.cameraRails.length, 0);
        });

        test('a dropped empty rail is warned about once', () => {
            const result = parseRig(['camerarail', 'end', 'nodes', '0, 0, 0, 0', 'end']);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.WARNING,
                code: ErrorCodes.STRUCTURAL,
                message: "Empty section 'camerarail', ignoring...",
                line: 3,
            });
            assert.strictEqual(result.document.root.cameraRails.length, 0);
            assert.strictEqual(result.document.root.nodes.length, 1);
        });
    });

    suite('Lifecycle', () => {
        test('finalize returns the same result when called again', () => {
            const parser = new RigParser(normalizePath(TEST_FILE));
            parser.processText('Title\nglobals\n1, 1');
            const first = parser.finalize();
            assert.strictEqual(parser.finalize(), first);
            assert.strictEqual(first.document, parser.document);
        });

        test('lines after finalize are rejected', () => {
            const parser = new RigParser(normalizePath(TEST_FILE));
            parser.processText('Title\nglobals\n1, 1');
            parser.finalize();
            parser.processLine('globals');

            const errors = parser.getDiagnostics().getAll().filter(d => d.severity === DiagnosticSeverity.ERROR);
            assert.strictEqual(errors.length, 1);
            assert.strictEqual(errors[0].message, 'Line received after the parse was finalized, ignoring...');
            assert.strictEqual(errors[0].line, 4);
            assert.strictEqual(errors[0].keyword, 'none');
        });

        test('prepare starts over with an empty document', () => {
            const parser = new RigParser(normalizePath(TEST_FILE));
            parser.processText('First\nend_section');
            parser.finalize();
            parser.prepare();
            parser.processText('Second');
            const result = parser.finalize();

            assert.strictEqual(result.document.name, 'Second');
            assert.deepStrictEqual(result.diagnostics, []);
        });

        test('prepare restores the built-in defaults', () => {
            const parser = new RigParser(normalizePath(TEST_FILE));
            parser.processText('First\nset_node_defaults -1, 2, -1, 3, l');
            parser.finalize();
            parser.prepare();
            parser.processText('Second\nnodes\n0, 0, 0, 0');
            const result = parser.finalize();

            assert.strictEqual(result.document.root.nodes[0].nodeDefaults, BUILTIN_NODE_DEFAULTS);
            assert.deepStrictEqual(result.diagnostics, []);
        });

        test('lines can be read from an iterable', async () => {
            const result = await RigParser.parseLines(['Title', 'globals', '4, 2'], TEST_FILE);
            assert.strictEqual(result.document.root.globals[0].dryMass, 4);
        });

        test('a failing read stops the parse and is reported', async () => {
            async function* source(): AsyncGenerator<string> {
                yield 'Title';
                yield 'globals';
                throw new Error('disk gone');
            }
            const result = await RigParser.parseLines(source(), TEST_FILE);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.ERROR,
                code: ErrorCodes.INPUT_READ,
                message: 'Could not read rig file: disk gone',
                line: 3,
                keyword: 'none',
            });
            assert.strictEqual(result.document.name, 'Title');
            assert.strictEqual(result.success, false);
        });
    });

    suite('Diagnostics sink', () => {
        test('receives formatted diagnostic text', () => {
            const received: [DiagnosticSeverity, string][] = [];
            const sink: DiagnosticSink = { report: (severity, text) => { received.push([severity, text]); } };
            parseRig(['beams', '0'], { sink });

            assert.deepStrictEqual(received, [[
                DiagnosticSeverity.WARNING,
                'test.truck:3 (beams): Not enough arguments (got 1, 2 needed), skipping line',
            ]]);
        });
    });

    suite('Configuration', () => {
        const lines = ['nodes', '0, 0, 0, 0', '1, 1, 0, 0', 'beams', '0, 1'];

        test('sequential import can be turned off through configuration', () => {
            const config = new ConfigService({ [ConfigKey.ParserSequentialImport]: false });
            const result = parseRig(lines, { config });
            const ref = result.document.root.beams[0].nodes[0];
            assert.strictEqual(ref.namedValid, true);
            assert.strictEqual(ref.numericValid, false);
        });

        test('explicit options take precedence over configuration', () => {
            const config = new ConfigService({ [ConfigKey.ParserSequentialImport]: false });
            const result = parseRig(lines, { config, sequentialImport: true });
            const ref = result.document.root.beams[0].nodes[0];
            assert.strictEqual(ref.numericValid, true);
            assert.strictEqual(ref.namedValid, false);
        });

        test('maximum line length comes from configuration', () => {
            const config = new ConfigService({ [ConfigKey.ParserMaxLineLength]: 8 });
            const result = parseRig(['globals', '1, 2, paintwork'], { config });
            assert.strictEqual(result.document.root.globals[0].materialName, 'pa');
        });
    });
});
