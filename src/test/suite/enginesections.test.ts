/**
 * @file enginesections.test.ts
 * Tests for engine, turbo, torque curve and aerodynamic sections
 */

import * as assert from 'assert';
import { DiagnosticSeverity, ErrorCodes } from '../../shared/diagnostics';
import { RigParseResult } from '../../shared/parser';
import { EngineType } from '../../shared/rigdef';
import { expectSingleDiagnostic, parseRig } from './helpers/rigtesting';

function parse(lines: string[]): RigParseResult {
    return parseRig(lines, { sequentialImport: false });
}

const WING_BASE = 'a, b, c, d, e, f, g, h, 0, 1, 0, 1, 0, 1, 0, 1';

suite('Engine Sections', () => {
    test('forward gears stop at the first negative ratio', () => {
        const result = parse(['engine', '2000, 3000, 500, 4, 3.5, 1, 3, 2, 1, -1, 9']);
        const engine = result.document.root.engines[0];
        assert.strictEqual(engine.shiftDownRpm, 2000);
        assert.strictEqual(engine.reverseGearRatio, 3.5);
        assert.deepStrictEqual(engine.gearRatios, [3, 2, 1]);
        assert.deepStrictEqual(result.diagnostics, []);
    });

    test('an engine without forward gears is dropped', () => {
        const result = parse(['engine', '2000, 3000, 500, 4, 3.5, 1']);
        assert.strictEqual(result.document.root.engines.length, 0);
        expectSingleDiagnostic(result.diagnostics, {
            severity: DiagnosticSeverity.ERROR,
            code: ErrorCodes.STRUCTURAL,
            message: 'no forward gear',
            line: 3,
            keyword: 'engine',
        });
    });

    test('engoption defaults and an invalid engine type', () => {
        const result = parse(['engoption', '5, x']);
        assert.deepStrictEqual(result.document.root.engoptions, [{
            inertia: 5,
            type: EngineType.Truck,
            clutchForce: -1,
            shiftTime: -1,
            clutchTime: -1,
            postShiftTime: -1,
            stallRpm: -1,
            idleRpm: -1,
            maxIdleMixture: -1,
            minIdleMixture: -1,
            brakingTorque: -1,
        }]);
        expectSingleDiagnostic(result.diagnostics, {
            severity: DiagnosticSeverity.WARNING,
            code: ErrorCodes.INVALID_VALUE,
            message: "Invalid engine type 'x', falling back to 't' (truck)",
        });
    });

    test('engoption reads the fields that are present', () => {
        const result = parse(['engoption', '5, c, 2000, 0.5']);
        const engoption = result.document.root.engoptions[0];
        assert.strictEqual(engoption.type, EngineType.Car);
        assert.strictEqual(engoption.clutchForce, 2000);
        assert.strictEqual(engoption.shiftTime, 0.5);
        assert.strictEqual(engoption.clutchTime, -1);
    });

    test('engturbo clamps the turbo count', () => {
        const result = parse(['engturbo', '2, 1, 6, 1, 2, 3']);
        assert.deepStrictEqual(result.document.root.engturbos, [
            { version: 2, tinertiaFactor: 1, nturbos: 4, params: [1, 2, 3] },
        ]);
        expectSingleDiagnostic(result.diagnostics, {
            severity: DiagnosticSeverity.WARNING,
            code: ErrorCodes.INVALID_VALUE,
            message: 'You cannot have more than 4 turbos. Fallback: using 4 instead.',
        });
    });

    test('engturbo keeps at most eleven parameters', () => {
        const result = parse(['engturbo', '2, 1, 1, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13']);
        assert.deepStrictEqual(result.document.root.engturbos[0].params, [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
    });

    test('torque curve names and samples', () => {
        const result = parse(['torquecurve', 'diesel', '1000, 80', '2000, 100']);
        assert.deepStrictEqual(result.document.root.torqueCurve, {
            predefinedFuncName: 'diesel',
            samples: [{ power: 1000, torquePercent: 80 }, { power: 2000, torquePercent: 100 }],
        });
        assert.deepStrictEqual(result.diagnostics, []);
    });

    test('torque curve lines with more than two items are skipped', () => {
        const result = parse(['torquecurve', '1000, 80, 5']);
        assert.deepStrictEqual(result.document.root.torqueCurve, { predefinedFuncName: '', samples: [] });
        expectSingleDiagnostic(result.diagnostics, {
            severity: DiagnosticSeverity.ERROR,
            code: ErrorCodes.ARGUMENT_COUNT,
            message: 'too many arguments, skipping',
        });
    });
});

suite('Aero Sections', () => {
    test('wings get defaults for the optional columns', () => {
        const result = parse(['wings', WING_BASE]);
        const wing = result.document.root.wings[0];
        assert.deepStrictEqual(wing.nodes.map(n => n.text), ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h']);
        assert.deepStrictEqual(wing.texCoords, [0, 1, 0, 1, 0, 1, 0, 1]);
        assert.strictEqual(wing.controlSurface, 'n');
        assert.strictEqual(wing.chordPoint, -1);
        assert.strictEqual(wing.minDeflection, -1);
        assert.strictEqual(wing.maxDeflection, -1);
        assert.strictEqual(wing.airfoil, '');
        assert.strictEqual(wing.efficacyCoef, 1);
    });

    test('wings read the control surface columns', () => {
        const result = parse(['wings', `${WING_BASE}, a, 0.25, -30, 30, naca.afl, 0.8`]);
        const wing = result.document.root.wings[0];
        assert.strictEqual(wing.controlSurface, 'a');
        assert.strictEqual(wing.chordPoint, 0.25);
        assert.strictEqual(wing.minDeflection, -30);
        assert.strictEqual(wing.maxDeflection, 30);
        assert.strictEqual(wing.airfoil, 'naca.afl');
        assert.strictEqual(wing.efficacyCoef, 0.8);
        assert.deepStrictEqual(result.diagnostics, []);
    });

    test('an unknown control surface falls back to none', () => {
        const result = parse(['wings', `${WING_BASE}, x`]);
        assert.strictEqual(result.document.root.wings[0].controlSurface, 'n');
        expectSingleDiagnostic(result.diagnostics, {
            severity: DiagnosticSeverity.ERROR,
            code: ErrorCodes.INVALID_VALUE,
            message: "Invalid argument ~17 'control surface' (value: x), allowed are: <nabferSTcdghUVij>, ignoring...",
        });
    });

    test('fusedrag with autocalc or an explicit width', () => {
        const result = parse(['fusedrag', 'a, b, autocalc, 1.5', 'a, b, 2.5, wide.afl']);
        const [auto, sized] = result.document.root.fusedrag;
        assert.strictEqual(auto.autocalc, true);
        assert.strictEqual(auto.areaCoefficient, 1.5);
        assert.strictEqual(auto.airfoilName, 'NACA0009.afl');
        assert.strictEqual(sized.autocalc, false);
        assert.strictEqual(sized.approximateWidth, 2.5);
        assert.strictEqual(sized.areaCoefficient, 1);
        assert.strictEqual(sized.airfoilName, 'wide.afl');
    });

    test('turboprops2 read a couple node', () => {
        const result = parse([
            'turboprops', 'a, b, c, d, e, g, 500, prop.afl',
            'turboprops2', 'a, b, c, d, -1, -1, e, 600, prop.afl',
        ]);
        const [v1, v2] = result.document.root.turboprops;
        assert.strictEqual(v1.formatVersion, 1);
        assert.strictEqual(v1.coupleNode.isValidAnyState(), false);
        assert.strictEqual(v1.turbinePowerKw, 500);
        assert.strictEqual(v2.formatVersion, 2);
        assert.strictEqual(v2.bladeTipNodes[2].isValidAnyState(), false);
        assert.strictEqual(v2.coupleNode.text, 'e');
        assert.strictEqual(v2.turbinePowerKw, 600);
        assert.strictEqual(v2.airfoil, 'prop.afl');
    });
});
