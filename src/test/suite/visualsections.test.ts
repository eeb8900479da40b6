/**
 * @file visualsections.test.ts
 * Tests for props, flexbodies, flares, managed materials and sound sources
 */

import * as assert from 'assert';
import { ResourceChecker } from '../../interfaces/hostinterface';
import { DiagnosticSeverity, ErrorCodes } from '../../shared/diagnostics';
import { ParserOptions, RigParseResult } from '../../shared/parser';
import { AnimationMode, AnimationSource, FlareType, MotorSourceKind, PropSpecial } from '../../shared/rigdef';
import { expectSingleDiagnostic, parseRig } from './helpers/rigtesting';

function parse(lines: string[], options: ParserOptions = {}): RigParseResult {
    return parseRig(lines, { sequentialImport: false, ...options });
}

const PROP_LINE = 'a, b, c, 0, 0, 0, 0, 0, 0, lever.mesh';

suite('Visual Sections', () => {
    suite('Props', () => {
        test('dashboard props get a default rotation', () => {
            const result = parse(['props', 'a, b, c, 0, 0, 0, 0, 0, 0, dashboard.mesh, speedo']);
            const prop = result.document.root.props[0];
            assert.strictEqual(prop.special, PropSpecial.DashboardLeft);
            assert.deepStrictEqual(prop.dashboard, { meshName: 'speedo', rotationAngle: 160 });
        });

        test('beacons read their flare material and color', () => {
            const result = parse(['props', 'a, b, c, 0, 0, 1, 0, 0, 0, beacon.mesh, beaconflare, 1, 0.5, 0']);
            const prop = result.document.root.props[0];
            assert.strictEqual(prop.special, PropSpecial.Beacon);
            assert.deepStrictEqual(prop.beacon, { flareMaterialName: 'beaconflare', color: [1, 0.5, 0] });
            assert.deepStrictEqual(prop.offset, { x: 0, y: 0, z: 1 });
        });

        test('seat2 is told apart from seat', () => {
            const result = parse(['props', 'a, b, c, 0, 0, 0, 0, 0, 0, seat2.mesh', 'a, b, c, 0, 0, 0, 0, 0, 0, seat.mesh']);
            assert.deepStrictEqual(
                result.document.root.props.map(p => p.special),
                [PropSpecial.DriverSeat2, PropSpecial.DriverSeat]
            );
        });

        test('add_animation attaches to the last prop', () => {
            const result = parse([
                'props',
                PROP_LINE,
                'add_animation 1.5, -10, 10, source: tacho | throttle2, mode: x-rotation, autoanimate, bogus',
            ]);
            const animation = result.document.root.props[0].animations[0];
            assert.strictEqual(animation.ratio, 1.5);
            assert.strictEqual(animation.lowerLimit, -10);
            assert.strictEqual(animation.upperLimit, 10);
            assert.strictEqual(animation.mode, AnimationMode.RotationX | AnimationMode.AutoAnimate);
            assert.deepStrictEqual([...animation.sources], [AnimationSource.Tacho]);
            assert.deepStrictEqual(animation.motorSources, [{ source: MotorSourceKind.AeroThrottle, motor: 2 }]);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.WARNING,
                code: ErrorCodes.UNKNOWN_ATTRIBUTE,
                message: "Ignoring invalid token 'bogus' (Invalid keyword: bogus)",
                keyword: 'add_animation',
            });
        });

        test('add_animation without a prop is rejected', () => {
            const result = parse(['add_animation 1, 0, 1, mode: x-offset']);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.ERROR,
                code: ErrorCodes.STRUCTURAL,
                message: "'add_animation' must come after a prop, skipping line",
                line: 2,
            });
        });

        test('prop_camera_mode sets the camera of the last prop', () => {
            const result = parse(['props', PROP_LINE, 'prop_camera_mode -1', PROP_LINE, 'prop_camera_mode 2']);
            const [first, second] = result.document.root.props;
            assert.deepStrictEqual(first.cameraSettings, { mode: 'external' });
            assert.deepStrictEqual(second.cameraSettings, { mode: 'cinecam', cinecamIndex: 2 });
        });

        test('an invalid camera mode leaves the prop unchanged', () => {
            const result = parse(['props', PROP_LINE, 'prop_camera_mode -5']);
            assert.deepStrictEqual(result.document.root.props[0].cameraSettings, { mode: 'always' });
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.ERROR,
                code: ErrorCodes.INVALID_VALUE,
                message: 'invalid value (-5), skipping line',
                line: 4,
                keyword: 'prop_camera_mode',
            });
        });
    });

    suite('Flexbodies', () => {
        test('forset collects numeric node ranges', () => {
            const result = parse(['flexbodies', 'a, b, c, 0, 0, 0, 0, 0, 0, body.mesh', 'forset 0-3, 7', 'flexbody_camera_mode 0']);
            const flexbody = result.document.root.flexbodies[0];
            const [range, single] = flexbody.nodeListToImport;
            assert.strictEqual(range.start.text, '0');
            assert.strictEqual(range.end.num, 3);
            assert.strictEqual(range.end.numericValid, true);
            assert.strictEqual(range.end.namedValid, false);
            assert.strictEqual(single.start, single.end);
            assert.strictEqual(single.start.num, 7);
            assert.deepStrictEqual(flexbody.cameraSettings, { mode: 'cinecam', cinecamIndex: 0 });
        });

        test('forset without a flexbody is rejected', () => {
            const result = parse(['forset 1-2']);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.ERROR,
                code: ErrorCodes.STRUCTURAL,
                message: "'forset' must come after a flexbody, skipping line",
            });
        });
    });

    suite('Flares', () => {
        test('flares get defaults for omitted fields', () => {
            const result = parse(['flares', 'a, b, c, 0.5, 0.5']);
            assert.deepStrictEqual(result.document.root.flares[0], {
                referenceNode: result.document.root.flares[0].referenceNode,
                nodeAxisX: result.document.root.flares[0].nodeAxisX,
                nodeAxisY: result.document.root.flares[0].nodeAxisY,
                offset: { x: 0.5, y: 0.5, z: 1 },
                type: FlareType.Headlight,
                controlNumber: -1,
                dashboardLink: '',
                blinkDelayMs: -2,
                size: -1,
                materialName: '',
            });
        });

        test('flares2 read the z offset and user control', () => {
            const result = parse(['flares2', 'a, b, c, 0.5, 0.5, 0.2, u, 3, 500, 1.5, flaremat']);
            const flare = result.document.root.flares[0];
            assert.deepStrictEqual(flare.offset, { x: 0.5, y: 0.5, z: 0.2 });
            assert.strictEqual(flare.type, FlareType.User);
            assert.strictEqual(flare.controlNumber, 3);
            assert.strictEqual(flare.blinkDelayMs, 500);
            assert.strictEqual(flare.size, 1.5);
            assert.strictEqual(flare.materialName, 'flaremat');
        });

        test('dashboard flares keep their link name', () => {
            const result = parse(['flares', 'a, b, c, 0, 0, d, leftblink']);
            assert.strictEqual(result.document.root.flares[0].dashboardLink, 'leftblink');
            assert.strictEqual(result.document.root.flares[0].controlNumber, -1);
        });

        test('an unknown flare type falls back to headlight', () => {
            const result = parse(['flares', 'a, b, c, 0, 0, q']);
            assert.strictEqual(result.document.root.flares[0].type, FlareType.Headlight);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.WARNING,
                code: ErrorCodes.INVALID_VALUE,
                message: "Invalid flare type 'q', falling back to type 'f' (front light)...",
            });
        });
    });

    suite('Managed materials', () => {
        const lookups: [string, string][] = [];
        const resources: ResourceChecker = {
            exists: (group, name) => {
                lookups.push([group, name]);
                return name === 'body.dds';
            },
        };

        setup(() => {
            lookups.length = 0;
        });

        test('missing textures are blanked with a warning', () => {
            const result = parse(['managedmaterials', 'paint mesh_standard body.dds shine.dds'], {
                resources,
                resourceGroup: 'vehicles',
            });
            const material = result.document.root.managedMaterials[0];
            assert.strictEqual(material.diffuseMap, 'body.dds');
            assert.strictEqual(material.specularMap, '');
            assert.deepStrictEqual(lookups, [['vehicles', 'body.dds'], ['vehicles', 'shine.dds']]);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.WARNING,
                code: ErrorCodes.RESOURCE_MISSING,
                message: 'Missing texture file: shine.dds',
                line: 3,
                keyword: 'managedmaterials',
            });
        });

        test('a dash means no texture', () => {
            const result = parse(['set_managedmaterials_options 1', 'managedmaterials', 'hull flexmesh_standard body.dds - body.dds'], {
                resources,
            });
            const material = result.document.root.managedMaterials[0];
            assert.strictEqual(material.damagedDiffuseMap, '');
            assert.strictEqual(material.specularMap, 'body.dds');
            assert.strictEqual(material.options.doubleSided, true);
            assert.deepStrictEqual(result.diagnostics, []);
        });

        test('an unknown effect skips the line', () => {
            const result = parse(['managedmaterials', 'glass mesh_glossy body.dds']);
            assert.strictEqual(result.document.root.managedMaterials.length, 0);
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.WARNING,
                code: ErrorCodes.INVALID_VALUE,
                message: 'mesh_glossy is an unknown effect',
            });
        });
    });

    suite('Sounds and cameras', () => {
        test('sound source modes', () => {
            const result = parse(['soundsources2', 'a, -1, horn', 'a, 2, horn', 'a, -3, horn']);
            assert.deepStrictEqual(
                result.document.root.soundSources2.map(s => s.mode),
                [{ mode: 'outside' }, { mode: 'cinecam', cinecamIndex: 2 }, { mode: 'always' }]
            );
            expectSingleDiagnostic(result.diagnostics, {
                severity: DiagnosticSeverity.ERROR,
                code: ErrorCodes.INVALID_VALUE,
                message: 'invalid mode -3, falling back to default -2',
                line: 5,
            });
        });

        test('extcamera modes', () => {
            const node = parse(['extcamera node a']).document.root.extCamera;
            assert.ok(node && node.mode === 'node');
            assert.strictEqual(node.node.text, 'a');
            assert.deepStrictEqual(parse(['extcamera cinecam']).document.root.extCamera, { mode: 'cinecam' });
        });

        test('skeleton settings fall back for negative values', () => {
            const result = parse(['set_skeleton_settings -1, 0.05']);
            assert.deepStrictEqual(result.document.root.skeletonSettings, {
                visibilityRangeMeters: 150,
                beamThicknessMeters: 0.05,
            });
        });
    });
});
