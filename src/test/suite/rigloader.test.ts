/**
 * @file rigloader.test.ts
 * Tests for loading rig files from disk with resource validation
 */

import * as assert from 'assert';
import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigService } from '../../configservice';
import { ConfigKey } from '../../interfaces/configinterface';
import { normalizePath } from '../../interfaces/hostinterface';
import { NodeHost } from '../../server/nodehost';
import { DiagnosticSeverity, ErrorCodes } from '../../shared/diagnostics';
import { RigLoader } from '../../shared/rigloader';
import { expectSingleDiagnostic } from './helpers/rigtesting';
import { TestDataLoader } from './test-data-loader';

suite('RigLoader', () => {
    const tmpRoot = path.join(__dirname, '..', 'temp-rigloader');

    suiteSetup(async () => {
        await fs.promises.mkdir(path.join(tmpRoot, 'textures'), { recursive: true });
        await fs.promises.writeFile(path.join(tmpRoot, 'textures', 'body.dds'), '');
        await fs.promises.writeFile(path.join(tmpRoot, 'painted.truck'), [
            'Painted box',
            'managedmaterials',
            'paint mesh_standard body.dds shine.dds',
            'end',
            '',
        ].join('\n'));
    });

    suiteTeardown(async () => {
        if (fs.existsSync(tmpRoot)) {
            await fs.promises.rm(tmpRoot, { recursive: true, force: true });
        }
    });

    test('loads a fixture and hashes its bytes', async () => {
        const infoMessages: string[] = [];
        const host = new NodeHost({ roots: [TestDataLoader.getTestDataPath()], config: new ConfigService() });
        const loader = new RigLoader(host, { logger: { info: (message: unknown) => infoMessages.push(String(message)) } });
        const file = TestDataLoader.getRigPath('sample.truck');

        const result = await loader.load(file);

        const expectedHash = crypto.createHash('sha256').update(TestDataLoader.loadRigBytes('sample.truck')).digest('hex');
        assert.strictEqual(result.success, true);
        assert.deepStrictEqual(result.diagnostics, []);
        assert.strictEqual(result.document.name, 'Sample Pickup');
        assert.strictEqual(result.sha256, expectedHash);
        assert.deepStrictEqual(infoMessages, [`Parsed ${normalizePath(file)}: 0 diagnostics`]);
    });

    test('an unreadable file yields a read error', async () => {
        const reports: string[] = [];
        const host = new NodeHost({ roots: [tmpRoot], config: new ConfigService() });
        const loader = new RigLoader(host, { sink: { report: (_severity, text) => reports.push(text) } });
        const file = normalizePath(path.join(tmpRoot, 'absent.truck'));

        const result = await loader.load(file);

        assert.strictEqual(result.success, false);
        assert.strictEqual(result.sha256, '');
        assert.strictEqual(result.document.name, '');
        expectSingleDiagnostic(result.diagnostics, {
            severity: DiagnosticSeverity.ERROR,
            code: ErrorCodes.INPUT_READ,
            message: `Could not read rig file: ${file}`,
            line: 0,
            keyword: 'none',
        });
        assert.strictEqual(reports.length, 1);
    });

    test('textures are checked against the configured search paths', async () => {
        const config = new ConfigService({
            [ConfigKey.ResourcesGroup]: 'vehicles',
            [ConfigKey.ResourcesSearchPaths]: ['textures/*.dds'],
        });
        const host = new NodeHost({ roots: [tmpRoot], config });
        const loader = new RigLoader(host);

        const result = await loader.load(path.join(tmpRoot, 'painted.truck'));

        const material = result.document.root.managedMaterials[0];
        assert.strictEqual(material.diffuseMap, 'body.dds');
        assert.strictEqual(material.specularMap, '');
        expectSingleDiagnostic(result.diagnostics, {
            severity: DiagnosticSeverity.WARNING,
            code: ErrorCodes.RESOURCE_MISSING,
            message: 'Missing texture file: shine.dds',
            line: 3,
        });
    });

    test('without search paths every texture is accepted', async () => {
        const host = new NodeHost({ roots: [tmpRoot], config: new ConfigService() });
        const result = await new RigLoader(host).load(path.join(tmpRoot, 'painted.truck'));
        assert.strictEqual(result.document.root.managedMaterials[0].specularMap, 'shine.dds');
        assert.deepStrictEqual(result.diagnostics, []);
    });
});
