import * as assert from 'assert';
import * as path from 'path';
import * as fs from 'fs';
import { ConfigService } from '../../configservice';
import { ConfigKey } from '../../interfaces/configinterface';
import { normalizePath } from '../../interfaces/hostinterface';
import { NodeHost } from '../../server/nodehost';

suite('ConfigService', () => {
    const tmpRoot = path.join(__dirname, '..', 'temp-configservice');
    let host: NodeHost;

    function configFile(name: string) {
        return normalizePath(path.join(tmpRoot, name));
    }

    suiteSetup(async () => {
        await fs.promises.mkdir(tmpRoot, { recursive: true });
        await fs.promises.writeFile(configFile('nested.yaml'), [
            'parser:',
            '  maxLineLength: 200',
            '  sequentialImport: false',
            'resources:',
            '  group: vehicles',
            '  searchPaths:',
            '    - textures/*.dds',
            '',
        ].join('\n'));
        await fs.promises.writeFile(configFile('flat.json'), '{ "parser.maxArgs": 12, "resources.group": 5 }');
        await fs.promises.writeFile(configFile('parser.toml'), '[parser]\nmaxArgs = 7\n');
        await fs.promises.writeFile(configFile('list.yml'), '- parser\n- resources\n');
        host = new NodeHost({ roots: [tmpRoot], config: new ConfigService() });
    });

    suiteTeardown(async () => {
        if (fs.existsSync(tmpRoot)) {
            await fs.promises.rm(tmpRoot, { recursive: true, force: true });
        }
    });

    test('initial values are returned as given', () => {
        const config = new ConfigService({ [ConfigKey.ParserMaxArgs]: 10 });
        assert.strictEqual(config.getConfig(ConfigKey.ParserMaxArgs), 10);
        assert.strictEqual(config.getConfig(ConfigKey.ParserMaxLineLength), undefined);
    });

    test('loads nested keys from YAML', async () => {
        const config = new ConfigService();
        assert.strictEqual(await config.load(host, configFile('nested.yaml')), true);
        assert.strictEqual(config.getConfig(ConfigKey.ParserMaxLineLength), 200);
        assert.strictEqual(config.getConfig(ConfigKey.ParserSequentialImport), false);
        assert.strictEqual(config.getConfig(ConfigKey.ResourcesGroup), 'vehicles');
        assert.deepStrictEqual(config.getConfig(ConfigKey.ResourcesSearchPaths), ['textures/*.dds']);
    });

    test('loads flat keys from JSON and skips invalid values', async () => {
        const warnings: unknown[][] = [];
        const config = new ConfigService({}, { warn: (...args: unknown[]) => warnings.push(args) });
        const file = configFile('flat.json');
        assert.strictEqual(await config.load(host, file), true);
        assert.strictEqual(config.getConfig(ConfigKey.ParserMaxArgs), 12);
        assert.strictEqual(config.getConfig(ConfigKey.ResourcesGroup), undefined);
        assert.deepStrictEqual(warnings, [[`Ignoring invalid value for 'resources.group' in ${file}:`, 5]]);
    });

    test('loads tables from TOML', async () => {
        const config = new ConfigService();
        assert.strictEqual(await config.load(host, configFile('parser.toml')), true);
        assert.strictEqual(config.getConfig(ConfigKey.ParserMaxArgs), 7);
    });

    test('rejects unsupported and unreadable files', async () => {
        const warnings: unknown[] = [];
        const config = new ConfigService({}, { warn: (message: unknown) => warnings.push(message) });
        const ini = configFile('settings.ini');
        assert.strictEqual(await config.load(host, ini), false);
        assert.strictEqual(await config.load(host, configFile('absent.json')), false);
        assert.deepStrictEqual(warnings, [`Unsupported configuration file type: ${ini}`]);
    });

    test('rejects files that are not a mapping', async () => {
        const warnings: unknown[] = [];
        const config = new ConfigService({}, { warn: (message: unknown) => warnings.push(message) });
        const file = configFile('list.yml');
        assert.strictEqual(await config.load(host, file), false);
        assert.deepStrictEqual(warnings, [`Configuration file ${file} does not contain a mapping`]);
    });

    test('hooks run when their key changes', async () => {
        const config = new ConfigService();
        const seen: (number | undefined)[] = [];
        config.on(ConfigKey.ParserMaxArgs, service => seen.push(service.getConfig(ConfigKey.ParserMaxArgs)));
        await config.setConfig(ConfigKey.ParserMaxArgs, 20);
        await config.setConfig(ConfigKey.ResourcesGroup, 'vehicles');
        await config.load(host, configFile('parser.toml'));
        assert.deepStrictEqual(seen, [20, 7]);
    });
});
