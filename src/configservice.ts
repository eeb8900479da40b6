/**
 * @file configservice.ts
 * In-memory configuration, optionally loaded from a YAML, TOML or JSON file
 */
import * as path from "path";
import { ConfigInterface, ConfigKey, ConfigValues } from "./interfaces/configinterface";
import { HostInterface, NormalizedPath } from "./interfaces/hostinterface";
import { completeLogger, Logger } from "./server/nodehost";

type Validator<T> = (value: unknown) => value is T;

const isPositiveInt = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value > 0;
const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";
const isString = (value: unknown): value is string => typeof value === "string";
const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(v => typeof v === "string");

const VALIDATORS: { [K in ConfigKey]: Validator<ConfigValues[K]> } = {
  [ConfigKey.ParserMaxLineLength]: isPositiveInt,
  [ConfigKey.ParserMaxArgs]: isPositiveInt,
  [ConfigKey.ParserSequentialImport]: isBoolean,
  [ConfigKey.ResourcesGroup]: isString,
  [ConfigKey.ResourcesSearchPaths]: isStringArray,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Find `key` in parsed file data, either as a flat dotted key
 * (`"parser.maxArgs": 10`) or nested (`parser: { maxArgs: 10 }`).
 */
function lookup(data: Record<string, unknown>, key: string): unknown {
  if (key in data) {
    return data[key];
  }
  let node: unknown = data;
  for (const segment of key.split(".")) {
    if (!isRecord(node)) {
      return undefined;
    }
    node = node[segment];
  }
  return node;
}

export class ConfigService implements ConfigInterface {
  private readonly values: Partial<ConfigValues> = {};
  private readonly log: Logger;
  private configHooks: [ConfigKey, (configService: ConfigInterface) => void][] = [];

  constructor(initial: Partial<ConfigValues> = {}, logger?: Partial<Logger>) {
    this.log = completeLogger(logger);
    Object.assign(this.values, initial);
  }

  public getConfig<K extends ConfigKey>(key: K): ConfigValues[K] | undefined {
    return this.values[key];
  }

  public async setConfig<K extends ConfigKey>(key: K, value: ConfigValues[K]): Promise<void> {
    this.values[key] = value;
    this.notify(key);
  }

  /** Register a handler called whenever `config` changes */
  public on(config: ConfigKey, handler: (configService: ConfigInterface) => void): void {
    this.configHooks.push([config, handler]);
  }

  /**
   * Merge settings from a file. The format follows the extension
   * (`.yaml`/`.yml`, `.toml`, `.json`). Values of the wrong type are skipped
   * with a warning. Returns false when the file could not be read.
   */
  public async load(host: HostInterface, file: NormalizedPath): Promise<boolean> {
    const data = await this.readConfigFile(host, file);
    if (data === null) {
      return false;
    }
    if (!isRecord(data)) {
      this.log.warn(`Configuration file ${file} does not contain a mapping`);
      return false;
    }

    for (const key of Object.values(ConfigKey)) {
      this.applyValue(key, lookup(data, key), file);
    }
    return true;
  }

  private async readConfigFile(host: HostInterface, file: NormalizedPath): Promise<unknown> {
    switch (path.extname(file).toLowerCase()) {
      case ".yaml":
      case ".yml":
        return host.readYAML(file);
      case ".toml":
        return host.readTOML(file);
      case ".json":
        return host.readJSON(file);
      default:
        this.log.warn(`Unsupported configuration file type: ${file}`);
        return null;
    }
  }

  private applyValue<K extends ConfigKey>(key: K, value: unknown, file: NormalizedPath): void {
    if (value === undefined) {
      return;
    }
    const validate: Validator<ConfigValues[K]> = VALIDATORS[key];
    if (!validate(value)) {
      this.log.warn(`Ignoring invalid value for '${key}' in ${file}:`, value);
      return;
    }
    this.values[key] = value;
    this.notify(key);
  }

  private notify(key: ConfigKey): void {
    this.configHooks.filter(hook => hook[0] === key).forEach(hook => {
      try {
        hook[1](this);
      } catch (error) {
        console.error("Configuration hook failed:", error);
      }
    });
  }
}
