/**
 * @file configinterface.ts
 * Abstraction layer for configuration access so the parser core stays
 * independent of where settings come from (file, embedding application, tests).
 */

/** Keys used by configuration. */
export enum ConfigKey {
  ParserMaxLineLength = 'parser.maxLineLength',
  ParserMaxArgs = 'parser.maxArgs',
  ParserSequentialImport = 'parser.sequentialImport',
  ResourcesGroup = 'resources.group',
  ResourcesSearchPaths = 'resources.searchPaths',
}

/** Value type stored under each key. */
export interface ConfigValues {
  [ConfigKey.ParserMaxLineLength]: number;
  [ConfigKey.ParserMaxArgs]: number;
  [ConfigKey.ParserSequentialImport]: boolean;
  [ConfigKey.ResourcesGroup]: string;
  [ConfigKey.ResourcesSearchPaths]: string[];
}

/** Basic configuration retrieval + mutation. */
export interface ConfigInterface {
  /** Read a config value (undefined if not set). */
  getConfig<K extends ConfigKey>(key: K): ConfigValues[K] | undefined;

  /** Update a config value. Implementations may persist asynchronously. */
  setConfig<K extends ConfigKey>(key: K, value: ConfigValues[K]): Promise<void>;
}
