/**
 * @rowshift/cli
 *
 * YAML configuration, transform loading and the rowshift command
 */

export {
  ConfigFileError,
  configFileSchema,
  databaseSchema,
  migrationEntrySchema,
  expandEnvVars,
  parseConfig,
  loadConfig,
  toConnectionDescriptor,
  toMigrationSpec,
} from './config.js';
export type {
  ConfigFile,
  ConfiguredOptions,
  DatabaseEntry,
  EnvExpansionOptions,
  LoadedConfig,
  MigrationEntry,
  ParseConfigOptions,
} from './config.js';
export { loadTransforms, registryFromModule } from './transforms.js';
export { runCli, parseArgs, exitCodeFor, UsageError, USAGE } from './command.js';
export type { CliArgs, CliIo } from './command.js';
