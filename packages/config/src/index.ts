export {
  DirectoryResourceLocator,
  type DirectoryResourceLocatorOptions,
} from "./adapters/directory/directory-resource-locator"
export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { FileSource } from "./adapters/file/file-source"
export { MemoryResourceLocator, type MemoryResources } from "./adapters/memory/memory-resource-locator"
export { ObjectSource } from "./adapters/object/object-source"
export { defaultExtensions } from "./adapters/parsers/default-extensions"
export { parseJson } from "./adapters/parsers/json-parser"
export { parseYaml } from "./adapters/parsers/yaml-parser"
export {
  booleanFromString,
  integerFromString,
  keywordFromString,
  listFromString,
  numberFromString,
  positiveIntegerFromString,
} from "./adapters/zod/coerce"
export {
  createZodConfigValidator,
  ZodConfigValidator,
  type ZodConfigValidatorOptions,
} from "./adapters/zod/zod-config-validator"
export { mergeArgValue, type ParsedArgs, parseArgs } from "./core/args/parse-args"
export { type AssembleOptions, assembleConfiguration } from "./core/assemble"
export { Config } from "./core/config"
export { captureEnvironment, type EnvironmentSnapshot } from "./core/environment/capture-environment"
export { PropertyResolver, type ResolveSite } from "./core/environment/property-resolver"
export {
  type ConfigErrorCode,
  ConfigurationInvalidError,
  DocumentParseError,
  InvalidArgumentError,
  InvalidSchemaError,
  MergeConflictError,
  ResourceReadError,
  UnknownExtensionError,
  UnresolvedPropertyError,
  type ValueKind,
} from "./core/errors"
export { expandProperties } from "./core/expand/expand-properties"
export { type LoadedDocument, loadFile, loadResource, parserFor } from "./core/load/load-documents"
export { deepMerge, kindOf, mergeAll } from "./core/merge/deep-merge"
export { hasPath, leafPaths, setAtPath } from "./core/merge/paths"
export { isPlainObject } from "./core/merge/plain-object"
export {
  DEFAULT_VARIANTS,
  defaultResourcePath,
  type EnumerateResourcesOptions,
  enumerateResources,
} from "./core/resources/enumerate-resources"
export { mergeSchemas } from "./core/schema/merge-schemas"
export {
  extendSystem,
  extractSchemas,
  isConfigurable,
  type SystemMap,
  type WithConfiguration,
  withConfigSchema,
} from "./core/system"
export type { IConfig } from "./ports/config"
export type { Configurable, SchemaProvider } from "./ports/configurable"
export type {
  ConfigParser,
  ExtensionTable,
  Profile,
  ResourceEntry,
  ResourcePathInput,
  ResourcePathTemplate,
  Variant,
} from "./ports/resource"
export type { RawSource, ResourceLocator } from "./ports/resource-locator"
export type { PropertySource } from "./ports/source"
export type {
  ConfigMap,
  ConfigValidator,
  FieldIssue,
  SchemaFragment,
  ValidationResult,
} from "./ports/validator"
