import { type Logger, NullLogger } from "@tessera/logger"
import pLimit, { type LimitFunction } from "p-limit"
import { DirectoryResourceLocator } from "../adapters/directory/directory-resource-locator"
import { DotenvSource } from "../adapters/dotenv/dotenv-source"
import { EnvSource } from "../adapters/env/env-source"
import { ObjectSource } from "../adapters/object/object-source"
import { defaultExtensions } from "../adapters/parsers/default-extensions"
import { createZodConfigValidator } from "../adapters/zod/zod-config-validator"
import type { IConfig } from "../ports/config"
import type {
  ExtensionTable,
  Profile,
  ResourcePathTemplate,
  Variant,
} from "../ports/resource"
import type { ResourceLocator } from "../ports/resource-locator"
import type { PropertySource } from "../ports/source"
import type { ConfigMap, ConfigValidator, SchemaFragment } from "../ports/validator"
import { parseArgs } from "./args/parse-args"
import { Config } from "./config"
import { captureEnvironment } from "./environment/capture-environment"
import { PropertyResolver } from "./environment/property-resolver"
import { ConfigurationInvalidError } from "./errors"
import {
  DEFAULT_READ_CONCURRENCY,
  type LoadedDocument,
  loadFile,
  loadResource,
} from "./load/load-documents"
import { deepMerge } from "./merge/deep-merge"
import { isPlainObject } from "./merge/plain-object"
import { Provenance } from "./provenance"
import { enumerateResources } from "./resources/enumerate-resources"
import { mergeSchemas } from "./schema/merge-schemas"

export type AssembleOptions<T extends ConfigMap = ConfigMap> = {
  /** First segment of every resource name, e.g. "shop" for "shop-web-configuration.yaml" */
  prefix: string

  /** Schema fragments, deep-merged in order */
  schemas?: readonly SchemaFragment[]

  /** Merged after every file, before CLI overrides */
  overrides?: ConfigMap

  /** In precedence order, lowest first. The global profile is added last. */
  profiles?: readonly Profile[]

  /** @default [null, "local"] */
  variants?: readonly Variant[]

  resourcePath?: ResourcePathTemplate

  /** @default { yaml, json } */
  extensions?: ExtensionTable

  /** Files merged after the enumerated resources; missing files are skipped */
  additionalFiles?: readonly string[]

  /** `--load <path>` and `a/b/c=value` tokens */
  args?: readonly string[]

  /** Highest-precedence expansion properties */
  properties?: Readonly<Record<string, unknown>>

  /** Process-wide expansion properties, shadowed by `properties` */
  processProperties?: Readonly<Record<string, unknown>>

  /** @default process.env */
  env?: Record<string, string | undefined>

  /** Only variables starting with this are read, with the prefix removed */
  envPrefix?: string

  /** A .env file read beneath the environment; skipped when absent */
  dotenv?: string

  /** @default a DirectoryResourceLocator over `cwd` */
  locator?: ResourceLocator

  /** @default a strict ZodConfigValidator */
  validator?: ConfigValidator<T>

  logger?: Logger

  /** Resources and files read at once. @default 8 */
  readConcurrency?: number

  /** Base for relative paths. @default process.cwd() */
  cwd?: string
}

type AssemblyInput = Omit<AssembleOptions, "validator">

type Layer = {
  name: string
  document: ConfigMap
}

/**
 * Builds the configuration for one application run.
 *
 * Layers merge in this order, later ones taking precedence:
 * 1. enumerated resources (profile, then variant, then extension)
 * 2. `additionalFiles`
 * 3. `--load` files from `args`
 * 4. `overrides`
 * 5. `a/b/c=value` tokens from `args`
 *
 * `${NAME}` references in every file are expanded against `properties`,
 * `processProperties`, the environment and the dotenv file, in that order
 * of precedence.
 *
 * @example
 * ```typescript
 * const config = await assembleConfiguration({
 *   prefix: "shop",
 *   profiles: ["web"],
 *   schemas: [{ web: { port: positiveIntegerFromString() } }],
 *   args: process.argv.slice(2),
 * })
 * ```
 *
 * @throws ConfigurationInvalidError when validation fails
 */
export async function assembleConfiguration<T extends ConfigMap>(
  options: AssembleOptions<T> & { validator: ConfigValidator<T> },
): Promise<IConfig<T>>
export async function assembleConfiguration(
  options: AssembleOptions & { validator?: undefined },
): Promise<IConfig<ConfigMap>>
export async function assembleConfiguration<T extends ConfigMap>(
  options: AssembleOptions<T>,
): Promise<IConfig<T> | IConfig<ConfigMap>> {
  if (options.validator) return assemble(options, options.validator)
  return assemble(options, createZodConfigValidator())
}

async function assemble<T extends ConfigMap>(
  options: AssemblyInput,
  validator: ConfigValidator<T>,
): Promise<IConfig<T>> {
  const cwd = options.cwd ?? process.cwd()
  const base: Logger = options.logger ?? new NullLogger()
  const logger: Logger = base.child({
    module: "config",
    prefix: options.prefix,
  })

  try {
    const resolver = new PropertyResolver(await captureEnvironment(propertySources(options, cwd)))
    const args = parseArgs(options.args ?? [])
    const ctx: LoadContext = {
      extensions: options.extensions ?? defaultExtensions,
      resolver,
      logger,
      cwd,
      limit: pLimit(options.readConcurrency ?? DEFAULT_READ_CONCURRENCY),
    }

    const layers = [
      ...(await loadResources(options, ctx)),
      ...(await loadFiles([...(options.additionalFiles ?? []), ...args.additionalFiles], ctx)),
      ...(options.overrides ? [{ name: "overrides", document: options.overrides }] : []),
      ...(Object.keys(args.overrides).length ? [{ name: "args", document: args.overrides }] : []),
    ]

    const provenance = new Provenance()
    let merged: ConfigMap = {}

    for (const layer of layers) {
      const next = deepMerge(merged, layer.document)
      provenance.record(layer.name, layer.document, merged)
      merged = isPlainObject(next) ? next : {}
    }

    const schema = mergeSchemas(options.schemas ?? [])
    const result = validator.validate(merged, schema)

    if (!result.ok) {
      throw new ConfigurationInvalidError({ schema, config: merged, issues: result.issues })
    }

    logger.info("Configuration assembled", { layers: layers.length })

    return new Config(result.value, provenance, merged)
  } catch (err) {
    logger.error("Configuration assembly failed", { err })
    throw err
  }
}

function propertySources(options: AssemblyInput, cwd: string): PropertySource[] {
  const sources: PropertySource[] = []

  if (options.dotenv !== undefined) {
    sources.push(new DotenvSource({ file: options.dotenv, required: false, cwd }))
  }

  sources.push(new EnvSource({ env: options.env ?? process.env, prefix: options.envPrefix }))

  if (options.processProperties) {
    sources.push(new ObjectSource("process-properties", options.processProperties))
  }

  if (options.properties) {
    sources.push(new ObjectSource("properties", options.properties))
  }

  return sources
}

type LoadContext = {
  extensions: ExtensionTable
  resolver: PropertyResolver
  logger: Logger
  cwd: string
  limit: LimitFunction
}

async function loadResources(
  options: AssemblyInput,
  ctx: LoadContext,
): Promise<Layer[]> {
  const locator = options.locator ?? new DirectoryResourceLocator({ cwd: ctx.cwd })
  const entries = enumerateResources({
    prefix: options.prefix,
    profiles: options.profiles ?? [],
    variants: options.variants,
    extensions: ctx.extensions,
    resourcePath: options.resourcePath,
  })

  const loaded = await Promise.all(
    entries.map((entry) =>
      loadResource(entry, {
        locator,
        resolver: ctx.resolver,
        logger: ctx.logger,
        limit: ctx.limit,
      }),
    ),
  )

  return loaded.flat().map(toLayer)
}

async function loadFiles(files: readonly string[], ctx: LoadContext): Promise<Layer[]> {
  const loaded = await Promise.all(files.map((file) => ctx.limit(() => loadFile(file, ctx))))

  return loaded.filter((doc): doc is LoadedDocument => doc !== undefined).map(toLayer)
}

function toLayer(doc: LoadedDocument): Layer {
  return { name: doc.layer, document: doc.document }
}
