import path from "node:path"
import type { Logger } from "@tessera/logger"
import pLimit, { type LimitFunction } from "p-limit"
import { FileSource, isNotFound } from "../../adapters/file/file-source"
import type { ConfigParser, ExtensionTable, ResourceEntry } from "../../ports/resource"
import type { RawSource, ResourceLocator } from "../../ports/resource-locator"
import type { ConfigMap } from "../../ports/validator"
import type { PropertyResolver } from "../environment/property-resolver"
import { DocumentParseError, ResourceReadError, UnknownExtensionError } from "../errors"
import { expandProperties } from "../expand/expand-properties"
import { isPlainObject } from "../merge/plain-object"

/**
 * One parsed document and where it came from.
 */
export type LoadedDocument = {
  /** Provenance name, e.g. "resource:/srv/app/shop-configuration.yaml" */
  layer: string
  logicalName: string
  sourceId: string
  document: ConfigMap
}

/** Reads in flight at once when the caller passes no limit */
export const DEFAULT_READ_CONCURRENCY = 8

export type LoadResourceDeps = {
  locator: ResourceLocator
  resolver: PropertyResolver
  logger: Logger
  /** Shared across calls to bound reads for a whole assembly */
  limit?: LimitFunction
}

/**
 * Reads, expands and parses every source behind one enumerated resource.
 * Sources are read through `deps.limit`; the result keeps locator order.
 * A resource with no sources yields no documents.
 */
export async function loadResource(
  entry: ResourceEntry,
  deps: LoadResourceDeps,
): Promise<LoadedDocument[]> {
  const limit = deps.limit ?? pLimit(DEFAULT_READ_CONCURRENCY)
  let sources: RawSource[]

  try {
    sources = await limit(() => deps.locator.locate(entry.logicalName))
  } catch (err) {
    throw new ResourceReadError({ logicalName: entry.logicalName, cause: err })
  }

  if (!sources.length) {
    deps.logger.trace("Resource not present", { resource: entry.logicalName })
    return []
  }

  return Promise.all(
    sources.map(async (source) => {
      let text: string

      try {
        text = await limit(() => source.read())
      } catch (err) {
        throw new ResourceReadError({
          logicalName: entry.logicalName,
          sourceId: source.id,
          cause: err,
        })
      }

      const document = parseDocument(text, entry.parser, {
        logicalName: entry.logicalName,
        sourceId: source.id,
        resolver: deps.resolver,
      })

      deps.logger.debug("Loaded configuration resource", {
        resource: entry.logicalName,
        sourceId: source.id,
        profile: entry.profile,
        variant: entry.variant,
      })

      return {
        layer: `resource:${source.id}`,
        logicalName: entry.logicalName,
        sourceId: source.id,
        document,
      }
    }),
  )
}

export type LoadFileDeps = {
  extensions: ExtensionTable
  resolver: PropertyResolver
  logger: Logger
  /** @default process.cwd() */
  cwd?: string
}

/**
 * Loads one explicitly named file. The parser is chosen by extension.
 *
 * @returns `undefined` when the file does not exist
 * @throws UnknownExtensionError when no parser matches the extension
 */
export async function loadFile(file: string, deps: LoadFileDeps): Promise<LoadedDocument | undefined> {
  const parser = parserFor(file, deps.extensions)
  const source = new FileSource(path.resolve(deps.cwd ?? process.cwd(), file))
  let text: string

  try {
    text = await source.read()
  } catch (err) {
    if (isNotFound(err)) {
      deps.logger.debug("Configuration file not found, skipping", { resource: file })
      return undefined
    }
    throw new ResourceReadError({ logicalName: file, sourceId: source.id, cause: err })
  }

  const document = parseDocument(text, parser, {
    logicalName: file,
    sourceId: source.id,
    resolver: deps.resolver,
  })

  deps.logger.debug("Loaded configuration file", { resource: file, sourceId: source.id })

  return { layer: `file:${file}`, logicalName: file, sourceId: source.id, document }
}

/**
 * Selects the parser registered for the text after the last "." of `file`.
 */
export function parserFor(file: string, extensions: ExtensionTable): ConfigParser {
  const base = path.basename(file)
  const dot = base.lastIndexOf(".")
  const extension = dot === -1 ? "" : base.slice(dot + 1)
  const parser = Object.hasOwn(extensions, extension) ? extensions[extension] : undefined

  if (!parser) {
    throw new UnknownExtensionError({ path: file, extensions: Object.keys(extensions) })
  }

  return parser
}

function parseDocument(
  text: string,
  parser: ConfigParser,
  ctx: { logicalName: string; sourceId: string; resolver: PropertyResolver },
): ConfigMap {
  const expanded = expandProperties(text, ctx.resolver)
  let parsed: unknown

  try {
    parsed = parser(expanded)
  } catch (err) {
    throw new DocumentParseError({ logicalName: ctx.logicalName, sourceId: ctx.sourceId, cause: err })
  }

  if (parsed === null || parsed === undefined) return {}

  if (!isPlainObject(parsed)) {
    throw new DocumentParseError({
      logicalName: ctx.logicalName,
      sourceId: ctx.sourceId,
      reason: "the document root is not a mapping",
    })
  }

  return parsed
}
