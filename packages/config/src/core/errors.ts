import { BaseError } from "@tessera/errors"
import type { ConfigMap, FieldIssue } from "../ports/validator"

export type ConfigErrorCode =
  | "unresolved_property"
  | "document_parse_failed"
  | "resource_read_failed"
  | "unknown_extension"
  | "invalid_argument"
  | "merge_conflict"
  | "invalid_schema"
  | "configuration_invalid"

/**
 * A `${NAME}` reference with no value and no default.
 */
export class UnresolvedPropertyError extends BaseError<"unresolved_property"> {
  readonly property: string
  readonly expansion: string
  readonly knownKeys: readonly string[]
  readonly source: string

  constructor(input: {
    property: string
    expansion: string
    knownKeys: readonly string[]
    source: string
  }) {
    super(`Unable to find expansion for \`${input.expansion}'.`, {
      code: "unresolved_property",
      context: {
        property: input.property,
        expansion: input.expansion,
        knownKeys: input.knownKeys,
        source: input.source,
      },
    })

    this.property = input.property
    this.expansion = input.expansion
    this.knownKeys = input.knownKeys
    this.source = input.source
  }
}

export class DocumentParseError extends BaseError<"document_parse_failed"> {
  readonly logicalName: string
  readonly sourceId: string

  constructor(input: { logicalName: string; sourceId: string; reason?: string; cause?: unknown }) {
    const reason = input.reason ?? describeCause(input.cause)

    super(`Unable to parse configuration \`${input.sourceId}': ${reason}`, {
      code: "document_parse_failed",
      context: { logicalName: input.logicalName, sourceId: input.sourceId },
      cause: input.cause,
    })

    this.logicalName = input.logicalName
    this.sourceId = input.sourceId
  }
}

export class ResourceReadError extends BaseError<"resource_read_failed"> {
  constructor(input: { logicalName: string; sourceId?: string; cause: unknown }) {
    const target = input.sourceId ?? input.logicalName

    super(`Unable to read configuration \`${target}': ${describeCause(input.cause)}`, {
      code: "resource_read_failed",
      context: {
        logicalName: input.logicalName,
        ...(input.sourceId !== undefined && { sourceId: input.sourceId }),
      },
      cause: input.cause,
    })
  }
}

export class UnknownExtensionError extends BaseError<"unknown_extension"> {
  constructor(input: { path: string; extensions: readonly string[] }) {
    super(`Unknown extension for configuration file \`${input.path}'.`, {
      code: "unknown_extension",
      context: { path: input.path, extensions: input.extensions },
    })
  }
}

export class InvalidArgumentError extends BaseError<"invalid_argument"> {
  readonly token: string

  constructor(input: { token: string; reason?: string }) {
    super(input.reason ?? `Unable to parse argument \`${input.token}'.`, {
      code: "invalid_argument",
      context: { token: input.token },
    })

    this.token = input.token
  }
}

export type ValueKind = "mapping" | "sequence" | "scalar" | "null"

export class MergeConflictError extends BaseError<"merge_conflict"> {
  readonly path: readonly string[]

  constructor(input: { path: readonly string[]; existing: ValueKind; incoming: ValueKind }) {
    super(
      `Cannot merge a ${input.incoming} into a ${input.existing} at \`${formatPath(input.path)}'.`,
      {
        code: "merge_conflict",
        context: {
          path: input.path,
          existingType: input.existing,
          incomingType: input.incoming,
        },
      },
    )

    this.path = input.path
  }
}

/**
 * The merged schema is not something the validator can interpret.
 * A programming error in a component's schema declaration.
 */
export class InvalidSchemaError extends BaseError<"invalid_schema"> {
  constructor(input: { path: readonly string[]; reason: string }) {
    super(`Invalid configuration schema at \`${formatPath(input.path)}': ${input.reason}`, {
      code: "invalid_schema",
      context: { path: input.path },
      isOperational: false,
    })
  }
}

export class ConfigurationInvalidError extends BaseError<"configuration_invalid"> {
  readonly schema: ConfigMap
  readonly config: ConfigMap
  readonly issues: readonly FieldIssue[]

  constructor(input: { schema: ConfigMap; config: ConfigMap; issues: readonly FieldIssue[] }) {
    const lines = input.issues.map((issue) => `  - ${formatPath(issue.path)}: ${issue.message}`)

    super(`The configuration is not valid:\n${lines.join("\n")}`, {
      code: "configuration_invalid",
      context: { schema: input.schema, config: input.config, issues: input.issues },
    })

    this.schema = input.schema
    this.config = input.config
    this.issues = input.issues
  }
}

export function formatPath(path: readonly string[]): string {
  return path.length ? path.join(".") : "(root)"
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return typeof cause === "string" ? cause : "unknown error"
}
