import { z } from "zod"
import { InvalidSchemaError } from "../../core/errors"
import { isPlainObject } from "../../core/merge/plain-object"
import type {
  ConfigMap,
  ConfigValidator,
  FieldIssue,
  ValidationResult,
} from "../../ports/validator"

export type ZodConfigValidatorOptions = {
  /**
   * What to do with keys the schema does not declare.
   *
   * - "strict": report them as issues
   * - "strip": drop them from the value (see `IConfig.unknownKeys()`)
   *
   * @default "strict"
   */
  unknownKeys?: "strict" | "strip"
}

/**
 * Validates configuration against a schema tree of plain objects whose leaves
 * are zod types.
 *
 * An empty schema declares nothing and accepts any mapping.
 *
 * Declared sections are optional as a whole: a missing section is validated
 * as `{}`, so sections made only of defaulted fields may be left out.
 *
 * `output` types the validated value. It runs after the schema tree, so it
 * only needs to describe the shape (e.g. `z.object({ web: z.object({ port: z.number() }) })`).
 */
export class ZodConfigValidator<T extends ConfigMap = ConfigMap> implements ConfigValidator<T> {
  private readonly unknownKeys: "strict" | "strip"

  constructor(
    private readonly output: z.ZodType<T>,
    opts: ZodConfigValidatorOptions = {},
  ) {
    this.unknownKeys = opts.unknownKeys ?? "strict"
  }

  validate(config: ConfigMap, schema: ConfigMap): ValidationResult<T> {
    const structure: z.ZodType = Object.keys(schema).length
      ? this.build(schema, [])
      : z.record(z.string(), z.unknown())
    const result = structure.pipe(this.output).safeParse(config)

    if (result.success) return { ok: true, value: result.data }

    return { ok: false, issues: result.error.issues.map(toFieldIssue) }
  }

  private build(shape: ConfigMap, path: readonly string[]): z.ZodType {
    const fields: Record<string, z.ZodType> = {}

    for (const [key, node] of Object.entries(shape)) {
      if (node instanceof z.ZodType) {
        fields[key] = node
      } else if (isPlainObject(node)) {
        fields[key] = this.build(node, [...path, key]).prefault({})
      } else {
        throw new InvalidSchemaError({
          path: [...path, key],
          reason: "expected a zod schema or a nested mapping",
        })
      }
    }

    return this.unknownKeys === "strict" ? z.strictObject(fields) : z.object(fields)
  }
}

/**
 * A validator whose value is typed as a plain configuration map.
 */
export function createZodConfigValidator(
  opts: ZodConfigValidatorOptions = {},
): ZodConfigValidator<ConfigMap> {
  return new ZodConfigValidator(z.record(z.string(), z.unknown()), opts)
}

function toFieldIssue(issue: z.core.$ZodIssue): FieldIssue {
  const path = issue.path.map(String)

  if ("expected" in issue && typeof issue.expected === "string") {
    return { path, code: issue.code, message: issue.message, expected: issue.expected }
  }

  return { path, code: issue.code, message: issue.message }
}
