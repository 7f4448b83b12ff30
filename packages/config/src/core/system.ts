import type { IConfig } from "../ports/config"
import type { Configurable, SchemaProvider } from "../ports/configurable"
import type { ConfigMap, ConfigValidator, SchemaFragment } from "../ports/validator"
import { type AssembleOptions, assembleConfiguration } from "./assemble"
import { isPlainObject } from "./merge/plain-object"

/**
 * Components of an application, by name.
 */
export type SystemMap = Readonly<Record<string, unknown>>

export type WithConfiguration<S extends SystemMap, T extends ConfigMap> = S & {
  configuration: IConfig<T>
}

const attachedSchemas = new WeakMap<object, SchemaFragment>()

/**
 * Attaches a schema fragment to a component that cannot implement
 * `SchemaProvider` itself. Returns the component.
 */
export function withConfigSchema<C extends object>(component: C, schema: SchemaFragment): C {
  attachedSchemas.set(component, schema)
  return component
}

/**
 * Schema fragments of every component, in record order. An attached schema
 * takes the place of a component's own `configSchema`.
 */
export function extractSchemas(system: SystemMap): SchemaFragment[] {
  const fragments: SchemaFragment[] = []

  for (const component of Object.values(system)) {
    if (typeof component !== "object" || component === null) continue

    const fragment =
      attachedSchemas.get(component) ?? (isSchemaProvider(component) ? component.configSchema : undefined)

    if (fragment) fragments.push(fragment)
  }

  return fragments
}

export function isConfigurable(value: unknown): value is Configurable {
  return (
    typeof value === "object" && value !== null && "apply" in value && typeof value.apply === "function"
  )
}

function isSchemaProvider(value: object): value is SchemaProvider {
  return "configSchema" in value && isPlainObject(value.configSchema)
}

/**
 * Assembles configuration from the schemas the components declare, hands the
 * validated value to every `Configurable` component (in record order, one at
 * a time) and returns a new system with the configuration under
 * `configuration`.
 *
 * Fragments in `options.schemas` are merged after the components' own.
 */
export async function extendSystem<S extends SystemMap, T extends ConfigMap>(
  system: S,
  options: AssembleOptions<T> & { validator: ConfigValidator<T> },
): Promise<WithConfiguration<S, T>>
export async function extendSystem<S extends SystemMap>(
  system: S,
  options: AssembleOptions & { validator?: undefined },
): Promise<WithConfiguration<S, ConfigMap>>
export async function extendSystem<S extends SystemMap, T extends ConfigMap>(
  system: S,
  options: AssembleOptions<T>,
): Promise<WithConfiguration<S, T> | WithConfiguration<S, ConfigMap>> {
  const schemas = [...extractSchemas(system), ...(options.schemas ?? [])]

  if (options.validator) {
    const configuration = await assembleConfiguration({ ...options, schemas, validator: options.validator })
    await applyConfiguration(system, configuration.value)
    return { ...system, configuration }
  }

  const configuration = await assembleConfiguration({ ...options, schemas, validator: undefined })
  await applyConfiguration(system, configuration.value)
  return { ...system, configuration }
}

async function applyConfiguration(system: SystemMap, value: ConfigMap): Promise<void> {
  for (const component of Object.values(system)) {
    if (isConfigurable(component)) {
      await component.apply(value)
    }
  }
}
