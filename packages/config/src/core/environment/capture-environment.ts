import type { PropertySource } from "../../ports/source"

/**
 * One precedence-ordered lookup table of string properties, captured once per
 * assembly.
 */
export type EnvironmentSnapshot = ReadonlyMap<string, string>

/**
 * Loads every source in order. Later sources shadow earlier ones; a key whose
 * value is `undefined` leaves the earlier value in place.
 */
export async function captureEnvironment(
  sources: readonly PropertySource[],
): Promise<EnvironmentSnapshot> {
  const snapshot = new Map<string, string>()

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        snapshot.set(key, value)
      }
    }
  }

  return snapshot
}
