/**
 * One raw document behind a logical resource name.
 */
export interface RawSource {
  /** Stable identity for diagnostics, e.g. an absolute file path */
  readonly id: string

  read(): Promise<string>
}

/**
 * Finds the raw sources for a logical resource name.
 *
 * A locator may return any number of sources for one name (the same name can
 * exist under several resource roots). The set is complete but carries no
 * ordering guarantee beyond what the adapter documents. An empty result means
 * "not present" and is never an error.
 */
export interface ResourceLocator {
  readonly name: string

  locate(logicalName: string): Promise<RawSource[]>
}
