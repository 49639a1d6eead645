/**
 * A source of configuration properties.
 *
 * A PropertySource is responsible only for *loading* raw properties.
 * It does not convert, bind or merge them.
 *
 * Sources are evaluated in order; later sources override earlier ones.
 */
export interface PropertySource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "properties:application.properties", "json:config.json"
   */
  readonly name: string

  /**
   * Load properties.
   *
   * - Keys are dotted property names (`server.port`, `servers[0].host`)
   * - Values are strings; `undefined` means "value not provided"
   * - Nested objects and non-string scalars are flattened by the loader
   */
  load(): Promise<Record<string, unknown>>
}
