import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { isMissingFile } from "../../core/utils/is-missing-file"
import type { PropertySource } from "../../ports/source"

/**
 * Options for creating a properties file source.
 */
export type PropertiesFileSourceOptions = {
  /**
   * Path to the file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "application.properties", ".env", "./config/defaults.properties"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Returns empty properties if file not found.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * `key=value` lines parsed with dotenv's parser; keys are used verbatim.
 *
 * dotenv keys are limited to `[A-Za-z0-9_.-]`, so lists are written in
 * delimited form (`app.hosts=a,b`) rather than with `[i]` indexes.
 */
export class PropertiesFileSource implements PropertySource {
  readonly name: string

  constructor(private readonly opts: PropertiesFileSourceOptions) {
    this.name = `properties:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return parse(content)
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) {
        return {}
      }
      throw err
    }
  }
}
