import { consola, type ConsolaInstance } from "consola"

export type Logger = ConsolaInstance

/**
 * Tagged logger. Verbosity follows consola's `CONSOLA_LEVEL` environment variable.
 */
export function createLogger(tag: string): Logger {
  return consola.withTag(`graphdoc:${tag}`)
}
