import fs from "node:fs/promises"
import path from "node:path"
import { type ConfigDocument, CfgSyntaxError, type DocumentNotice, parse } from "@gantry/cfg"
import { createNullLogger, type Logger } from "@gantry/logger"
import { ConfigFileError } from "./errors"

export type LoadPrinterConfigOptions = {
  /** @default process.cwd() */
  cwd?: string
  logger?: Logger
}

/**
 * Reads and parses one printer configuration file.
 *
 * Duplicate keys and sections are accepted (the last one wins) and each is
 * logged as a warning.
 *
 * @throws {ConfigFileError} when the file cannot be read or does not parse.
 * For a syntax error the message carries the offending line and the context
 * carries `line` and `column`.
 */
export async function loadPrinterConfig(
  file: string,
  { cwd = process.cwd(), logger = createNullLogger() }: LoadPrinterConfigOptions = {},
): Promise<ConfigDocument> {
  const log = logger.child({ module: "printer-config", file })

  let source: string
  try {
    source = await fs.readFile(path.resolve(cwd, file), "utf-8")
  } catch (err) {
    const error = ConfigFileError.fromReadError(file, err)
    log.error("cannot read printer config", { err: error })
    throw error
  }

  let document: ConfigDocument
  try {
    document = parse(source)
  } catch (err) {
    if (!(err instanceof CfgSyntaxError)) throw err

    const error = ConfigFileError.fromSyntaxError(file, source, err)
    log.error("printer config has a syntax error", {
      err: error,
      line: err.position.line,
      column: err.position.column,
    })
    throw error
  }

  for (const notice of document.notices) {
    log.warn(describeNotice(notice), {
      line: notice.span.start.line,
      section: notice.section,
      ...(notice.kind === "duplicate_key" && { key: notice.key }),
    })
  }

  log.info("printer config loaded", { sections: document.size })
  return document
}

function describeNotice(notice: DocumentNotice): string {
  const first = notice.previous.start.line

  return notice.kind === "duplicate_key"
    ? `'${notice.key}' repeats the one on line ${first}; the later value is used`
    : `[${notice.section}] repeats the section on line ${first}; lookups use the later one`
}
