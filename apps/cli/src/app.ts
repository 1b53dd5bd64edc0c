import type { Readable } from 'node:stream'
import {
  ConfigurationError,
  createInspector,
  createStderrDiagnosticsSink,
  DebugLogger,
  openSource,
  paint,
  resolveSettings,
  type Settings,
  STDIN_PATH,
  STYLES,
  type TextStream,
} from '@bytesight/core'
import { ArgumentError, parseArgs } from './args'
import { HELP, USAGE } from './help'
import { renderLegend } from './legend'
import { APP_NAME, VERSION } from './version'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export interface CliIo {
  readonly stdout: TextStream
  readonly stderr: TextStream
  /** Opens the input; defaults to a file stream, or stdin for `-`. */
  readonly open?: (path: string | undefined) => Readable
  readonly terminalWidth?: number | undefined
}

export const processIo = (): CliIo => ({
  stdout: process.stdout,
  stderr: process.stderr,
  open: openSource,
  terminalWidth: process.stdout.columns,
})

const reportError = (io: CliIo, error: unknown, debug: boolean): void => {
  const message = error instanceof Error ? error.message : String(error)
  io.stderr.write(`${paint(STYLES.RED, `${paint(STYLES.BOLD, 'ERROR:')} ${message}`)}\n`)

  if (error instanceof ArgumentError) {
    io.stderr.write(`${USAGE}\nTry '${APP_NAME} --help' for more information.\n`)
    return
  }
  if (debug && error instanceof Error && error.stack) {
    io.stderr.write(`${error.stack}\n`)
  } else if (!(error instanceof ConfigurationError)) {
    io.stderr.write(`Run with --debug for details.\n`)
  }
}

const exitCodeFor = (error: unknown): number =>
  error instanceof ArgumentError || error instanceof ConfigurationError
    ? EXIT_USAGE
    : EXIT_FAILURE

const inspect = async (io: CliIo, settings: Settings, file: string | undefined) => {
  const logger = new DebugLogger(
    'cli',
    settings.debug,
    createStderrDiagnosticsSink({ decimalOffsets: settings.decimalOffsets, stream: io.stderr }),
  )
  const inspector = createInspector(settings, { output: io.stdout, logger })
  const source = (io.open ?? openSource)(file ?? STDIN_PATH)
  logger.log(1, () =>
    file === undefined || file === STDIN_PATH ? 'Reading from stdin' : `Opened file: ${file}`,
  )
  const summary = await inspector.inspectStream(source)
  logger.log(1, `Done: ${summary.bytes} byte(s) in ${summary.chunks} chunk(s)`)
}

/**
 * Runs one command line to completion and returns the exit code: 0 on
 * success, 2 for bad arguments or settings, 1 for any other failure.
 */
export const runCli = async (
  argv: ReadonlyArray<string>,
  io: CliIo = processIo(),
): Promise<number> => {
  let debug = false
  try {
    const options = parseArgs(argv)
    const settings = resolveSettings({
      ...(io.terminalWidth === undefined ? {} : { terminalWidth: io.terminalWidth }),
      ...options.settings,
    })
    debug = settings.debug > 0

    switch (options.command) {
      case 'help':
        io.stdout.write(HELP)
        break
      case 'version':
        io.stdout.write(`${APP_NAME} ${VERSION}\n`)
        break
      case 'legend':
        io.stdout.write(renderLegend(settings))
        break
      case 'inspect':
        await inspect(io, settings, options.file)
        break
    }
    return EXIT_OK
  } catch (error) {
    reportError(io, error, debug)
    return exitCodeFor(error)
  }
}
