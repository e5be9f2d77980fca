import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { GraphMode } from '@/pure/graph'
import type { ParsedEdgeList } from '@/pure/graph/edge-list'
import type { GraphosSettings } from '@/pure/settings'
import { DEFAULT_SETTINGS } from '@/pure/settings'
import type { CliArgs } from '@/shell/cli-args'
import { USAGE, parseCliArgs } from '@/shell/cli-args'
import { loadEdgeList } from '@/shell/graph/graph-commands'
import { describeLoad, readGraphFile, writeGraphFile } from '@/shell/graph/graph-file'
import { configureLogging, getLogger } from '@/shell/logging/logger'
import type { Logger } from '@/shell/logging/logger'
import type { Session } from '@/shell/session/session'
import { createSession } from '@/shell/session/session'
import { expandHome, getSettingsPath, loadSettings } from '@/shell/settings/settings_IO'
import { resetGraph } from '@/shell/state/graph-store'
import type { LayoutEngine } from '@/shell/state/layout-engine'
import { createLayoutEngine } from '@/shell/state/layout-engine'
import type { Terminal } from '@/shell/terminal/terminal'
import { createTerminal } from '@/shell/terminal/terminal'

const EXIT_OK: number = 0
const EXIT_FAILURE: number = 1
const EXIT_USAGE: number = 2

function describeError(error: unknown): string {
    return error instanceof Error ? (error.stack ?? error.message) : String(error)
}

/**
 * Drive the session until it quits: stdin chunks, resizes and the tick timer
 * all run on the event loop, one at a time. Resolves with the exit code once
 * the terminal is restored.
 */
function runSession(
    terminal: Terminal,
    layout: LayoutEngine,
    settings: GraphosSettings,
    filePath: O.Option<string>,
    initialStatus: O.Option<string>,
    logger: Logger
): Promise<number> {
    return new Promise<number>((resolve) => {
        let finished: boolean = false
        let timer: NodeJS.Timeout | undefined = undefined

        const finish = (code: number): void => {
            if (finished) {
                return
            }
            finished = true
            if (timer !== undefined) clearInterval(timer)
            process.off('SIGTERM', onSignal)
            process.off('SIGHUP', onSignal)
            process.off('uncaughtException', fatal)
            layout.dispose()
            terminal.restore()
            logger.info(`session ended with status ${code}`)
            resolve(code)
        }

        function fatal(error: unknown): void {
            logger.error(`fatal: ${describeError(error)}`)
            finish(EXIT_FAILURE)
            process.stderr.write(`graphos: ${error instanceof Error ? error.message : String(error)}\n`)
        }

        function onSignal(signal: NodeJS.Signals): void {
            logger.warn(`received ${signal}`)
            finish(EXIT_FAILURE)
        }

        const guard = (step: () => void): void => {
            if (finished) {
                return
            }
            try {
                step()
            } catch (error) {
                fatal(error)
            }
        }

        const session: Session = createSession({
            terminal,
            settings,
            layout,
            logger,
            filePath,
            saveGraph: (path, graph) => writeGraphFile(path, graph, getLogger('graph-io')),
            now: () => Date.now(),
            onQuit: () => finish(EXIT_OK)
        })

        process.on('SIGTERM', onSignal)
        process.on('SIGHUP', onSignal)
        process.on('uncaughtException', fatal)
        terminal.onData((chunk: string) => guard(() => session.handleInput(chunk)))
        terminal.onResize((size) => guard(() => session.handleResize(size)))
        terminal.onError(fatal)

        guard(() => {
            terminal.enter()
            session.start(initialStatus)
        })
        if (!finished) {
            timer = setInterval(() => guard(session.tick), settings.tickIntervalMs)
        }
    })
}

async function main(argv: readonly string[]): Promise<number> {
    const parsedArgs: E.Either<string, CliArgs> = parseCliArgs(argv)
    if (E.isLeft(parsedArgs)) {
        process.stderr.write(`graphos: ${parsedArgs.left}\n${USAGE}\n`)
        return EXIT_USAGE
    }
    const args: CliArgs = parsedArgs.right
    if (args.help) {
        process.stdout.write(`${USAGE}\n`)
        return EXIT_OK
    }

    const cliLogPath: O.Option<string> = O.map(expandHome)(args.logPath)
    configureLogging(O.getOrElse(() => expandHome(DEFAULT_SETTINGS.logFile))(cliLogPath), DEFAULT_SETTINGS.logLevel)
    const settings: GraphosSettings = await loadSettings(getSettingsPath(args.configPath), getLogger('settings'))
    configureLogging(O.getOrElse(() => expandHome(settings.logFile))(cliLogPath), settings.logLevel)

    const logger: Logger = getLogger('session')
    const mode: GraphMode = args.undirected ? 'undirected' : settings.mode
    logger.info(`starting (${mode})`)

    if (!process.stdin.isTTY || !process.stdout.isTTY) {
        process.stderr.write('graphos: needs an interactive terminal\n')
        return EXIT_FAILURE
    }

    resetGraph(mode)
    const layout: LayoutEngine = createLayoutEngine(settings.layout)

    let initialStatus: O.Option<string> = O.none
    if (O.isSome(args.filePath)) {
        const filePath: string = args.filePath.value
        let parsed: O.Option<ParsedEdgeList>
        try {
            parsed = await readGraphFile(filePath, getLogger('graph-io'))
        } catch (error) {
            logger.error(`cannot read ${filePath}: ${describeError(error)}`)
            process.stderr.write(`graphos: cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}\n`)
            layout.dispose()
            return EXIT_FAILURE
        }
        if (O.isSome(parsed)) {
            loadEdgeList(parsed.value.entries)
        }
        initialStatus = O.some(describeLoad(filePath, parsed))
    }

    const terminal: Terminal = createTerminal(process.stdin, process.stdout, getLogger('terminal'))
    return runSession(terminal, layout, settings, args.filePath, initialStatus, logger)
}

void main(process.argv.slice(2)).then(
    (code: number) => process.exit(code),
    (error: unknown) => {
        process.stderr.write(`graphos: ${describeError(error)}\n`)
        process.exit(EXIT_FAILURE)
    }
)
