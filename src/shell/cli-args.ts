import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'

export const USAGE: string = 'usage: graphos [file] [--undirected] [--log <path>] [--config <path>]'

export interface CliArgs {
    readonly filePath: O.Option<string>
    readonly undirected: boolean
    readonly logPath: O.Option<string>
    readonly configPath: O.Option<string>
    readonly help: boolean
}

const VALUE_FLAGS: readonly string[] = ['--log', '--config']
const SWITCHES: readonly string[] = ['--undirected', '--help', '-h']

/** Value following `flag`, none when the flag is absent. */
function flagValue(argv: readonly string[], flag: string): E.Either<string, O.Option<string>> {
    const index: number = argv.indexOf(flag)
    if (index === -1) {
        return E.right(O.none)
    }
    const value: string | undefined = argv[index + 1]
    if (value === undefined || value.startsWith('--')) {
        return E.left(`${flag} needs a path`)
    }
    return E.right(O.some(value))
}

/** Parse the arguments after the script name. */
export function parseCliArgs(argv: readonly string[]): E.Either<string, CliArgs> {
    const logPath = flagValue(argv, '--log')
    if (E.isLeft(logPath)) return logPath
    const configPath = flagValue(argv, '--config')
    if (E.isLeft(configPath)) return configPath

    const flagValueIndexes: ReadonlySet<number> = new Set(
        VALUE_FLAGS.map((flag: string) => argv.indexOf(flag)).filter((index: number) => index !== -1).map((index: number) => index + 1)
    )
    const positional: readonly string[] = argv.filter((arg: string, index: number) =>
        !VALUE_FLAGS.includes(arg) && !SWITCHES.includes(arg) && !flagValueIndexes.has(index)
    )
    const unknownFlag: string | undefined = positional.find((arg: string) => arg.startsWith('-'))
    if (unknownFlag !== undefined) {
        return E.left(`unknown option ${unknownFlag}`)
    }
    if (positional.length > 1) {
        return E.left(`expected at most one file, got ${positional.join(' ')}`)
    }

    return E.right({
        filePath: O.fromNullable(positional[0]),
        undirected: argv.includes('--undirected'),
        logPath: logPath.right,
        configPath: configPath.right,
        help: argv.includes('--help') || argv.includes('-h')
    })
}
