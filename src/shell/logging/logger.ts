import log from 'electron-log/node'
import type { LogLevel } from '@/pure/settings'

export type LogScope = 'session' | 'graph-io' | 'terminal' | 'settings'

/** The subset of an electron-log scope the shell writes through; tests pass a recorder. */
export interface Logger {
    readonly error: (...params: unknown[]) => void
    readonly warn: (...params: unknown[]) => void
    readonly info: (...params: unknown[]) => void
    readonly debug: (...params: unknown[]) => void
}

/**
 * The screen belongs to the renderer, so nothing may reach the console.
 * Safe to call again once settings are known.
 */
export function configureLogging(filePath: string, level: LogLevel): void {
    log.transports.console.level = false
    log.transports.file.level = level
    log.transports.file.resolvePathFn = () => filePath
    log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}'
}

export function getLogger(scope: LogScope): Logger {
    return log.scope(scope)
}
