import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import * as E from 'fp-ts/lib/Either.js'
import * as O from 'fp-ts/lib/Option.js'
import type { GraphosSettings, ResolvedSettings } from '@/pure/settings'
import { DEFAULT_SETTINGS, resolveSettings } from '@/pure/settings'
import type { Logger } from '@/shell/logging/logger'

export const SETTINGS_ENV_VAR: string = 'GRAPHOS_CONFIG'

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error
}

/** Expand a leading ~ to the home directory. */
export function expandHome(filePath: string, homeDir: string = os.homedir()): string {
    if (filePath === '~') {
        return homeDir
    }
    return filePath.startsWith('~/') ? path.join(homeDir, filePath.slice(2)) : filePath
}

/** --config, else $GRAPHOS_CONFIG, else ~/.graphos/settings.json */
export function getSettingsPath(explicit: O.Option<string>, env: NodeJS.ProcessEnv = process.env): string {
    const chosen: string = O.getOrElse((): string => env[SETTINGS_ENV_VAR] ?? '~/.graphos/settings.json')(explicit)
    return expandHome(chosen)
}

/**
 * Read and validate the settings file.
 * A missing file, invalid JSON or a schema violation all fall back to the defaults;
 * only the latter two are worth a warning.
 */
export async function loadSettings(settingsPath: string, logger: Logger): Promise<GraphosSettings> {
    let data: string
    try {
        data = await fs.readFile(settingsPath, 'utf-8')
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            logger.debug(`no settings file at ${settingsPath}, using defaults`)
            return DEFAULT_SETTINGS
        }
        logger.warn(`cannot read settings file ${settingsPath}: ${String(error)}; using defaults`)
        return DEFAULT_SETTINGS
    }

    let raw: unknown
    try {
        raw = JSON.parse(data)
    } catch (error) {
        logger.warn(`settings file ${settingsPath} is not valid JSON (${String(error)}); using defaults`)
        return DEFAULT_SETTINGS
    }

    const resolved: E.Either<string, ResolvedSettings> = resolveSettings(raw)
    if (E.isLeft(resolved)) {
        logger.warn(`invalid settings in ${settingsPath}: ${resolved.left}; using defaults`)
        return DEFAULT_SETTINGS
    }
    if (resolved.right.unknownKeys.length > 0) {
        logger.warn(`ignoring unknown settings in ${settingsPath}: ${resolved.right.unknownKeys.join(', ')}`)
    }
    logger.info(`loaded settings from ${settingsPath}`)
    return resolved.right.settings
}
