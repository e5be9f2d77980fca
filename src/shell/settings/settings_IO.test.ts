import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import * as O from 'fp-ts/lib/Option.js'
import { DEFAULT_SETTINGS } from '@/pure/settings'
import type { Logger } from '@/shell/logging/logger'
import { expandHome, getSettingsPath, loadSettings } from './settings_IO'

interface RecordingLogger extends Logger {
    readonly lines: string[]
}

function recordingLogger(): RecordingLogger {
    const lines: string[] = []
    const record = (level: string) => (...params: unknown[]): void => {
        lines.push(`${level}: ${params.map(String).join(' ')}`)
    }
    return { lines, error: record('error'), warn: record('warn'), info: record('info'), debug: record('debug') }
}

describe('settings_IO', () => {
    let dir: string

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'graphos-settings-'))
    })

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true })
    })

    it('prefers --config over the environment variable', () => {
        expect(getSettingsPath(O.some('/etc/g.json'), { GRAPHOS_CONFIG: '/tmp/env.json' })).toBe('/etc/g.json')
        expect(getSettingsPath(O.none, { GRAPHOS_CONFIG: '/tmp/env.json' })).toBe('/tmp/env.json')
        expect(getSettingsPath(O.none, {})).toBe(path.join(os.homedir(), '.graphos', 'settings.json'))
    })

    it('expands a leading tilde only', () => {
        expect(expandHome('~/logs/g.log', '/home/test')).toBe('/home/test/logs/g.log')
        expect(expandHome('/var/~/g.log', '/home/test')).toBe('/var/~/g.log')
    })

    it('uses the defaults quietly when the file is missing', async () => {
        const logger: RecordingLogger = recordingLogger()

        const settings = await loadSettings(path.join(dir, 'absent.json'), logger)

        expect(settings).toBe(DEFAULT_SETTINGS)
        expect(logger.lines.filter((line: string) => line.startsWith('warn'))).toEqual([])
    })

    it('merges a partial file and warns about unknown keys', async () => {
        const file: string = path.join(dir, 'settings.json')
        await fs.writeFile(file, JSON.stringify({ zoomStep: 2, layout: { repulsion: 90, gravity: 1 }, colour: 'red' }))
        const logger: RecordingLogger = recordingLogger()

        const settings = await loadSettings(file, logger)

        expect(settings.zoomStep).toBe(2)
        expect(settings.layout.repulsion).toBe(90)
        expect(settings.layout.cooling).toBe(DEFAULT_SETTINGS.layout.cooling)
        expect(logger.lines).toContain(`warn: ignoring unknown settings in ${file}: colour, layout.gravity`)
    })

    it('falls back to the defaults on invalid JSON or values', async () => {
        const broken: string = path.join(dir, 'broken.json')
        const invalid: string = path.join(dir, 'invalid.json')
        await fs.writeFile(broken, '{ zoomStep: ')
        await fs.writeFile(invalid, JSON.stringify({ zoomStep: 0.5 }))
        const logger: RecordingLogger = recordingLogger()

        expect(await loadSettings(broken, logger)).toBe(DEFAULT_SETTINGS)
        expect(await loadSettings(invalid, logger)).toBe(DEFAULT_SETTINGS)
        expect(logger.lines.filter((line: string) => line.startsWith('warn'))).toHaveLength(2)
    })
})
