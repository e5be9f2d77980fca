import * as E from 'fp-ts/lib/Either.js'
import { z } from 'zod'
import type { GraphosSettings } from '@/pure/settings/types'
import { DEFAULT_SETTINGS } from '@/pure/settings/DEFAULT_SETTINGS'

const positive: z.ZodNumber = z.number().positive()

const layoutSchema = z.object({
    repulsion: z.number().nonnegative(),
    springStrength: z.number().nonnegative(),
    edgeLength: positive,
    damping: z.number().gt(0).lte(1),
    timeStep: positive,
    minDistance: positive,
    initialTemperature: positive,
    cooling: z.number().gt(0).lt(1),
    convergenceThreshold: positive,
    iterationsPerTick: z.number().int().positive(),
    seedJitter: z.number().nonnegative(),
})

const settingsSchema = z.object({
    layout: layoutSchema.partial(),
    tickIntervalMs: z.number().int().positive(),
    initialScale: positive,
    minScale: positive,
    maxScale: positive,
    zoomStep: z.number().gt(1),
    statusTimeoutMs: z.number().int().nonnegative(),
    mode: z.enum(['directed', 'undirected']),
    logFile: z.string().min(1),
    logLevel: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']),
}).partial()

export type SettingsOverrides = z.infer<typeof settingsSchema>

export interface ResolvedSettings {
    readonly settings: GraphosSettings
    /** Keys the file sets that no setting knows, dotted for nested ones */
    readonly unknownKeys: readonly string[]
}

function keysOf(value: unknown): readonly string[] {
    return typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.keys(value) : []
}

function findUnknownKeys(raw: unknown): readonly string[] {
    const known: ReadonlySet<string> = new Set(Object.keys(settingsSchema.shape))
    const knownLayout: ReadonlySet<string> = new Set(Object.keys(layoutSchema.shape))
    const layout: unknown = typeof raw === 'object' && raw !== null && 'layout' in raw ? raw.layout : undefined
    return [
        ...keysOf(raw).filter((key: string) => !known.has(key)),
        ...keysOf(layout).filter((key: string) => !knownLayout.has(key)).map((key: string) => `layout.${key}`),
    ]
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue: z.ZodIssue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ')
}

/** Defaults overridden by `overrides`, nested layout parameters merged one by one. */
export function mergeSettings(base: GraphosSettings, overrides: SettingsOverrides): GraphosSettings {
    const { layout, ...rest } = overrides
    return { ...base, ...rest, layout: { ...base.layout, ...layout } }
}

/**
 * Validate the parsed contents of a settings file. Unknown keys are not an
 * error: they are reported and ignored. A value of the wrong type or out of
 * range rejects the whole file.
 */
export function resolveSettings(raw: unknown, base: GraphosSettings = DEFAULT_SETTINGS): E.Either<string, ResolvedSettings> {
    const parsed = settingsSchema.safeParse(raw)
    if (!parsed.success) {
        return E.left(formatIssues(parsed.error))
    }
    const settings: GraphosSettings = mergeSettings(base, parsed.data)
    if (settings.minScale > settings.maxScale) {
        return E.left(`minScale (${settings.minScale}) is larger than maxScale (${settings.maxScale})`)
    }
    if (settings.initialScale < settings.minScale || settings.initialScale > settings.maxScale) {
        return E.left(`initialScale (${settings.initialScale}) is outside [${settings.minScale}, ${settings.maxScale}]`)
    }
    return E.right({ settings, unknownKeys: findUnknownKeys(raw) })
}
