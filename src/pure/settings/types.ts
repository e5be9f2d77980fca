import type { GraphMode } from '@/pure/graph'
import type { LayoutParams } from '@/pure/layout'

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly'

export interface GraphosSettings {
    readonly layout: LayoutParams
    /** Milliseconds between layout/render ticks */
    readonly tickIntervalMs: number
    readonly initialScale: number
    readonly minScale: number
    readonly maxScale: number
    /** Factor applied by one zoom key press or wheel step */
    readonly zoomStep: number
    /** How long a status message stays on the HUD */
    readonly statusTimeoutMs: number
    readonly mode: GraphMode
    /** A leading ~ is expanded to the home directory */
    readonly logFile: string
    readonly logLevel: LogLevel
}
