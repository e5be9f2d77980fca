import type { GraphosSettings } from '@/pure/settings/types'
import { DEFAULT_LAYOUT_PARAMS } from '@/pure/layout'

export const DEFAULT_SETTINGS: GraphosSettings = {
    layout: DEFAULT_LAYOUT_PARAMS,
    tickIntervalMs: 33,
    initialScale: 1,
    minScale: 0.1,
    maxScale: 8,
    zoomStep: 1.25,
    statusTimeoutMs: 3000,
    mode: 'directed',
    logFile: '~/.graphos/graphos.log',
    logLevel: 'info',
}
