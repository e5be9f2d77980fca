import type { GraphMode } from '@/pure/graph'

export interface HudInfo {
    readonly modeName: string // interaction mode shown to the user
    readonly graphMode: GraphMode
    readonly status: string
    readonly scale: number
    readonly nodeCount: number
    readonly edgeCount: number
    readonly fileName: string
    readonly settling: boolean // layout still running
}

export function formatHud(info: HudInfo): string {
    const segments: readonly string[] = [
        ` ${info.modeName}`,
        info.fileName === '' ? '[new graph]' : info.fileName,
        `${info.nodeCount} nodes ${info.edgeCount} edges${info.graphMode === 'undirected' ? ' (undirected)' : ''}`,
        `zoom ${info.scale.toFixed(2)}x${info.settling ? ' ~' : ''}`,
        info.status,
    ]
    return segments.filter((segment: string) => segment !== '').join(' │ ')
}
