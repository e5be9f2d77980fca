import type { MenuItem, MenuTarget } from '@/pure/interaction/types'

const EDGE_ITEMS: readonly MenuItem[] = [
    { label: 'Delete edge', key: 'd' },
]

const CANVAS_ITEMS: readonly MenuItem[] = [
    { label: 'Add node here', key: 'n' },
    { label: 'Fit view', key: 'f' },
    { label: 'Undo', key: 'u' },
    { label: 'Redo', key: 'r' },
    { label: 'Save', key: 's' },
]

export function menuItemsFor(target: MenuTarget, pinned: boolean): readonly MenuItem[] {
    switch (target.type) {
        case 'Node':
            return [
                { label: 'Edit label', key: 'e' },
                { label: pinned ? 'Unpin' : 'Pin', key: 'p' },
                { label: 'Connect from here', key: 'c' },
                { label: 'Add connected node', key: 'n' },
                { label: 'Delete node', key: 'd' },
            ]
        case 'Edge':
            return EDGE_ITEMS
        case 'Canvas':
            return CANVAS_ITEMS
    }
}
