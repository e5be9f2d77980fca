import * as O from 'fp-ts/lib/Option.js'
import type { Overlays } from '@/pure/render'
import type { InteractionState, MenuItem } from '@/pure/interaction/types'

export const EDIT_LABEL_TITLE: string = 'Edit label'

/** Everything the interaction state draws over the graph. */
export function interactionOverlays(state: InteractionState, hud: string): Overlays {
    const { mode } = state
    return {
        rubberBand: mode.type === 'EdgeDrawing' ? O.some({ source: mode.source, to: mode.cell }) : O.none,
        cursor: mode.type === 'Editing' ? O.none : O.some(state.cursor),
        menu: mode.type === 'Menu'
            ? O.some({ anchor: mode.anchor, items: mode.items.map((item: MenuItem) => item.label), highlighted: mode.highlighted })
            : O.none,
        modal: mode.type === 'Editing' ? O.some({ title: EDIT_LABEL_TITLE, text: mode.buffer }) : O.none,
        hud,
    }
}
