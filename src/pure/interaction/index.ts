export type {
    InteractionEffect,
    InteractionMode,
    InteractionState,
    InteractionView,
    MenuItem,
    MenuTarget,
    Selection,
    Transition,
} from './types'
export { menuItemsFor } from './contextMenu'
export {
    PAN_COLS,
    PAN_ROWS,
    createInteractionState,
    modeName,
    reconcileInteraction,
    reduceInteraction,
} from './reduceInteraction'
export { EDIT_LABEL_TITLE, interactionOverlays } from './interactionOverlays'
