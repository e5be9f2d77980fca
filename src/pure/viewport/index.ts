export type { Cell, ScaleLimits, Viewport } from './viewport'
export {
    canvasCenter,
    cellToWorld,
    createViewport,
    fitViewport,
    isCellVisible,
    panViewport,
    projectToCell,
    resizeViewport,
    worldToCell,
    zoomViewport,
} from './viewport'
