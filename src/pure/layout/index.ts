export type { Body, LayoutParams, LayoutState, PositionUpdates, RandomSource, Vector } from './types'
export { DEFAULT_LAYOUT_PARAMS, maxIterationsToConverge } from './DEFAULT_LAYOUT_PARAMS'
export { createLayoutState, reheat, stepLayout, tickLayout } from './forceSimulation'
export type { IterationResult, TickResult } from './forceSimulation'
export { computeCentroid, getNodesNeedingPlacement, seedPositions } from './seedPositions'
export { syncLayoutState } from './syncLayoutState'
export type { SyncResult } from './syncLayoutState'
