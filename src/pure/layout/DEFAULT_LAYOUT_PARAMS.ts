import type { LayoutParams } from '@/pure/layout/types'

export const DEFAULT_LAYOUT_PARAMS: LayoutParams = {
    repulsion: 60,
    springStrength: 0.08,
    edgeLength: 10,
    damping: 0.85,
    timeStep: 1,
    minDistance: 1,
    initialTemperature: 4,
    cooling: 0.97,
    convergenceThreshold: 0.01,
    iterationsPerTick: 10,
    seedJitter: 3,
}

/**
 * Upper bound on the iterations needed to converge after a reheat:
 * the step cap cools geometrically, so after this many iterations it is
 * below the threshold.
 */
export function maxIterationsToConverge(params: LayoutParams): number {
    if (params.initialTemperature < params.convergenceThreshold) {
        return 1
    }
    return Math.ceil(Math.log(params.convergenceThreshold / params.initialTemperature) / Math.log(params.cooling)) + 1
}
