import { describe, it, expect } from 'vitest'
import { getUniqueLabel } from './uniqueLabel'

describe('getUniqueLabel', () => {
    it('keeps a free label and suffixes a taken one until it is free', () => {
        expect(getUniqueLabel('n4', new Set(['A']))).toBe('n4')
        expect(getUniqueLabel('n4', new Set(['n4', 'n4_1']))).toBe('n4_1_1')
    })

    it('compares keys rather than raw labels', () => {
        const underscored = (label: string): string => label.replace(/\s+/g, '_')
        expect(getUniqueLabel('x y', new Set(['x_y']), underscored)).toBe('x y_1')
        expect(getUniqueLabel('x y', new Set(['x y']), underscored)).toBe('x y')
    })
})
