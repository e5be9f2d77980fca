import { describe, it, expect } from 'vitest'
import { arrowGlyph, clipSegment, lineGlyph, rasterizeLine } from './rasterizeLine'

describe('rasterizeLine', () => {
    it('walks a horizontal line including both ends', () => {
        expect(rasterizeLine({ row: 0, col: 0 }, { row: 0, col: 3 })).toEqual([
            { row: 0, col: 0 }, { row: 0, col: 1 }, { row: 0, col: 2 }, { row: 0, col: 3 },
        ])
    })

    it('walks a diagonal one cell per step', () => {
        expect(rasterizeLine({ row: 0, col: 0 }, { row: 2, col: 2 })).toEqual([
            { row: 0, col: 0 }, { row: 1, col: 1 }, { row: 2, col: 2 },
        ])
    })

    it('steps a shallow line down once, halfway', () => {
        expect(rasterizeLine({ row: 0, col: 0 }, { row: 1, col: 4 })).toEqual([
            { row: 0, col: 0 }, { row: 0, col: 1 }, { row: 1, col: 2 }, { row: 1, col: 3 }, { row: 1, col: 4 },
        ])
    })

    it('returns the single cell of a zero-length line', () => {
        expect(rasterizeLine({ row: 4, col: 4 }, { row: 4, col: 4 })).toEqual([{ row: 4, col: 4 }])
    })
})

describe('lineGlyph', () => {
    it.each([
        [5, 0, '─'],
        [4, 1, '─'],
        [0, 3, '│'],
        [1, 4, '│'],
        [3, 3, '╲'],
        [-3, -2, '╲'],
        [3, -3, '╱'],
        [-2, 3, '╱'],
    ])('picks a glyph for a line of %i columns by %i rows', (dCols: number, dRows: number, glyph: string) => {
        expect(lineGlyph(dCols, dRows)).toBe(glyph)
    })
})

describe('arrowGlyph', () => {
    it('points along the line towards the target', () => {
        expect(arrowGlyph({ row: 0, col: 0 }, { row: 0, col: 5 })).toBe('→')
        expect(arrowGlyph({ row: 0, col: 5 }, { row: 0, col: 0 })).toBe('←')
        expect(arrowGlyph({ row: 6, col: 0 }, { row: 0, col: 1 })).toBe('↑')
        expect(arrowGlyph({ row: 0, col: 0 }, { row: 3, col: 3 })).toBe('↘')
        expect(arrowGlyph({ row: 3, col: 3 }, { row: 0, col: 6 })).toBe('↗')
    })
})

describe('clipSegment', () => {
    const box = { minRow: -1, maxRow: 10, minCol: -1, maxCol: 10 }

    it('leaves a segment inside the box untouched', () => {
        expect(clipSegment({ row: 1, col: 1 }, { row: 5, col: 8 }, box)).toEqual({ from: { row: 1, col: 1 }, to: { row: 5, col: 8 } })
    })

    it('cuts a segment at the box edge', () => {
        expect(clipSegment({ row: 2, col: 0 }, { row: 2, col: 1000 }, box)).toEqual({ from: { row: 2, col: 0 }, to: { row: 2, col: 10 } })
    })

    it('drops a segment that misses the box', () => {
        expect(clipSegment({ row: 20, col: 0 }, { row: 20, col: 5 }, box)).toBeUndefined()
    })
})
