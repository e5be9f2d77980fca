/**
 * Terminal column width of single code points, enough to keep the frame
 * grid aligned: East Asian wide and fullwidth characters and emoji take two
 * columns, combining marks and other format characters take none.
 */

type Range = readonly [number, number]

const WIDE: readonly Range[] = [
    [0x1100, 0x115f], // Hangul Jamo leading consonants
    [0x231a, 0x231b],
    [0x2329, 0x232a],
    [0x23e9, 0x23ec],
    [0x25fd, 0x25fe],
    [0x2614, 0x2615],
    [0x2648, 0x2653],
    [0x26aa, 0x26ab],
    [0x26bd, 0x26be],
    [0x26c4, 0x26c5],
    [0x2705, 0x2705],
    [0x270a, 0x270b],
    [0x2728, 0x2728],
    [0x274c, 0x274c],
    [0x2753, 0x2755],
    [0x2795, 0x2797],
    [0x2b1b, 0x2b1c],
    [0x2e80, 0x303e], // CJK radicals, punctuation
    [0x3041, 0x33ff], // kana, CJK compatibility
    [0x3400, 0x4dbf], // CJK extension A
    [0x4e00, 0x9fff], // CJK unified ideographs
    [0xa000, 0xa4cf], // Yi
    [0xac00, 0xd7a3], // Hangul syllables
    [0xf900, 0xfaff], // CJK compatibility ideographs
    [0xfe10, 0xfe19],
    [0xfe30, 0xfe6f],
    [0xff00, 0xff60], // fullwidth forms
    [0xffe0, 0xffe6],
    [0x1f004, 0x1f004],
    [0x1f0cf, 0x1f0cf],
    [0x1f18e, 0x1f18e],
    [0x1f191, 0x1f19a],
    [0x1f200, 0x1f2ff],
    [0x1f300, 0x1f64f], // pictographs, emoticons
    [0x1f680, 0x1f6ff], // transport and map symbols
    [0x1f7e0, 0x1f7eb],
    [0x1f900, 0x1faff], // supplemental pictographs
    [0x20000, 0x3fffd], // CJK extensions B onwards
]

const ZERO: readonly Range[] = [
    [0x0000, 0x001f],
    [0x007f, 0x009f],
    [0x0300, 0x036f], // combining diacritics
    [0x0483, 0x0489],
    [0x0591, 0x05bd],
    [0x0610, 0x061a],
    [0x064b, 0x065f],
    [0x200b, 0x200f], // zero-width space, joiners, direction marks
    [0x2028, 0x202e],
    [0x2060, 0x2064],
    [0x20d0, 0x20ff], // combining marks for symbols
    [0xfe00, 0xfe0f], // variation selectors
    [0xfe20, 0xfe2f],
    [0xfeff, 0xfeff],
    [0xe0100, 0xe01ef],
]

function inRanges(codePoint: number, ranges: readonly Range[]): boolean {
    return ranges.some(([first, last]: Range) => codePoint >= first && codePoint <= last)
}

export function cellWidth(ch: string): 0 | 1 | 2 {
    const codePoint: number = ch.codePointAt(0) ?? 0
    if (inRanges(codePoint, ZERO)) return 0
    if (inRanges(codePoint, WIDE)) return 2
    return 1
}

export const NARROW_STAND_IN: string = '?'

/** `ch` when it fills exactly one column, otherwise a one-column stand-in. */
export function toCellChar(ch: string): string {
    return cellWidth(ch) === 1 ? ch : NARROW_STAND_IN
}
