import type { Cell } from '@/pure/viewport'

export type SpecialKey =
    | 'up'
    | 'down'
    | 'left'
    | 'right'
    | 'enter'
    | 'escape'
    | 'backspace'
    | 'delete'
    | 'tab'
    | 'ctrlC'

export type MouseAction = 'down' | 'up' | 'drag' | 'move' | 'wheelUp' | 'wheelDown'
export type MouseButton = 'left' | 'middle' | 'right' | 'none'

export type InputEvent =
    | { readonly type: 'Key'; readonly key: SpecialKey }
    | { readonly type: 'Char'; readonly char: string }
    | { readonly type: 'Mouse'; readonly action: MouseAction; readonly button: MouseButton; readonly cell: Cell }

const ESC: string = '\x1b'

const CONTROL_KEYS: Readonly<Record<string, SpecialKey>> = {
    '\r': 'enter',
    '\n': 'enter',
    '\t': 'tab',
    '\x7f': 'backspace',
    '\b': 'backspace',
    '\x03': 'ctrlC',
}

const CSI_KEYS: Readonly<Record<string, SpecialKey>> = {
    A: 'up',
    B: 'down',
    C: 'right',
    D: 'left',
    '3~': 'delete',
}

const SGR_MOUSE: RegExp = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/
const CSI: RegExp = /^\x1b\[([0-9;]*)([\x40-\x7e])/
// What a CSI or SGR mouse report looks like before its final byte arrives
const CSI_PREFIX: RegExp = /^\x1b\[<?[0-9;]*$/
const MAX_PENDING: number = 32

interface Decoded {
    readonly events: readonly InputEvent[]
    readonly length: number // code units consumed
}

const BUTTONS: readonly MouseButton[] = ['left', 'middle', 'right', 'none']

function mouseEvent(code: number, x: number, y: number, final: string): InputEvent {
    const cell: Cell = { row: y - 1, col: x - 1 }
    if (code & 64) {
        return { type: 'Mouse', action: code & 1 ? 'wheelDown' : 'wheelUp', button: 'none', cell }
    }
    const button: MouseButton = BUTTONS[code & 3] ?? 'none'
    if (final === 'm') {
        return { type: 'Mouse', action: 'up', button, cell }
    }
    if (code & 32) {
        return { type: 'Mouse', action: button === 'none' ? 'move' : 'drag', button, cell }
    }
    return { type: 'Mouse', action: 'down', button, cell }
}

function decodeEscape(rest: string): Decoded {
    const mouse: RegExpExecArray | null = SGR_MOUSE.exec(rest)
    if (mouse) {
        return {
            events: [mouseEvent(Number(mouse[1]), Number(mouse[2]), Number(mouse[3]), mouse[4])],
            length: mouse[0].length,
        }
    }
    const csi: RegExpExecArray | null = CSI.exec(rest)
    if (csi) {
        const key: SpecialKey | undefined = CSI_KEYS[csi[1] + csi[2]] ?? CSI_KEYS[csi[2]]
        return { events: key ? [{ type: 'Key', key }] : [], length: csi[0].length }
    }
    // SS3 arrows, sent by some terminals in application cursor mode
    if (rest[1] === 'O' && rest.length > 2) {
        const key: SpecialKey | undefined = CSI_KEYS[rest[2]]
        return { events: key ? [{ type: 'Key', key }] : [], length: 3 }
    }
    if (rest.startsWith(`${ESC}[`)) {
        // Truncated for good: nothing sensible can be recovered from it
        return { events: [], length: rest.length }
    }
    return { events: [{ type: 'Key', key: 'escape' }], length: 1 }
}

function decodeOne(rest: string): Decoded {
    if (rest[0] === ESC) {
        return decodeEscape(rest)
    }
    if (rest.startsWith('\r\n')) {
        return { events: [{ type: 'Key', key: 'enter' }], length: 2 }
    }
    const control: SpecialKey | undefined = CONTROL_KEYS[rest[0]]
    if (control) {
        return { events: [{ type: 'Key', key: control }], length: 1 }
    }
    const codePoint: number = rest.codePointAt(0) ?? 0
    const char: string = String.fromCodePoint(codePoint)
    return { events: codePoint < 0x20 ? [] : [{ type: 'Char', char }], length: char.length }
}

/**
 * True when `rest` could still grow into a longer escape sequence. A lone
 * ESC counts: the escape key and the start of a sequence look the same
 * until the next byte arrives or the caller gives up waiting.
 */
function isIncompleteEscape(rest: string): boolean {
    return rest.length <= MAX_PENDING
        && (rest === ESC || rest === `${ESC}O` || CSI_PREFIX.test(rest))
}

export interface DecodedChunk {
    readonly events: readonly InputEvent[]
    readonly pending: string // held back; prepend it to the next chunk
}

/**
 * Decode a chunk of a stream. An escape sequence cut off by the end of the
 * chunk is returned as `pending` instead of being decoded.
 */
export function decodeChunk(chunk: string): DecodedChunk {
    const events: InputEvent[] = []
    let offset: number = 0
    while (offset < chunk.length) {
        const rest: string = chunk.slice(offset)
        if (isIncompleteEscape(rest)) {
            return { events, pending: rest }
        }
        const decoded: Decoded = decodeOne(rest)
        events.push(...decoded.events)
        offset += decoded.length
    }
    return { events, pending: '' }
}

/**
 * Decode input known to be complete, e.g. pending bytes that waited too
 * long: a lone ESC is the escape key and a truncated sequence is dropped.
 */
export function decodeInput(input: string): readonly InputEvent[] {
    const events: InputEvent[] = []
    let offset: number = 0
    while (offset < input.length) {
        const decoded: Decoded = decodeOne(input.slice(offset))
        events.push(...decoded.events)
        offset += decoded.length
    }
    return events
}
