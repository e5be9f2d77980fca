export type { DecodedChunk, InputEvent, MouseAction, MouseButton, SpecialKey } from './decodeInput'
export { decodeChunk, decodeInput } from './decodeInput'
