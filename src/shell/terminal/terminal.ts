import type { Logger } from '@/shell/logging/logger'

/** Any read/write failure of the display backend. Always fatal. */
export class TerminalError extends Error {
    constructor(message: string, options?: { readonly cause?: unknown }) {
        super(message, options)
        this.name = 'TerminalError'
    }
}

export interface TerminalSize {
    readonly rows: number
    readonly cols: number
}

/** What the session needs from a terminal; tests pass a recording fake. */
export interface TerminalPort {
    readonly write: (data: string) => void
    readonly size: () => TerminalSize
}

export interface TerminalInput extends NodeJS.ReadableStream {
    readonly isTTY?: boolean
    setRawMode?: (mode: boolean) => unknown
}

export interface TerminalOutput extends NodeJS.WritableStream {
    readonly rows?: number
    readonly columns?: number
}

export interface Terminal extends TerminalPort {
    readonly enter: () => void
    /** Idempotent; safe to call from every exit path. */
    readonly restore: () => void
    readonly onData: (listener: (chunk: string) => void) => void
    readonly onResize: (listener: (size: TerminalSize) => void) => void
    readonly onError: (listener: (error: TerminalError) => void) => void
}

const DEFAULT_SIZE: TerminalSize = { rows: 24, cols: 80 }

// alternate screen, hide cursor, press/release + drag reporting, SGR mouse encoding, clear
export const ENTER_SEQUENCE: string = '\x1b[?1049h\x1b[?25l\x1b[?1000h\x1b[?1002h\x1b[?1006h\x1b[2J'
export const RESTORE_SEQUENCE: string = '\x1b[0m\x1b[?1006l\x1b[?1002l\x1b[?1000l\x1b[?25h\x1b[?1049l'

export function createTerminal(input: TerminalInput, output: TerminalOutput, logger: Logger): Terminal {
    let active: boolean = false
    const dataListeners: Array<(chunk: string) => void> = []
    const resizeListeners: Array<(size: TerminalSize) => void> = []
    const errorListeners: Array<(error: TerminalError) => void> = []

    const size = (): TerminalSize => ({
        rows: output.rows ?? DEFAULT_SIZE.rows,
        cols: output.columns ?? DEFAULT_SIZE.cols
    })

    const write = (data: string): void => {
        if (data === '') {
            return
        }
        try {
            output.write(data)
        } catch (error) {
            throw new TerminalError(`terminal write failed: ${String(error)}`, { cause: error })
        }
    }

    const handleData = (chunk: string | Buffer): void => {
        const text: string = typeof chunk === 'string' ? chunk : chunk.toString('utf-8')
        dataListeners.forEach((listener) => listener(text))
    }
    const handleResize = (): void => {
        const current: TerminalSize = size()
        resizeListeners.forEach((listener) => listener(current))
    }
    const handleError = (error: unknown): void => {
        const wrapped: TerminalError = new TerminalError(`terminal stream failed: ${String(error)}`, { cause: error })
        errorListeners.forEach((listener) => listener(wrapped))
    }

    return {
        write,
        size,
        enter: (): void => {
            if (active) {
                return
            }
            active = true
            input.setRawMode?.(true)
            input.on('data', handleData)
            input.on('error', handleError)
            output.on('resize', handleResize)
            output.on('error', handleError)
            input.resume()
            write(ENTER_SEQUENCE)
            logger.debug(`entered raw mode at ${size().rows}x${size().cols}`)
        },
        restore: (): void => {
            if (!active) {
                return
            }
            active = false
            input.off('data', handleData)
            input.off('error', handleError)
            output.off('resize', handleResize)
            output.off('error', handleError)
            try {
                output.write(RESTORE_SEQUENCE)
                input.setRawMode?.(false)
            } catch (error) {
                // the terminal may already be gone; nothing left to restore
                logger.error(`terminal restore failed: ${String(error)}`)
            }
            input.pause()
            logger.debug('terminal restored')
        },
        onData: (listener): void => {
            dataListeners.push(listener)
        },
        onResize: (listener): void => {
            resizeListeners.push(listener)
        },
        onError: (listener): void => {
            errorListeners.push(listener)
        }
    }
}
