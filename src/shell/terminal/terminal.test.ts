import { describe, expect, it } from 'vitest'
import { PassThrough } from 'stream'
import type { Logger } from '@/shell/logging/logger'
import { ENTER_SEQUENCE, RESTORE_SEQUENCE, TerminalError, createTerminal } from './terminal'

const quietLogger: Logger = { error: () => undefined, warn: () => undefined, info: () => undefined, debug: () => undefined }

function captureOutput(output: PassThrough): string[] {
    const written: string[] = []
    output.on('data', (chunk: Buffer) => {
        written.push(chunk.toString('utf-8'))
    })
    return written
}

describe('terminal', () => {
    it('enters once and restores once, whatever the number of calls', async () => {
        const input: PassThrough = new PassThrough()
        const output: PassThrough = new PassThrough()
        const written: string[] = captureOutput(output)
        const terminal = createTerminal(input, output, quietLogger)

        terminal.enter()
        terminal.enter()
        terminal.restore()
        terminal.restore()

        await new Promise((resolve) => setImmediate(resolve))
        expect(written.join('')).toBe(ENTER_SEQUENCE + RESTORE_SEQUENCE)
    })

    it('forwards input chunks as text while active', () => {
        const input: PassThrough = new PassThrough()
        const terminal = createTerminal(input, new PassThrough(), quietLogger)
        const received: string[] = []
        terminal.onData((chunk: string) => received.push(chunk))

        terminal.enter()
        input.emit('data', Buffer.from('q'))
        terminal.restore()
        input.emit('data', Buffer.from('x'))

        expect(received).toEqual(['q'])
    })

    it('falls back to 24x80 when the output is not a tty', () => {
        expect(createTerminal(new PassThrough(), new PassThrough(), quietLogger).size()).toEqual({ rows: 24, cols: 80 })
    })

    it('wraps stream errors in a TerminalError', () => {
        const output: PassThrough = new PassThrough()
        const terminal = createTerminal(new PassThrough(), output, quietLogger)
        const errors: TerminalError[] = []
        terminal.onError((error: TerminalError) => errors.push(error))

        terminal.enter()
        output.emit('error', new Error('EPIPE'))

        expect(errors).toHaveLength(1)
        expect(errors[0]).toBeInstanceOf(TerminalError)
        expect(errors[0].message).toBe('terminal stream failed: Error: EPIPE')
    })
})
