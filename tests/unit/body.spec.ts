import { describe, it, expect, beforeEach } from 'vitest'
import { PassThrough } from 'node:stream'

import { Body } from '../../src/core/Body.js'
import { BodyAlreadyConsumed, BodyRejection, HttpException } from '../../src/core/HttpException.js'

describe('Body.bytes', () => {
    let stream: PassThrough
    let body: Body

    beforeEach(() => {
        stream = new PassThrough()
        body = new Body(stream)
    })

    // Given a streamed body within the limit
    // When it is drained
    // Then every chunk comes back in order
    it('should resolve with the concatenated chunks', async () => {
        const promise = body.bytes(1024)
        stream.write('hello ')
        stream.end('world')
        await expect(promise).resolves.toEqual(Buffer.from('hello world'))
    })

    it('should resolve with an empty buffer for an empty stream', async () => {
        const promise = body.bytes(1024)
        stream.end()
        await expect(promise).resolves.toEqual(Buffer.alloc(0))
    })

    // Given a body exceeding the limit
    // When it is drained
    // Then it rejects with 413 and keeps draining the stream
    it('should reject with 413 past the limit and not double-settle', async () => {
        const promise = body.bytes(10)
        stream.write(Buffer.from('a'.repeat(10)))
        stream.write(Buffer.from('b'))

        await expect(promise).rejects.toThrow(new HttpException(413, 'Content Too Large', true))
        expect(stream.destroyed).toBe(false)

        const drained = new Promise(resolve => stream.once('end', resolve))
        stream.end('c')
        await drained
    })

    it('should reject with an io BodyRejection when the stream errors', async () => {
        const promise = body.bytes(1024)
        stream.destroy(new Error('socket hang up'))

        const err = await promise.catch((e: unknown) => e)
        expect(err).toBeInstanceOf(BodyRejection)
        expect(err instanceof BodyRejection && err.kind).toBe('io')
    })

    it('should refuse a second read', async () => {
        stream.end('once')
        await body.bytes(1024)
        expect(body.consumed).toBe(true)
        await expect(body.bytes(1024)).rejects.toBeInstanceOf(BodyAlreadyConsumed)
    })
})

describe('Body from bytes', () => {
    it('returns the buffer as is', async () => {
        const body = new Body('ready')
        await expect(body.bytes(100)).resolves.toEqual(Buffer.from('ready'))
    })

    it('applies the limit to materialized bytes too', async () => {
        const body = new Body(Buffer.alloc(5))
        await expect(body.bytes(4)).rejects.toThrow('Content Too Large')
    })
})
