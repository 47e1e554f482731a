import { describe, it, expect } from 'vitest'

import { HeaderMap } from '../../src/core/HeaderMap.js'
import { HttpException, BodyRejection } from '../../src/core/HttpException.js'
import { Response, type ResponseParts } from '../../src/core/Response.js'
import { StatusCode } from '../../src/core/StatusCode.js'
import {
    Json,
    intoResponse,
    isResponder,
    type IntoResponseParts,
    type PartsResult,
    type Responder
} from '../../src/response/IntoResponse.js'

describe('intoResponse', () => {
    it('status code alone gives that status and an empty body', () => {
        const res = intoResponse(StatusCode.NO_CONTENT)
        expect(res.status).toBe(204)
        expect(res.body.length).toBe(0)
        expect(res.headers.size).toBe(0)
    })

    it('string gives 200 text/plain with UTF-8 bytes', () => {
        const res = intoResponse('héllo')
        expect(res.status).toBe(200)
        expect(res.headers.get('content-type')).toBe('text/plain;charset=utf-8')
        expect(res.body).toEqual(Buffer.from('héllo', 'utf8'))
    })

    it('byte buffers give 200 application/octet-stream', () => {
        const fromBuffer = intoResponse(Buffer.from([1, 2, 3]))
        expect(fromBuffer.status).toBe(200)
        expect(fromBuffer.headers.get('Content-Type')).toBe('application/octet-stream')
        expect([...fromBuffer.body]).toEqual([1, 2, 3])

        const view = new Uint8Array([9, 8, 7, 6]).subarray(1, 3)
        const fromView = intoResponse(view)
        expect([...fromView.body]).toEqual([8, 7])
    })

    it('a built response passes through unchanged', () => {
        const built = new Response(418, new HeaderMap({ 'X-Tea': 'pot' }), Buffer.from('short and stout'))
        expect(intoResponse(built)).toBe(built)
    })

    it('Json serializes its value', () => {
        const res = intoResponse(new Json({ id: 7, tags: ['a'] }))
        expect(res.status).toBe(200)
        expect(res.headers.get('Content-Type')).toBe('application/json; charset=utf-8')
        expect(res.text()).toBe('{"id":7,"tags":["a"]}')
    })

    it('(CREATED, "ok") keeps the text headers and body and sets 201', () => {
        const res = intoResponse([StatusCode.CREATED, 'ok'])
        expect(res.status).toBe(201)
        expect(res.headers.get('Content-Type')).toBe('text/plain;charset=utf-8')
        expect(res.text()).toBe('ok')
    })

    it('applies parts left to right', () => {
        const res = intoResponse([
            StatusCode.ACCEPTED,
            new HeaderMap({ 'X-Step': 'one' }),
            new HeaderMap({ 'x-step': 'two', 'Content-Type': 'text/csv' }),
            'a,b'
        ])
        expect(res.status).toBe(202)
        expect(res.headers.getAll('X-Step')).toEqual(['two'])
        expect(res.headers.get('content-type')).toBe('text/csv')
        expect(res.text()).toBe('a,b')
    })

    it('a failing part short-circuits into its error response', () => {
        const applied: string[] = []
        const failing: IntoResponseParts = {
            intoResponseParts(): PartsResult<Responder> {
                applied.push('failing')
                return { ok: false, error: [StatusCode.BAD_REQUEST, 'bad part'] }
            }
        }
        const tracking: IntoResponseParts = {
            intoResponseParts(parts: ResponseParts): PartsResult<Responder> {
                applied.push('tracking')
                return { ok: true, value: parts }
            }
        }

        const res = intoResponse([failing, tracking, 'never sent'])
        expect(applied).toEqual(['failing'])
        expect(res.status).toBe(400)
        expect(res.text()).toBe('bad part')
    })

    it('parts do not mutate the response produced by the body', () => {
        const built = new Response(200, new HeaderMap({ 'X-A': '1' }), Buffer.from('x'))
        const res = intoResponse([new HeaderMap({ 'X-A': '2' }), built])
        expect(res.headers.get('X-A')).toBe('2')
        expect(built.headers.get('X-A')).toBe('1')
    })

    it('converts nested tuples as the body', () => {
        const res = intoResponse([new HeaderMap({ 'X-Outer': 'y' }), [StatusCode.CREATED, 'inner']])
        expect(res.status).toBe(201)
        expect(res.headers.get('X-Outer')).toBe('y')
        expect(res.text()).toBe('inner')
    })

    it('HttpException exposes the message for client errors only', () => {
        const client = intoResponse(new HttpException(409, 'Already exists'))
        expect(client.status).toBe(409)
        expect(client.text()).toBe('{"error":"Already exists"}')

        const server = intoResponse(new HttpException(503, 'db pool exhausted', false, { 'Retry-After': '5' }))
        expect(server.status).toBe(503)
        expect(server.headers.get('Retry-After')).toBe('5')
        expect(server.text()).toBe('{"error":"Service Unavailable"}')
    })

    it('body rejections answer a fixed 500 diagnostic', () => {
        for (const kind of ['io', 'invalid-utf8'] as const) {
            const res = intoResponse(new BodyRejection(kind))
            expect(res.status).toBe(500)
            expect(res.text()).toBe('error reading body')
        }
    })

    it('refuses tuples whose leading elements are not parts', () => {
        const bogus: unknown = ['not a part', 'body']
        expect(isResponder(bogus)).toBe(true)
        if (isResponder(bogus)) {
            expect(() => intoResponse(bogus)).toThrow('Tuple element 0 of type string is not a response part')
        }
    })

    it('isResponder rejects plain values', () => {
        expect(isResponder(42)).toBe(false)
        expect(isResponder(null)).toBe(false)
        expect(isResponder({ id: 1 })).toBe(false)
        expect(isResponder(undefined)).toBe(false)
    })
})

describe('Response', () => {
    it('is frozen after construction', () => {
        const res = new Response(200)
        expect(Object.isFrozen(res)).toBe(true)
    })

    it('round-trips through parts with a detached header map', () => {
        const res = new Response(201, new HeaderMap({ 'X-Id': '1' }), Buffer.from('body'))
        const [parts, body] = res.intoParts()
        parts.status = 202
        parts.headers.set('X-Id', '2')
        const rebuilt = Response.fromParts(parts, body)

        expect(rebuilt.status).toBe(202)
        expect(rebuilt.headers.get('X-Id')).toBe('2')
        expect(rebuilt.text()).toBe('body')
        expect(res.headers.get('X-Id')).toBe('1')
    })
})

describe('StatusCode', () => {
    it('knows its reason phrase and class', () => {
        expect(StatusCode.NOT_FOUND.canonicalReason).toBe('Not Found')
        expect(String(StatusCode.CREATED)).toBe('201 Created')
        expect(StatusCode.OK.isSuccess()).toBe(true)
        expect(StatusCode.BAD_REQUEST.isClientError()).toBe(true)
        expect(StatusCode.INTERNAL_SERVER_ERROR.isServerError()).toBe(true)
    })

    it('rejects codes outside 100..999', () => {
        expect(() => new StatusCode(99)).toThrow(RangeError)
        expect(() => new StatusCode(1000)).toThrow(RangeError)
    })
})
