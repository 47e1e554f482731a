import { HeaderMap } from '../core/HeaderMap.js'
import { Response, type ResponseParts } from '../core/Response.js'
import { StatusCode } from '../core/StatusCode.js'

/** Type of an error that can never happen. */
export type Infallible = never

export type PartsResult<E> =
    | { ok: true, value: ResponseParts }
    | { ok: false, error: E }

export interface IntoResponse {
    intoResponse(): Response
}

/**
 * Something that edits the status and headers of a response produced by
 * another value. On failure its error is converted instead.
 */
export interface IntoResponseParts {
    intoResponseParts(parts: ResponseParts): PartsResult<Responder>
}

export type ResponseTuple =
    readonly [IntoResponseParts, ...IntoResponseParts[], Responder]

/** Every value a handler may return. */
export type Responder =
    | Response
    | StatusCode
    | string
    | Uint8Array
    | IntoResponse
    | ResponseTuple

const TEXT_PLAIN = 'text/plain;charset=utf-8'
const OCTET_STREAM = 'application/octet-stream'

export function isIntoResponse(v: unknown): v is IntoResponse {
    return typeof v === 'object' && v !== null
        && 'intoResponse' in v && typeof v.intoResponse === 'function'
}

export function isIntoResponseParts(v: unknown): v is IntoResponseParts {
    return typeof v === 'object' && v !== null
        && 'intoResponseParts' in v && typeof v.intoResponseParts === 'function'
}

export function intoResponse(value: Responder): Response {
    if (value instanceof Response) {
        return value
    }
    if (value instanceof StatusCode) {
        return new Response(value.code)
    }
    if (typeof value === 'string') {
        return new Response(200, new HeaderMap({ 'Content-Type': TEXT_PLAIN }), Buffer.from(value, 'utf8'))
    }
    if (value instanceof Uint8Array) {
        const body = Buffer.isBuffer(value) ? value : Buffer.from(value.buffer, value.byteOffset, value.byteLength)
        return new Response(200, new HeaderMap({ 'Content-Type': OCTET_STREAM }), body)
    }
    if (isResponseTuple(value)) {
        return tupleIntoResponse(value)
    }
    if (isIntoResponse(value)) {
        return value.intoResponse()
    }
    throw new TypeError(`Value of type ${describe(value)} cannot be converted into a response`)
}

function isResponseTuple(v: unknown): v is ResponseTuple {
    return Array.isArray(v)
}

export function isResponder(v: unknown): v is Responder {
    return v instanceof Response
        || v instanceof StatusCode
        || typeof v === 'string'
        || v instanceof Uint8Array
        || isResponseTuple(v)
        || isIntoResponse(v)
}

function tupleIntoResponse(tuple: ResponseTuple): Response {
    if (tuple.length < 2) {
        throw new TypeError('Response tuple needs at least one part and a body')
    }
    const last = tuple[tuple.length - 1]
    if (!isResponder(last)) {
        throw new TypeError(`Last tuple element of type ${describe(last)} cannot be converted into a response`)
    }
    const [initial, body] = intoResponse(last).intoParts()

    let parts = initial
    for (let i = 0; i < tuple.length - 1; i++) {
        const part = tuple[i]
        if (!isIntoResponseParts(part)) {
            throw new TypeError(`Tuple element ${i} of type ${describe(part)} is not a response part`)
        }
        const res = part.intoResponseParts(parts)
        if (!res.ok) {
            return intoResponse(res.error)
        }
        parts = res.value
    }
    return Response.fromParts(parts, body)
}

function describe(v: unknown): string {
    if (v === null) {
        return 'null'
    }
    if (typeof v === 'object') {
        return v.constructor?.name ?? 'object'
    }
    return typeof v
}

/** JSON body, `application/json; charset=utf-8`. */
export class Json<T = unknown> implements IntoResponse {
    constructor(readonly value: T) {}

    intoResponse(): Response {
        const headers = new HeaderMap({ 'Content-Type': 'application/json; charset=utf-8' })
        return new Response(200, headers, Buffer.from(JSON.stringify(this.value) ?? 'null', 'utf8'))
    }
}
