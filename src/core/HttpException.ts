import { STATUS_CODES } from 'node:http'

import { HeaderMap } from './HeaderMap.js'
import { Response } from './Response.js'

export class HttpException extends Error {
    constructor(
        public statusCode: number,
        message = 'Http Error',
        public expose = statusCode < 500,
        public headers: Record<string, string> = {}
    ) {
        super(message)
        this.name = 'HttpException'
    }

    intoResponse(): Response {
        const headers = new HeaderMap(this.headers)
        headers.set('Content-Type', 'application/json; charset=utf-8')
        const error = this.expose ? this.message : (STATUS_CODES[this.statusCode] ?? 'Http Error')
        return new Response(this.statusCode, headers, Buffer.from(JSON.stringify({ error })))
    }
}

export type BodyRejectionKind = 'io'|'invalid-utf8'

/** Failure to turn the request body into text. Always answered with a fixed 500. */
export class BodyRejection extends Error {
    constructor(
        public kind: BodyRejectionKind,
        options?: { cause?: unknown }
    ) {
        super(kind === 'io' ? 'Failed to read request body' : 'Request body is not valid UTF-8', options)
        this.name = 'BodyRejection'
    }

    intoResponse(): Response {
        const headers = new HeaderMap({ 'Content-Type': 'text/plain;charset=utf-8' })
        return new Response(500, headers, Buffer.from('error reading body'))
    }
}

export class BodyAlreadyConsumed extends Error {
    constructor() {
        super('Request body has already been consumed')
        this.name = 'BodyAlreadyConsumed'
    }
}

/** Two registrations claimed the same method slot (or the fallback) of one path. */
export class RouteConflictError extends Error {
    constructor(
        public slot: string,
        public path?: string
    ) {
        super(path === undefined
            ? `Handler for ${slot} is already defined`
            : `Handler for ${slot} ${path} is already defined`)
        this.name = 'RouteConflictError'
    }
}

export class DuplicatePatternError extends Error {
    constructor(
        public pattern: string,
        reason = 'pattern is already registered'
    ) {
        super(`Cannot insert "${pattern}": ${reason}`)
        this.name = 'DuplicatePatternError'
    }
}

export class RouterSealedError extends Error {
    constructor(path: string) {
        super(`Router is sealed, cannot register "${path}"`)
        this.name = 'RouterSealedError'
    }
}

/** A handler failed with a value that has no response conversion. */
export class DispatchError extends Error {
    constructor(
        public method: string,
        public path: string,
        cause: unknown
    ) {
        super(`Dispatch of ${method} ${path} failed`, { cause })
        this.name = 'DispatchError'
    }
}
