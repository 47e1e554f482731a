import { HeaderMap } from './HeaderMap.js'

/** Status and headers of a response, detached from its body for in-place edits. */
export interface ResponseParts {
    status: number
    headers: HeaderMap
}

export class Response {
    readonly status: number
    readonly headers: HeaderMap
    readonly body: Buffer

    constructor(status = 200, headers = new HeaderMap(), body: Buffer = Buffer.alloc(0)) {
        this.status = status
        this.headers = headers
        this.body = body
        Object.freeze(this)
    }

    static fromParts(parts: ResponseParts, body: Buffer): Response {
        return new Response(parts.status, parts.headers, body)
    }

    /** Parts get their own header map, so edits never reach this response. */
    intoParts(): [ResponseParts, Buffer] {
        return [{ status: this.status, headers: this.headers.clone() }, this.body]
    }

    text(): string {
        return this.body.toString('utf8')
    }
}
