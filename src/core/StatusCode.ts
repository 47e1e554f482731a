import { STATUS_CODES } from 'node:http'

import type { ResponseParts } from './Response.js'

/**
 * HTTP status code value. Converts into an empty response on its own and
 * overwrites the status when used as a response part.
 */
export class StatusCode {
    static readonly OK = new StatusCode(200)
    static readonly CREATED = new StatusCode(201)
    static readonly ACCEPTED = new StatusCode(202)
    static readonly NO_CONTENT = new StatusCode(204)
    static readonly MOVED_PERMANENTLY = new StatusCode(301)
    static readonly FOUND = new StatusCode(302)
    static readonly NOT_MODIFIED = new StatusCode(304)
    static readonly BAD_REQUEST = new StatusCode(400)
    static readonly UNAUTHORIZED = new StatusCode(401)
    static readonly FORBIDDEN = new StatusCode(403)
    static readonly NOT_FOUND = new StatusCode(404)
    static readonly METHOD_NOT_ALLOWED = new StatusCode(405)
    static readonly CONFLICT = new StatusCode(409)
    static readonly PAYLOAD_TOO_LARGE = new StatusCode(413)
    static readonly UNPROCESSABLE_ENTITY = new StatusCode(422)
    static readonly INTERNAL_SERVER_ERROR = new StatusCode(500)
    static readonly NOT_IMPLEMENTED = new StatusCode(501)
    static readonly SERVICE_UNAVAILABLE = new StatusCode(503)

    readonly code: number

    constructor(code: number) {
        if (!Number.isInteger(code) || code < 100 || code > 999) {
            throw new RangeError(`Invalid status code: ${code}`)
        }
        this.code = code
    }

    get canonicalReason(): string|undefined {
        return STATUS_CODES[this.code]
    }

    isSuccess() {
        return this.code >= 200 && this.code < 300
    }

    isClientError() {
        return this.code >= 400 && this.code < 500
    }

    isServerError() {
        return this.code >= 500 && this.code < 600
    }

    intoResponseParts(parts: ResponseParts) {
        parts.status = this.code
        return { ok: true as const, value: parts }
    }

    toString() {
        const reason = this.canonicalReason
        return reason ? `${this.code} ${reason}` : String(this.code)
    }
}
