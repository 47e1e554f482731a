import { validateHeaderName, validateHeaderValue, type IncomingMessage, type ServerResponse } from 'node:http'

import { DEFAULT_LIMITS, Request, type Limits, type Logger } from './http.js'
import { HeaderMap } from './HeaderMap.js'
import { DispatchError, HttpException, RouterSealedError } from './HttpException.js'
import { Response } from './Response.js'
import { PathMatcher } from '../routing/PathMatcher.js'
import { MethodRouter, any } from '../routing/MethodRouter.js'
import type { Handler } from '../routing/handler.js'
import { isIntoResponse } from '../response/IntoResponse.js'

export interface RouterOptions {
    limits?: Partial<Limits>
    logger?: Logger
}

/**
 * Path → MethodRouter table. Filled with `route()` during startup and
 * sealed by `build()` or by the first dispatch, read-only after that.
 */
export class Router {
    private matcher = new PathMatcher<MethodRouter>()
    private limits: Limits
    private logger?: Logger
    private sealed = false

    constructor(opts?: RouterOptions) {
        this.limits = { ...DEFAULT_LIMITS, ...opts?.limits }
        this.logger = opts?.logger
    }

    get isSealed() {
        return this.sealed
    }

    /**
     * Registers handlers for `path`. A plain handler serves every method.
     * A second registration for the same pattern is merged into the first;
     * overlapping methods throw `RouteConflictError`.
     */
    route(path: string, route: MethodRouter|Handler) {
        if (this.sealed) {
            throw new RouterSealedError(path)
        }
        const incoming = route instanceof MethodRouter ? route.clone() : any(route)
        const existing = this.matcher.get(path)
        if (existing) {
            existing.merge(incoming, path)
        } else {
            this.matcher.insert(path, incoming)
        }
        return this
    }

    build() {
        this.sealed = true
        return this
    }

    /**
     * Dispatches one request. Resolves with a response for every routing
     * outcome; rejects only with `DispatchError` when a handler throws
     * something that has no response conversion.
     */
    async call(req: Request): Promise<Response> {
        this.sealed = true

        const found = this.matcher.match(req.path)
        if (!found) {
            this.logger?.debug?.(`no route: ${req.method} ${req.path}`)
            return new Response(404)
        }

        req.params = found.params
        req.limits = this.limits

        const svc = found.value.resolve(req.method)
        if (!svc) {
            const allowed = found.value.allowedMethods()
            this.logger?.debug?.(`method not allowed: ${req.method} ${req.path}`)
            const headers = new HeaderMap()
            if (allowed.length) {
                headers.set('Allow', allowed.join(', '))
            }
            return new Response(405, headers)
        }

        let res: Response
        try {
            res = await svc.call(req)
        } catch (e) {
            if (!isIntoResponse(e)) {
                throw new DispatchError(req.method, req.path, e)
            }
            res = e.intoResponse()
        }
        if (res.status >= 500) {
            this.logger?.warn?.(`${req.method} ${req.path} answered ${res.status}`)
        }
        return res
    }

    /** `node:http` request listener. */
    async handler(req: IncomingMessage, res: ServerResponse) {
        const request = new Request(req.url || '/', {
            method: req.method,
            headers: HeaderMap.fromRaw(req.rawHeaders),
            body: req,
        })

        let response: Response
        try {
            response = await this.call(request)
        } catch (e) {
            this.logger?.error?.(`dispatch failed: ${request.method} ${request.path}`, e)
            response = internalError()
        }

        try {
            send(res, response)
        } catch (e) {
            this.logger?.error?.(`writing response failed: ${request.method} ${request.path}`, e)
            if (res.headersSent) {
                res.destroy()
            } else {
                send(res, internalError())
            }
        }
    }
}

function internalError() {
    return new HttpException(500, 'Internal Server Error', false).intoResponse()
}

// 1xx, 204 and 304 carry neither a body nor Content-Length
function bodiless(status: number) {
    return status < 200 || status === 204 || status === 304
}

function send(res: ServerResponse, response: Response) {
    const headers = response.headers.clone()
    for (const [name, value] of headers) {
        validateHeaderName(name)
        validateHeaderValue(name, value)
    }
    if (bodiless(response.status)) {
        headers.delete('Content-Length')
        res.writeHead(response.status, headers.toOutgoing())
        res.end()
        return
    }
    if (!headers.has('Content-Length')) {
        headers.set('Content-Length', String(response.body.length))
    }
    res.writeHead(response.status, headers.toOutgoing())
    res.end(response.body)
}
