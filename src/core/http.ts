import { Body, type BodySource } from './Body.js'
import { HeaderMap } from './HeaderMap.js'

export type Method =
    | 'GET'|'POST'|'PUT'|'PATCH'|'DELETE'|'HEAD'|'OPTIONS'|'TRACE'|'CONNECT'

// Canonical order, also used for the Allow header
export const METHODS: readonly Method[] = [
    'GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS', 'TRACE', 'CONNECT'
]

export function isMethod(m: string): m is Method {
    return METHODS.some(known => known === m)
}

export interface Limits {
    bodySize: number
}

export const DEFAULT_LIMITS: Readonly<Limits> = Object.freeze({ bodySize: 16 * 1024 })

export interface Logger {
    debug?: (...params: unknown[]) => void
    warn?: (...params: unknown[]) => void
    error?: (...params: unknown[]) => void
}

export type PathParams = ReadonlyArray<readonly [string, string]>

/** Everything about a request except its body. */
export interface RequestParts {
    method: string
    path: string
    query: string
    headers: HeaderMap
    params: PathParams
    limits: Limits
}

export interface RequestInit {
    method?: string
    headers?: HeaderMap|Record<string, string|readonly string[]>
    body?: Body|BodySource
    params?: PathParams
    limits?: Partial<Limits>
}

export class Request implements RequestParts {
    method: string
    path: string
    query: string
    headers: HeaderMap
    params: PathParams
    limits: Limits
    readonly body: Body

    /** `target` is the request-target: a path with an optional `?query`. */
    constructor(target: string, init: RequestInit = {}) {
        const q = target.indexOf('?')
        this.path = q === -1 ? target : target.slice(0, q)
        this.query = q === -1 ? '' : target.slice(q + 1)
        if (!this.path.startsWith('/')) {
            this.path = '/' + this.path
        }
        this.method = init.method ?? 'GET'
        this.headers = init.headers instanceof HeaderMap ? init.headers : new HeaderMap(init.headers)
        this.body = init.body instanceof Body ? init.body : new Body(init.body)
        this.params = init.params ?? []
        this.limits = { ...DEFAULT_LIMITS, ...init.limits }
    }

    static fromParts(parts: RequestParts, body: Body): Request {
        const req = new Request(parts.path, { method: parts.method, headers: parts.headers, body, params: parts.params, limits: parts.limits })
        req.query = parts.query
        return req
    }

    intoParts(): [RequestParts, Body] {
        const { method, path, query, headers, params, limits } = this
        return [{ method, path, query, headers, params, limits }, this.body]
    }
}
