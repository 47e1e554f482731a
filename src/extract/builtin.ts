import { HttpException, BodyRejection } from '../core/HttpException.js'
import type { HeaderMap } from '../core/HeaderMap.js'
import { partExtractor, requestExtractor, type PartExtractor, type RequestExtractor } from './Extractor.js'

/** The request method, upper-cased. */
export const method: PartExtractor<string> = partExtractor(parts => parts.method)

/** A copy of the request headers. */
export const headers: PartExtractor<HeaderMap> = partExtractor(parts => parts.headers.clone())

/** Captured path parameters by name. */
export const params: PartExtractor<Record<string, string>> = partExtractor(parts => {
    const out: Record<string, string> = Object.create(null)
    for (const [k, v] of parts.params) {
        out[k] = v
    }
    return out
})

export const uri: PartExtractor<{ path: string, query: string }> =
    partExtractor(parts => ({ path: parts.path, query: parts.query }))

/** First value of a header; 400 when the request does not carry it. */
export function header(name: string): PartExtractor<string> {
    return partExtractor(parts => {
        const v = parts.headers.get(name)
        if (v === undefined) {
            throw new HttpException(400, `Missing header: ${name}`)
        }
        return v
    })
}

/** The whole body, up to the request's body size limit. */
export const bytes: RequestExtractor<Buffer> = requestExtractor(req => req.body.bytes(req.limits.bodySize))

/** The whole body as strict UTF-8 text. */
export const text: RequestExtractor<string> = requestExtractor(async req => {
    const raw = await req.body.bytes(req.limits.bodySize)
    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(raw)
    } catch (err) {
        throw new BodyRejection('invalid-utf8', { cause: err })
    }
})

/**
 * The whole body parsed as JSON. `parse` may validate and narrow the value;
 * whatever it throws becomes a 422.
 */
export function json<T = unknown>(parse?: (value: unknown) => T): RequestExtractor<T> {
    return requestExtractor(async req => {
        const raw = await text.fromRequest(req)
        let value: unknown
        try {
            value = JSON.parse(raw)
        } catch {
            throw new HttpException(400, 'Invalid JSON', true)
        }
        if (!parse) {
            return value as T
        }
        try {
            return parse(value)
        } catch (err) {
            const message = err instanceof Error ? err.message : 'Invalid body'
            throw new HttpException(422, message, true)
        }
    })
}
