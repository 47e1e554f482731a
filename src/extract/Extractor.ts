import { Request, type RequestParts } from '../core/http.js'
import { isIntoResponse } from '../response/IntoResponse.js'
import type { Response } from '../core/Response.js'

/**
 * Reads request metadata only. Never touches the body, so any number of
 * these may run for one request.
 */
export interface PartExtractor<T> {
    readonly kind: 'part'
    fromRequestParts(parts: RequestParts): T
}

/** May consume the body. Runs once, for the last handler parameter only. */
export interface RequestExtractor<T> {
    readonly kind: 'request'
    fromRequest(req: Request): Promise<T>
}

export type Extractor<T> = PartExtractor<T>|RequestExtractor<T>

export type AnyExtractor = Extractor<unknown>

/** Parts first, at most one request extractor and only at the end. */
export type ExtractorList =
    | readonly []
    | readonly [...PartExtractor<unknown>[], AnyExtractor]

export type Extracted<E> =
    E extends PartExtractor<infer T> ? T
    : E extends RequestExtractor<infer T> ? T
    : never

export type ExtractedArgs<E extends ExtractorList> = {
    -readonly [K in keyof E]: Extracted<E[K]>
}

export function partExtractor<T>(fromRequestParts: (parts: RequestParts) => T): PartExtractor<T> {
    return { kind: 'part', fromRequestParts }
}

export function requestExtractor<T>(fromRequest: (req: Request) => Promise<T>): RequestExtractor<T> {
    return { kind: 'request', fromRequest }
}

export function checkExtractorOrder(extractors: readonly AnyExtractor[]) {
    extractors.forEach((e, i) => {
        if (e.kind === 'request' && i !== extractors.length - 1) {
            throw new TypeError(`Extractor at position ${i} consumes the request body and must be the last one`)
        }
    })
}

export type ExtractOutcome =
    | { ok: true, values: unknown[] }
    | { ok: false, response: Response }

/**
 * Runs the extractors left to right. All part extractors see the intact
 * request; the last extractor then gets the request rebuilt from its parts
 * and the still unread body. A thrown value that converts into a response
 * stops extraction and becomes the outcome; other errors propagate.
 */
export async function extractAll(req: Request, extractors: readonly AnyExtractor[]): Promise<ExtractOutcome> {
    const values: unknown[] = []
    if (extractors.length === 0) {
        return { ok: true, values }
    }

    const [parts, body] = req.intoParts()
    try {
        for (let i = 0; i < extractors.length - 1; i++) {
            const e = extractors[i]!
            if (e.kind !== 'part') {
                throw new TypeError(`Extractor at position ${i} consumes the request body and must be the last one`)
            }
            values.push(e.fromRequestParts(parts))
        }

        const last = extractors[extractors.length - 1]!
        if (last.kind === 'part') {
            values.push(last.fromRequestParts(parts))
        } else {
            values.push(await last.fromRequest(Request.fromParts(parts, body)))
        }
    } catch (err) {
        if (isIntoResponse(err)) {
            return { ok: false, response: err.intoResponse() }
        }
        throw err
    }
    return { ok: true, values }
}
