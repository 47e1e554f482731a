import type { Request } from '../core/http.js'
import type { Response } from '../core/Response.js'
import { intoResponse, isResponder, type Responder } from '../response/IntoResponse.js'
import {
    checkExtractorOrder,
    extractAll,
    type ExtractedArgs,
    type ExtractorList,
} from '../extract/Extractor.js'

/** Uniform calling convention every route is stored behind. */
export interface Service {
    call(req: Request): Promise<Response>
    clone(): Service
}

export type HandlerResult = Responder|Promise<Responder>

export type HandlerFn<E extends ExtractorList> = (...args: ExtractedArgs<E>) => HandlerResult

/** What registration functions accept: a built service or a function without parameters. */
export type Handler = Service|(() => HandlerResult)

export class HandlerService<E extends ExtractorList = ExtractorList> implements Service {
    constructor(
        private readonly extractors: E,
        private readonly fn: HandlerFn<E>
    ) {
        checkExtractorOrder(extractors)
    }

    async call(req: Request): Promise<Response> {
        const extracted = await extractAll(req, this.extractors)
        if (!extracted.ok) {
            return extracted.response
        }
        // values line up with the extractor tuple the function was typed from
        const result: unknown = await Reflect.apply(this.fn, undefined, extracted.values)
        if (!isResponder(result)) {
            throw new TypeError(`Handler returned ${result === null ? 'null' : typeof result}, which is not a response`)
        }
        return intoResponse(result)
    }

    clone(): Service {
        return new HandlerService(this.extractors, this.fn)
    }
}

/**
 * Wraps a function so it can be routed. Each extractor produces the
 * argument at its position:
 *
 * ```ts
 * handler([method, text], (m, body) => [StatusCode.CREATED, `${m} - ${body}`])
 * ```
 */
export function handler<E extends ExtractorList>(extractors: E, fn: HandlerFn<E>): Service {
    return new HandlerService(extractors, fn)
}

export function toService(h: Handler): Service {
    return typeof h === 'function' ? new HandlerService([], h) : h
}
