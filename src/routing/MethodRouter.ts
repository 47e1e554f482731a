import { METHODS, isMethod, type Method } from '../core/http.js'
import { RouteConflictError } from '../core/HttpException.js'
import { toService, type Handler, type Service } from './handler.js'

export type Slot = Method|'ANY'

const SLOTS: readonly Slot[] = [...METHODS, 'ANY']

const slotName = (slot: Slot) => slot === 'ANY' ? 'fallback' : slot

/**
 * Handlers of one path, one per method, plus an optional fallback used
 * when the request method has no slot of its own.
 */
export class MethodRouter {
    private slots = new Map<Slot, Service>()

    private set(slot: Slot, h: Handler) {
        if (this.slots.has(slot)) {
            throw new RouteConflictError(slotName(slot))
        }
        this.slots.set(slot, toService(h))
        return this
    }

    get(h: Handler) { return this.set('GET', h) }
    post(h: Handler) { return this.set('POST', h) }
    put(h: Handler) { return this.set('PUT', h) }
    patch(h: Handler) { return this.set('PATCH', h) }
    delete(h: Handler) { return this.set('DELETE', h) }
    head(h: Handler) { return this.set('HEAD', h) }
    options(h: Handler) { return this.set('OPTIONS', h) }
    trace(h: Handler) { return this.set('TRACE', h) }
    connect(h: Handler) { return this.set('CONNECT', h) }
    any(h: Handler) { return this.set('ANY', h) }

    /** Adopts every slot of `other`. Both defining one slot is a configuration error. */
    merge(other: MethodRouter, path?: string) {
        for (const slot of SLOTS) {
            if (this.slots.has(slot) && other.slots.has(slot)) {
                throw new RouteConflictError(slotName(slot), path)
            }
        }
        for (const [slot, svc] of other.slots) {
            this.slots.set(slot, svc)
        }
        return this
    }

    /** Exact method slot, else the fallback, else null (405). */
    resolve(method: string): Service|null {
        const exact = isMethod(method) ? this.slots.get(method) : undefined
        return exact ?? this.slots.get('ANY') ?? null
    }

    allowedMethods(): Method[] {
        return METHODS.filter(m => this.slots.has(m))
    }

    hasFallback() {
        return this.slots.has('ANY')
    }

    clone(): MethodRouter {
        const copy = new MethodRouter()
        for (const [slot, svc] of this.slots) {
            copy.slots.set(slot, svc.clone())
        }
        return copy
    }
}

export const get = (h: Handler) => new MethodRouter().get(h)
export const post = (h: Handler) => new MethodRouter().post(h)
export const put = (h: Handler) => new MethodRouter().put(h)
export const patch = (h: Handler) => new MethodRouter().patch(h)
// `delete` is reserved
export const del = (h: Handler) => new MethodRouter().delete(h)
export const head = (h: Handler) => new MethodRouter().head(h)
export const options = (h: Handler) => new MethodRouter().options(h)
export const trace = (h: Handler) => new MethodRouter().trace(h)
export const connect = (h: Handler) => new MethodRouter().connect(h)
export const any = (h: Handler) => new MethodRouter().any(h)
