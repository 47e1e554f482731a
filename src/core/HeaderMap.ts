import type { OutgoingHttpHeaders } from 'node:http'

import type { ResponseParts } from './Response.js'

type Entry = { name: string, value: string }

/**
 * Ordered header multimap. Lookups ignore case, output keeps the spelling
 * the first value for a name was added with.
 */
export class HeaderMap implements Iterable<[string, string]> {
    private list: Entry[] = []

    constructor(init?: Record<string, string|readonly string[]>|Iterable<readonly [string, string]>) {
        if (!init) {
            return
        }
        if (isPairIterable(init)) {
            for (const [k, v] of init) {
                this.append(k, v)
            }
            return
        }
        for (const [k, v] of Object.entries(init)) {
            if (typeof v === 'string') {
                this.append(k, v)
            } else {
                for (const item of v) {
                    this.append(k, item)
                }
            }
        }
    }

    /** Builds a map from `IncomingMessage.rawHeaders` (flat name/value list). */
    static fromRaw(raw: readonly string[]): HeaderMap {
        const map = new HeaderMap()
        for (let i = 0; i + 1 < raw.length; i += 2) {
            map.append(raw[i]!, raw[i + 1]!)
        }
        return map
    }

    get size() {
        return this.list.length
    }

    append(name: string, value: string) {
        const existing = this.list.find(e => sameName(e.name, name))
        this.list.push({ name: existing ? existing.name : name, value })
        return this
    }

    set(name: string, value: string) {
        const i = this.list.findIndex(e => sameName(e.name, name))
        if (i === -1) {
            this.list.push({ name, value })
            return this
        }
        const keep = this.list[i]!.name
        this.list = this.list.filter(e => !sameName(e.name, name))
        this.list.splice(i, 0, { name: keep, value })
        return this
    }

    get(name: string): string|undefined {
        return this.list.find(e => sameName(e.name, name))?.value
    }

    getAll(name: string): string[] {
        return this.list.filter(e => sameName(e.name, name)).map(e => e.value)
    }

    has(name: string) {
        return this.list.some(e => sameName(e.name, name))
    }

    delete(name: string) {
        const before = this.list.length
        this.list = this.list.filter(e => !sameName(e.name, name))
        return this.list.length !== before
    }

    /** Distinct header names in first-seen order. */
    keys(): string[] {
        const out: string[] = []
        for (const e of this.list) {
            if (!out.some(n => sameName(n, e.name))) {
                out.push(e.name)
            }
        }
        return out
    }

    clone(): HeaderMap {
        const copy = new HeaderMap()
        copy.list = this.list.map(e => ({ ...e }))
        return copy
    }

    /** Shape accepted by `ServerResponse.writeHead`. */
    toOutgoing(): OutgoingHttpHeaders {
        const out: OutgoingHttpHeaders = {}
        for (const name of this.keys()) {
            const values = this.getAll(name)
            out[name] = values.length === 1 ? values[0] : values
        }
        return out
    }

    toJSON(): Record<string, string[]> {
        const out: Record<string, string[]> = {}
        for (const name of this.keys()) {
            out[name.toLowerCase()] = this.getAll(name)
        }
        return out
    }

    /** As a response part: every header here replaces the response's values. */
    intoResponseParts(parts: ResponseParts) {
        for (const name of this.keys()) {
            parts.headers.delete(name)
            for (const v of this.getAll(name)) {
                parts.headers.append(name, v)
            }
        }
        return { ok: true as const, value: parts }
    }

    *[Symbol.iterator](): Iterator<[string, string]> {
        for (const e of this.list) {
            yield [e.name, e.value]
        }
    }
}

function sameName(a: string, b: string) {
    return a.length === b.length && a.toLowerCase() === b.toLowerCase()
}

function isPairIterable(
    v: Record<string, string|readonly string[]>|Iterable<readonly [string, string]>
): v is Iterable<readonly [string, string]> {
    return Symbol.iterator in v
}
