import { DuplicatePatternError } from '../core/HttpException.js'
import type { PathParams } from '../core/http.js'

type Validator = (v: string) => boolean

type Token =
    | { t: 'static', val: string }
    | { t: 'param', name: string, src?: string, validate?: Validator }
    | { t: 'wildcard', name: string } // last segment only

export interface PathMatch<T> {
    value: T
    params: PathParams
}

function normalizePath(p: string) {
    if (!p || p === '/') {
        return '/'
    }
    const withRoot = p.startsWith('/') ? p : '/' + p
    return withRoot.endsWith('/') ? withRoot.slice(0, -1) : withRoot
}

function decodeSafe(s: string): string|null {
    try {
        return decodeURIComponent(s)
    } catch {
        return null
    }
}

function parsePattern(pattern: string): Token[] {
    const clean = normalizePath(pattern)
    if (clean === '/') {
        return []
    }
    const parts = clean.slice(1).split('/')

    const tokens: Token[] = []
    for (let i = 0; i < parts.length; i++) {
        const seg = parts[i]!
        if (seg.startsWith(':')) {
            const m = /^:([A-Za-z_][A-Za-z0-9_]*)(?:\((.+)\))?$/.exec(seg)
            if (!m || !m[1]) {
                throw new Error(`Invalid param segment: ${seg}`)
            }
            const src = m[2]
            const re = src ? new RegExp(`^(?:${src})$`) : undefined
            tokens.push({ t: 'param', name: m[1], src, validate: re ? v => re.test(v) : undefined })
            continue
        }
        if (seg.startsWith('*')) {
            if (i !== parts.length - 1) {
                throw new Error('Wildcard must be the last segment')
            }
            tokens.push({ t: 'wildcard', name: seg === '*' ? 'wild' : seg.slice(1) })
            continue
        }
        tokens.push({ t: 'static', val: seg })
    }
    return tokens
}

class Node<T> {
    sChildren: Map<string, Node<T>>|null = null
    pChild: { name: string, src?: string, validate?: Validator, node: Node<T> }|null = null
    wChild: { name: string, node: Node<T> }|null = null
    value: { v: T }|null = null

    getOrAddStatic(seg: string) {
        if (!this.sChildren) {
            this.sChildren = new Map()
        }
        let n = this.sChildren.get(seg)
        if (!n) {
            n = new Node<T>()
            this.sChildren.set(seg, n)
        }
        return n
    }

    getStatic(seg: string) {
        return this.sChildren?.get(seg) ?? null
    }
}

/**
 * Segment trie from path patterns (`/users/:id`, `/files/*path`,
 * `/orders/:n(\d+)`) to values. Literal segments win over captures,
 * captures over a catch-all; a failed branch backtracks.
 */
export class PathMatcher<T> {
    private root = new Node<T>()

    insert(pattern: string, value: T) {
        let node = this.root
        for (const tok of parsePattern(pattern)) {
            if (tok.t === 'static') {
                node = node.getOrAddStatic(tok.val)
            } else if (tok.t === 'param') {
                if (node.pChild && (node.pChild.name !== tok.name || node.pChild.src !== tok.src)) {
                    throw new DuplicatePatternError(pattern, `conflicts with existing capture ":${node.pChild.name}"`)
                }
                if (!node.pChild) {
                    node.pChild = { name: tok.name, src: tok.src, validate: tok.validate, node: new Node<T>() }
                }
                node = node.pChild.node
            } else {
                if (node.wChild && node.wChild.name !== tok.name) {
                    throw new DuplicatePatternError(pattern, `conflicts with existing wildcard "*${node.wChild.name}"`)
                }
                if (!node.wChild) {
                    node.wChild = { name: tok.name, node: new Node<T>() }
                }
                node = node.wChild.node
            }
        }
        if (node.value) {
            throw new DuplicatePatternError(pattern)
        }
        node.value = { v: value }
    }

    /** Value stored for exactly this pattern, compared token by token. */
    get(pattern: string): T|null {
        let node: Node<T>|null = this.root
        for (const tok of parsePattern(pattern)) {
            if (!node) {
                return null
            }
            if (tok.t === 'static') {
                node = node.getStatic(tok.val)
            } else if (tok.t === 'param') {
                node = node.pChild && node.pChild.name === tok.name && node.pChild.src === tok.src
                    ? node.pChild.node
                    : null
            } else {
                node = node.wChild && node.wChild.name === tok.name ? node.wChild.node : null
            }
        }
        return node?.value ? node.value.v : null
    }

    match(path: string): PathMatch<T>|null {
        const pathname = normalizePath(path)
        const parts = pathname === '/' ? [] : pathname.slice(1).split('/')
        const params: Array<readonly [string, string]> = []

        const go = (node: Node<T>, idx: number): { v: T }|null => {
            const wild = node.wChild
            const wildValue = wild?.node.value ?? null

            if (idx === parts.length) {
                if (node.value) {
                    return node.value
                }
                // a catch-all also matches the empty rest
                if (wild && wildValue) {
                    params.push([wild.name, ''])
                    return wildValue
                }
                return null
            }

            const segDec = decodeSafe(parts[idx]!)
            if (segDec === null) {
                return null
            }

            const next = node.getStatic(segDec)
            if (next) {
                const found = go(next, idx + 1)
                if (found) {
                    return found
                }
            }

            if (node.pChild) {
                const { name, validate, node: pnode } = node.pChild
                if (segDec !== '' && (!validate || validate(segDec))) {
                    params.push([name, segDec])
                    const found = go(pnode, idx + 1)
                    if (found) {
                        return found
                    }
                    params.pop()
                }
            }

            if (wild && wildValue) {
                const rest: string[] = []
                for (let i = idx; i < parts.length; i++) {
                    const d = decodeSafe(parts[i]!)
                    if (d === null) {
                        return null
                    }
                    rest.push(d)
                }
                params.push([wild.name, rest.join('/')])
                return wildValue
            }

            return null
        }

        const found = go(this.root, 0)
        return found ? { value: found.v, params } : null
    }
}
