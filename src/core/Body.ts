import type { Readable } from 'node:stream'

import { BodyAlreadyConsumed, BodyRejection, HttpException } from './HttpException.js'

export type BodySource = Readable|Buffer|string

/**
 * Request body. Either a stream the transport has not read yet or bytes
 * already in memory; readable exactly once.
 */
export class Body {
    private source: Readable|Buffer|null

    constructor(source: BodySource = Buffer.alloc(0)) {
        this.source = typeof source === 'string' ? Buffer.from(source, 'utf8') : source
    }

    static empty() {
        return new Body()
    }

    get consumed() {
        return this.source === null
    }

    /**
     * Drains the body. Rejects with 413 past `limit` bytes and with a
     * `BodyRejection` of kind `io` when the stream errors or is aborted.
     */
    async bytes(limit: number): Promise<Buffer> {
        const src = this.source
        if (src === null) {
            throw new BodyAlreadyConsumed()
        }
        this.source = null

        if (Buffer.isBuffer(src)) {
            if (src.length > limit) {
                throw new HttpException(413, 'Content Too Large', true)
            }
            return src
        }

        return new Promise((resolve, reject) => {
            const chunks: Buffer[] = []
            let size = 0, done = false
            const fail = (err: Error, destroy: boolean) => {
                if (!done) {
                    done = true
                    src.off('data', onData)
                    if (destroy) {
                        src.destroy()
                    } else {
                        // drain the rest so the connection can still carry the answer
                        src.resume()
                    }
                    reject(err)
                }
            }
            const ok = () => {
                if (!done) {
                    done = true
                    resolve(Buffer.concat(chunks))
                }
            }
            const onData = (c: Buffer|string) => {
                const chunk = typeof c === 'string' ? Buffer.from(c, 'utf8') : c
                size += chunk.length
                if (size > limit) {
                    return fail(new HttpException(413, 'Content Too Large', true), false)
                }
                chunks.push(chunk)
            }

            src.once('error', (err: Error) => fail(new BodyRejection('io', { cause: err }), true))
            src.once('aborted', () => fail(new BodyRejection('io'), true))
            src.on('data', onData)
            src.once('end', ok)
        })
    }
}
