/**
 * Message Queue
 *
 * FIFO buffer of rendered file entries waiting for the next flush.
 * The queue never evicts; the owning logger checks its length after
 * every push and flushes once the configured maximum is reached.
 */


/**
 * In-memory queue of rendered messages.
 *
 * @example
 * ```typescript
 * const queue = new MessageQueue()
 *
 * queue.push('first')
 * queue.push('second')  // 2
 *
 * queue.drainAll()      // ['first', 'second']
 * queue.length          // 0
 * ```
 */
export class MessageQueue {

    #entries: string[] = []


    /**
     * Number of queued messages.
     */
    get length(): number {

        return this.#entries.length
    }


    /**
     * Append a message.
     *
     * @returns the queue length after insertion
     */
    push(message: string): number {

        return this.#entries.push(message)
    }


    /**
     * Remove and return every queued message in insertion order.
     */
    drainAll(): string[] {

        const drained = this.#entries
        this.#entries = []

        return drained
    }


    /**
     * Read-only snapshot of the queued messages.
     */
    peek(): readonly string[] {

        return [...this.#entries]
    }
}
