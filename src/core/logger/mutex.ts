/**
 * Async Mutex
 *
 * Serializes tasks of concurrent callers on a single promise chain.
 * Tasks run in the order `run()` was called.
 */


/**
 * Promise-chain mutex.
 *
 * A task's rejection is passed to its own caller and does not
 * break the chain for the tasks queued behind it.
 *
 * @example
 * ```typescript
 * const mutex = new Mutex()
 *
 * await Promise.all([
 *     mutex.run(() => write('a')),
 *     mutex.run(() => write('b')),  // starts after 'a' settles
 * ])
 * ```
 */
export class Mutex {

    #tail: Promise<void> = Promise.resolve()
    #waiting = 0


    /**
     * True while a task runs or waits.
     */
    get isLocked(): boolean {

        return this.#waiting > 0
    }


    /**
     * Run a task once every previously scheduled task has settled.
     */
    run<T>(task: () => T | Promise<T>): Promise<T> {

        this.#waiting++

        const result = this.#tail.then(task)

        this.#tail = result.then(
            () => this.#release(),
            () => this.#release(),
        )

        return result
    }


    #release(): void {

        this.#waiting--
    }
}
