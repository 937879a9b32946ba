import { ErrorKind, LibraryError } from "./errors";

/**
 * Runs async tasks one at a time, in submission order. A task that is still
 * waiting for its turn after `timeoutMs` is dropped and its caller receives
 * a `Busy` error; a task that has started always runs to completion.
 */
export class FIFOQueue {
    private tail: Promise<void> = Promise.resolve();
    constructor(private timeoutMs: number) {}
    enqueueTask<T>(task: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            let expired = false;
            const timer = setTimeout(() => {
                expired = true;
                reject(LibraryError.fromKind(ErrorKind.Busy, this.timeoutMs));
            }, this.timeoutMs);
            this.tail = this.tail.then(async () => {
                clearTimeout(timer);
                if (expired) {
                    return;
                }
                try {
                    resolve(await task());
                } catch (error) {
                    reject(error);
                }
            });
        });
    }
}
