import { AnalysisError } from "../errors/AnalysisError.js";

type QueueJob = {
    start: () => Promise<void>;
    cancel: (reason: unknown) => void;
    label?: string;
};

export interface ParseQueueOptions {
    concurrency: number;
    /** Tasks still queued when the signal aborts are rejected with `Cancelled`. */
    signal?: AbortSignal;
}

/**
 * Bounded-concurrency task runner for per-file work. Tasks start in submission order;
 * at most `concurrency` run at once.
 */
export class ParseQueue {
    private readonly queue: QueueJob[] = [];
    private active = 0;
    private peakActive = 0;

    constructor(private readonly options: ParseQueueOptions) {}

    public get size(): number {
        return this.queue.length;
    }

    /** Highest number of tasks observed running together. */
    public get peak(): number {
        return this.peakActive;
    }

    public run<T>(task: () => Promise<T>, opts?: { label?: string }): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.queue.push({
                start: async () => {
                    try {
                        resolve(await task());
                    } catch (err) {
                        reject(err);
                    }
                },
                cancel: reject,
                label: opts?.label
            });
            this.pump();
        });
    }

    private pump(): void {
        const concurrency = Math.max(1, this.options.concurrency);
        while (this.active < concurrency && this.queue.length > 0) {
            const next = this.queue.shift();
            if (!next) return;
            if (this.options.signal?.aborted) {
                next.cancel(new AnalysisError("Cancelled", `Cancelled before ${next.label ?? "task"} started`));
                continue;
            }
            this.active += 1;
            this.peakActive = Math.max(this.peakActive, this.active);
            void next.start().finally(() => {
                this.active -= 1;
                this.pump();
            });
        }
    }
}
