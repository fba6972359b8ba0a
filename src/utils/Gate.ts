/**
 * Gate
 * Serializes async sections: one runner at a time, the rest queue in order
 */

export class Gate {
    private locked = false;
    private queue: Array<() => void> = [];

    get isLocked(): boolean {
        return this.locked;
    }

    async run<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();

        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    private async acquire(): Promise<void> {
        if (!this.locked) {
            this.locked = true;
            return;
        }

        // Ownership is handed over directly by release()
        await new Promise<void>((resolve) => {
            this.queue.push(resolve);
        });
    }

    private release(): void {
        const next = this.queue.shift();
        if (next) {
            next();
        } else {
            this.locked = false;
        }
    }
}
