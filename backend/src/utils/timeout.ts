export class TimeoutError extends Error {
    constructor(operation: string, ms: number) {
        super(`${operation} timed out after ${ms}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * Race an operation against a timer. The timer is always cleared so a
 * settled operation leaves nothing scheduled on the event loop.
 */
export async function withTimeout<T>(
    operation: Promise<T>,
    ms: number,
    operationName: string
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(operationName, ms)), ms);
    });

    try {
        return await Promise.race([operation, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
