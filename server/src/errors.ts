
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Raised while downloading or decoding a startup dataset. Fatal: the server
 * does not start without both datasets.
 */
export class RemoteFetchError extends Error {
    readonly url: string;
    readonly status: number | null;

    constructor(message: string, url: string, status: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RemoteFetchError';
        this.url = url;
        this.status = status;
    }
}

export const describeError = (e: unknown): string => (e instanceof Error ? e.message : String(e));
