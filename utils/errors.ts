export class LiveDataError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Connection error, timeout or non-2xx answer from a live-data source. */
export class TransportError extends LiveDataError {
    readonly status: number;
    readonly timedOut: boolean;

    constructor(message: string, opts: { status?: number; timedOut?: boolean; cause?: unknown } = {}) {
        super(message, { cause: opts.cause });
        this.status = opts.status ?? 0;
        this.timedOut = opts.timedOut ?? false;
    }
}

/** The payload does not have the shape of the protocol's envelope. Retrying won't help. */
export class DecodeError extends LiveDataError {
    readonly raw: string;

    constructor(message: string, raw: string, options?: { cause?: unknown }) {
        super(message, options);
        this.raw = raw;
    }
}

export class ConfigError extends LiveDataError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.issues = issues;
    }
}
