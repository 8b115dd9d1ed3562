import { APP_NAME, APP_VERSION } from '../constants';
import { TransportError } from './errors';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string;
}

const USER_AGENT = `${APP_NAME}/${APP_VERSION}`;

const isTimeout = (e: unknown): boolean =>
    e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError');

/**
 * Fetch with a hard per-call timeout. Connection errors, timeouts and non-2xx
 * answers all surface as TransportError; the body is returned untouched.
 */
export const fetchWithTimeout = async (
    url: string,
    init: RequestOptions,
    timeoutMs: number,
    fetchImpl: FetchLike = fetch
): Promise<Response> => {
    let res: Response;
    try {
        res = await fetchImpl(url, {
            method: init.method ?? 'GET',
            body: init.body,
            headers: { 'user-agent': USER_AGENT, ...init.headers },
            signal: AbortSignal.timeout(timeoutMs),
        });
    } catch (e) {
        if (isTimeout(e)) {
            throw new TransportError(`Timed out after ${timeoutMs}ms: ${url}`, { timedOut: true, cause: e });
        }
        const message = e instanceof Error ? e.message : String(e);
        throw new TransportError(`Request failed: ${message}`, { cause: e });
    }

    if (!res.ok) {
        throw new TransportError(`HTTP ${res.status} from ${url}`, { status: res.status });
    }
    return res;
};

const bodyFailure = (e: unknown): TransportError =>
    new TransportError(`Failed reading response body: ${e instanceof Error ? e.message : String(e)}`, {
        timedOut: isTimeout(e),
        cause: e,
    });

export const readText = async (res: Response): Promise<string> => {
    try {
        return await res.text();
    } catch (e) {
        throw bodyFailure(e);
    }
};

export const readBytes = async (res: Response): Promise<Uint8Array> => {
    try {
        return new Uint8Array(await res.arrayBuffer());
    } catch (e) {
        throw bodyFailure(e);
    }
};
