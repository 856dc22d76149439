import type { HealthCheckConfig } from "./config";

export type RequestOutcome =
    | { ok: true; status: number; text: string }
    | { ok: false; error: string };

export type RequestOptions = { auth: boolean };

/** One GET against the ERP base URL; never rejects. */
export type ErpRequest = (path: string, opts: RequestOptions) => Promise<RequestOutcome>;

export function transportErrorMessage(err: unknown): string {
    if (!(err instanceof Error)) return String(err);
    // undici reports "fetch failed" and keeps the socket error as the cause
    const cause = err.cause instanceof Error ? err.cause.message : undefined;
    return cause && cause !== err.message ? `${err.message}: ${cause}` : err.message;
}

export function basicAuthorization(username: string, password: string): string {
    return "Basic " + Buffer.from(`${username}:${password}`, "utf8").toString("base64");
}

export function createErpRequest(config: HealthCheckConfig, fetchImpl: typeof fetch = fetch): ErpRequest {
    return async (path, opts) => {
        const headers: Record<string, string> = { "Content-Type": "application/json" };
        if (opts.auth) headers.Authorization = basicAuthorization(config.username, config.password);

        try {
            const response = await fetchImpl(`${config.baseUrl}${path}`, {
                method: "GET",
                headers,
                signal: AbortSignal.timeout(config.timeoutMs),
            });
            const text = await response.text();
            return { ok: true, status: response.status, text };
        } catch (err) {
            return { ok: false, error: transportErrorMessage(err) };
        }
    };
}
