import type { ErpRequest, RequestOutcome } from "./erp-request";

export type CheckStatus = "PASS" | "FAIL" | "WARN";

export type HealthCheckResult = {
    check: string;
    status: CheckStatus;
    details: string;
};

export type HealthCheck = {
    name: string;
    run(request: ErpRequest): Promise<HealthCheckResult>;
};

export const ENDPOINTS = {
    base: "/",
    userProfiles: "/fscmRestApi/resources/11.13.18.05/userProfiles",
    version: "/fscmRestApi/resources/version",
    alerts: "/fscmRestApi/resources/latest/alerts?limit=5&orderBy=CreationDate:desc",
    journals: "/fscmRestApi/resources/11.13.18.05/journals",
} as const;

function statusOnly(check: string, path: string, auth: boolean, passDetails: (text: string) => string): HealthCheck {
    return {
        name: check,
        async run(request) {
            const out = await request(path, { auth });
            if (!out.ok) return { check, status: "FAIL", details: out.error };
            if (out.status === 200) return { check, status: "PASS", details: passDetails(out.text) };
            return { check, status: "FAIL", details: `Status: ${out.status}` };
        },
    };
}

export const connectivityCheck = statusOnly("Connectivity", ENDPOINTS.base, false, () => "Base URL reachable");

export const authenticationCheck = statusOnly(
    "Authentication",
    ENDPOINTS.userProfiles,
    true,
    () => "Auth successful, user profile accessible",
);

export const apiVersionCheck = statusOnly("API Version", ENDPOINTS.version, true, text => `Version: ${text.trim()}`);

export const deploymentsCheck = statusOnly(
    "Deployments",
    ENDPOINTS.journals,
    true,
    () => "Key deployment endpoint accessible",
);

/** Number of `items[].severity === "Critical"` entries in an alerts listing. */
export function countCriticalAlerts(body: string): number {
    const payload: unknown = JSON.parse(body);
    if (typeof payload !== "object" || payload === null || !("items" in payload)) return 0;
    const items = payload.items;
    if (!Array.isArray(items)) return 0;
    return items.filter(item =>
        typeof item === "object" && item !== null && "severity" in item && item.severity === "Critical",
    ).length;
}

// A transport failure here degrades to WARN, unlike every other check.
export const alertsCheck: HealthCheck = {
    name: "Alerts",
    async run(request) {
        const check = "Alerts";
        const out: RequestOutcome = await request(ENDPOINTS.alerts, { auth: true });
        if (!out.ok) return { check, status: "WARN", details: `Cannot fetch alerts: ${out.error}` };
        if (out.status !== 200) return { check, status: "FAIL", details: `Status: ${out.status}` };

        let critical: number;
        try {
            critical = countCriticalAlerts(out.text);
        } catch (err) {
            return { check, status: "FAIL", details: `Invalid alerts payload: ${err instanceof Error ? err.message : String(err)}` };
        }
        if (critical > 0) return { check, status: "FAIL", details: `${critical} critical alerts found` };
        return { check, status: "PASS", details: "No critical alerts" };
    },
};

export const HEALTH_CHECKS: readonly HealthCheck[] = [
    connectivityCheck,
    authenticationCheck,
    apiVersionCheck,
    alertsCheck,
    deploymentsCheck,
];

/** Runs the checks one after another, in order; a failing check never stops the rest. */
export async function runHealthChecks(
    request: ErpRequest,
    checks: readonly HealthCheck[] = HEALTH_CHECKS,
): Promise<HealthCheckResult[]> {
    const results: HealthCheckResult[] = [];
    for (const check of checks) {
        results.push(await check.run(request));
    }
    return results;
}
