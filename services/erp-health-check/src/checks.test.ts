import { ENDPOINTS, countCriticalAlerts, runHealthChecks } from "./checks";
import type { ErpRequest, RequestOutcome } from "./erp-request";
import { overallStatus } from "./report";

const ok = (text = "{}", status = 200): RequestOutcome => ({ ok: true, status, text });
const down = (error: string): RequestOutcome => ({ ok: false, error });

function scriptedRequest(overrides: Partial<Record<string, RequestOutcome>> = {}, calls: string[] = []): ErpRequest {
    const defaults: Record<string, RequestOutcome> = {
        [ENDPOINTS.base]: ok("<html></html>"),
        [ENDPOINTS.userProfiles]: ok(),
        [ENDPOINTS.version]: ok("  11.13.18.05\n"),
        [ENDPOINTS.alerts]: ok(JSON.stringify({ items: [{ severity: "Warning" }, { severity: "Low" }] })),
        [ENDPOINTS.journals]: ok(),
    };
    return async (path, opts) => {
        calls.push(`${path} auth=${opts.auth}`);
        return overrides[path] ?? defaults[path];
    };
}

test("all endpoints healthy -> five PASS results in fixed order", async () => {
    const calls: string[] = [];
    const results = await runHealthChecks(scriptedRequest({}, calls));

    expect(results).toEqual([
        { check: "Connectivity", status: "PASS", details: "Base URL reachable" },
        { check: "Authentication", status: "PASS", details: "Auth successful, user profile accessible" },
        { check: "API Version", status: "PASS", details: "Version: 11.13.18.05" },
        { check: "Alerts", status: "PASS", details: "No critical alerts" },
        { check: "Deployments", status: "PASS", details: "Key deployment endpoint accessible" },
    ]);
    expect(overallStatus(results)).toBe("PASS");
    expect(calls).toEqual([
        "/ auth=false",
        "/fscmRestApi/resources/11.13.18.05/userProfiles auth=true",
        "/fscmRestApi/resources/version auth=true",
        "/fscmRestApi/resources/latest/alerts?limit=5&orderBy=CreationDate:desc auth=true",
        "/fscmRestApi/resources/11.13.18.05/journals auth=true",
    ]);
});

test("alerts transport error degrades to WARN only", async () => {
    const results = await runHealthChecks(scriptedRequest({
        [ENDPOINTS.alerts]: down("The operation was aborted due to timeout"),
    }));

    expect(results[3]).toEqual({
        check: "Alerts",
        status: "WARN",
        details: "Cannot fetch alerts: The operation was aborted due to timeout",
    });
    expect(overallStatus(results)).toBe("WARN");
});

test("a non-200 response fails and overrides the alerts WARN", async () => {
    const results = await runHealthChecks(scriptedRequest({
        [ENDPOINTS.userProfiles]: ok("", 401),
        [ENDPOINTS.alerts]: down("fetch failed: connect ECONNREFUSED"),
    }));

    expect(results.map(r => r.status)).toEqual(["PASS", "FAIL", "PASS", "WARN", "PASS"]);
    expect(results[1].details).toBe("Status: 401");
    expect(overallStatus(results)).toBe("FAIL");
});

test("transport errors on other checks are FAIL with the message", async () => {
    const results = await runHealthChecks(scriptedRequest({
        [ENDPOINTS.base]: down("fetch failed: getaddrinfo ENOTFOUND erp.example.test"),
        [ENDPOINTS.journals]: down("fetch failed: socket hang up"),
    }));

    expect(results[0]).toEqual({
        check: "Connectivity",
        status: "FAIL",
        details: "fetch failed: getaddrinfo ENOTFOUND erp.example.test",
    });
    expect(results[4]).toEqual({ check: "Deployments", status: "FAIL", details: "fetch failed: socket hang up" });
});

test("critical alerts fail the alerts check", async () => {
    const results = await runHealthChecks(scriptedRequest({
        [ENDPOINTS.alerts]: ok(JSON.stringify({
            items: [{ severity: "Critical" }, { severity: "Warning" }, { severity: "Critical" }],
        })),
    }));

    expect(results[3]).toEqual({ check: "Alerts", status: "FAIL", details: "2 critical alerts found" });
});

test("alerts non-200 and unreadable payloads fail", async () => {
    const forbidden = await runHealthChecks(scriptedRequest({ [ENDPOINTS.alerts]: ok("", 403) }));
    expect(forbidden[3]).toEqual({ check: "Alerts", status: "FAIL", details: "Status: 403" });

    const garbled = await runHealthChecks(scriptedRequest({ [ENDPOINTS.alerts]: ok("<html>") }));
    expect(garbled[3].status).toBe("FAIL");
    expect(garbled[3].details).toMatch(/^Invalid alerts payload: /);
});

test("countCriticalAlerts tolerates a missing items list", () => {
    expect(countCriticalAlerts("{}")).toBe(0);
    expect(countCriticalAlerts(JSON.stringify({ items: "none" }))).toBe(0);
    expect(countCriticalAlerts(JSON.stringify({ items: [{ severity: "critical" }, null, { severity: "Critical" }] }))).toBe(1);
});
