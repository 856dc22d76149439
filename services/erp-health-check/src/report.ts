import { writeFile } from "fs/promises";
import * as path from "path";

import { validate } from "../../../libs/contracts/src/validate";
import type { CheckStatus, HealthCheckResult } from "./checks";

export const REPORT_FILE_NAME = "fusion_health_report.json";

export type HealthReport = {
    timestamp: string;
    fusion_url: string;
    health_checks: HealthCheckResult[];
    overall_status: CheckStatus;
};

/** PASS only when everything passed; any FAIL wins over WARN. */
export function overallStatus(results: readonly HealthCheckResult[]): CheckStatus {
    if (results.every(r => r.status === "PASS")) return "PASS";
    if (results.some(r => r.status === "FAIL")) return "FAIL";
    return "WARN";
}

export function buildHealthReport(baseUrl: string, results: HealthCheckResult[], now: Date = new Date()): HealthReport {
    const report: HealthReport = {
        timestamp: now.toISOString(),
        fusion_url: baseUrl,
        health_checks: results,
        overall_status: overallStatus(results),
    };
    validate<HealthReport>("health.report.v1", report);
    return report;
}

export function formatHealthReport(report: HealthReport): string {
    return JSON.stringify(report, null, 2);
}

export async function writeHealthReport(report: HealthReport, dir: string = process.cwd()): Promise<string> {
    const file = path.join(dir, REPORT_FILE_NAME);
    await writeFile(file, formatHealthReport(report), "utf8");
    return file;
}
