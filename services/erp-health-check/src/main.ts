#!/usr/bin/env node
import { runHealthChecks } from "./checks";
import { ConfigError, loadHealthCheckConfig } from "./config";
import { createErpRequest } from "./erp-request";
import { REPORT_FILE_NAME, buildHealthReport, formatHealthReport, writeHealthReport, type HealthReport } from "./report";

export type RunOptions = {
    env?: NodeJS.ProcessEnv;
    fetchImpl?: typeof fetch;
    outputDir?: string;
    now?: () => Date;
    log?: (line: string) => void;
};

/**
 * Checks the ERP REST API, prints the JSON report and saves it to
 * `fusion_health_report.json`. Throws `ConfigError` before any request when
 * the base URL or credentials are missing.
 */
export async function runHealthCheck(opts: RunOptions = {}): Promise<HealthReport> {
    const config = loadHealthCheckConfig(opts.env);
    const log = opts.log ?? ((line: string) => console.log(line));

    const request = createErpRequest(config, opts.fetchImpl);
    const results = await runHealthChecks(request);
    const report = buildHealthReport(config.baseUrl, results, (opts.now ?? (() => new Date()))());

    log(formatHealthReport(report));
    await writeHealthReport(report, opts.outputDir);
    log(`Health check report saved to ${REPORT_FILE_NAME}`);
    return report;
}

export type CliOptions = RunOptions & {
    error?: (line: string) => void;
};

/** Runs one health check and resolves with the process exit code. */
export async function cli(opts: CliOptions = {}): Promise<number> {
    const error = opts.error ?? ((line: string) => console.error(line));
    try {
        await runHealthCheck(opts);
        return 0;
    } catch (err) {
        if (err instanceof ConfigError) {
            error(err.message);
        } else {
            error(`health-check failed: ${err instanceof Error ? err.message : String(err)}`);
        }
        return 1;
    }
}

if (require.main === module) {
    void cli().then(code => {
        process.exitCode = code;
    });
}
