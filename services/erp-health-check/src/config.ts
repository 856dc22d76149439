import { z } from "zod";

export const REQUIRED_SETTINGS = ["ERP_BASE_URL", "ERP_USERNAME", "ERP_PASSWORD"] as const;

export const DEFAULT_TIMEOUT_MS = 30_000;

const HealthCheckEnvSchema = z.object({
    ERP_BASE_URL: z.string().trim().url(),
    ERP_USERNAME: z.string().min(1),
    ERP_PASSWORD: z.string().min(1),
    ERP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export type HealthCheckConfig = {
    baseUrl: string;
    username: string;
    password: string;
    timeoutMs: number;
};

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export function loadHealthCheckConfig(env: NodeJS.ProcessEnv = process.env): HealthCheckConfig {
    const missing = REQUIRED_SETTINGS.filter(name => !env[name]?.trim());
    if (missing.length > 0) {
        throw new ConfigError(`Error: Please set ${REQUIRED_SETTINGS.join(", ")}. Missing: ${missing.join(", ")}.`);
    }

    const parsed = HealthCheckEnvSchema.safeParse({
        ...env,
        ERP_TIMEOUT_MS: env.ERP_TIMEOUT_MS?.trim() || undefined,
    });
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new ConfigError(`Error: Invalid configuration. ${issues}`);
    }

    return {
        baseUrl: parsed.data.ERP_BASE_URL.replace(/\/+$/, ""),
        username: parsed.data.ERP_USERNAME,
        password: parsed.data.ERP_PASSWORD,
        timeoutMs: parsed.data.ERP_TIMEOUT_MS,
    };
}
