import dotenv from "dotenv";
import { z } from "zod";
import { MAX_LOAN_PERIOD_DAYS } from "./schemas";
dotenv.config();

const envSchema = z.object({
    API_PORT: z.coerce.number().int().positive().default(3000),
    DATA_CONNECTOR: z.enum(["InMemoryDataConnector", "SequelizeDataConnector"]).default("SequelizeDataConnector"),
    DB_CONNECTION_STRING: z.string().min(1).default("sqlite::memory:"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    DEFAULT_LOAN_PERIOD_DAYS: z.coerce.number().int().positive().max(MAX_LOAN_PERIOD_DAYS).default(30),
    LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    LENDING_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    SEED_DEMO_DATA: z.enum(["true", "false"]).default("true").transform((value) => value === "true"),
});

export type DataConnectorType = z.infer<typeof envSchema>["DATA_CONNECTOR"];

export interface AppConfig {
    port: number;
    dataConnector: DataConnectorType;
    dbConnectionString: string;
    logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
    defaultLoanPeriodDays: number;
    lockTimeoutMs: number;
    lendingMaxRetries: number;
    seedDemoData: boolean;
}

/**
 * Reads the service configuration from environment variables (after `.env`
 * has been merged in). Unset variables fall back to their defaults; invalid
 * ones fail fast with every offending variable listed.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new Error(`Invalid configuration! ${problems.join("; ")}`);
    }
    const vars = parsed.data;
    return {
        port: vars.API_PORT,
        dataConnector: vars.DATA_CONNECTOR,
        dbConnectionString: vars.DB_CONNECTION_STRING,
        logLevel: vars.LOG_LEVEL,
        defaultLoanPeriodDays: vars.DEFAULT_LOAN_PERIOD_DAYS,
        lockTimeoutMs: vars.LOCK_TIMEOUT_MS,
        lendingMaxRetries: vars.LENDING_MAX_RETRIES,
        seedDemoData: vars.SEED_DEMO_DATA,
    };
};

export const config = loadConfig();
