import pino from "pino";
import { config } from "./config";

export type Logger = pino.Logger;

export const logger: Logger = pino({
    level: config.logLevel,
    base: {
        service: "library-ledger",
        version: process.env.APP_VERSION || "dev",
    },
});
