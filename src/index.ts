import { createApp, createServices } from "./app";
import { config } from "./config";
import { createDataConnector } from "./data-connectors";
import { IBorrowing } from "./base-data-connector";
import { logger } from "./logger";
import { seedDemoData } from "./seed";

export const main = async () => {
    const dataConnector = createDataConnector(config.dataConnector, {
        lockTimeoutMs: config.lockTimeoutMs,
        maxRetries: config.lendingMaxRetries,
    });
    const services = createServices(dataConnector, {defaultLoanPeriodDays: config.defaultLoanPeriodDays});
    services.ledger.on("checkedOut", (borrowing: IBorrowing) => logger.debug({borrowing}, "checkedOut"));
    services.ledger.on("returned", (borrowing: IBorrowing) => logger.debug({borrowing}, "returned"));
    if (config.seedDemoData) {
        await seedDemoData(services, dataConnector);
    }
    const app = createApp(services);
    return app.listen(config.port, () => {
        logger.info(`API server listening on port ${config.port}!`);
    });
}

if (require.main === module) {
    main().catch((error) => {
        logger.fatal({err: error}, "API server failed to start");
        process.exit(1);
    });
}
