import { Sequelize, Transaction } from "sequelize";
import { config } from "../config";
import { logger } from "../logger";

export const sequelize = new Sequelize(config.dbConnectionString, {
    logging: (msg) => logger.debug(msg),
    // sqlite only: take the write lock when the transaction begins
    transactionType: Transaction.TYPES.IMMEDIATE,
    pool: { acquire: config.lockTimeoutMs },
});
