import { BaseDataConnector, IDataConnectorConfig } from "./base-data-connector";
import { DataConnectorType } from "./config";
import { InMemoryDataConnector } from "./in-memory-data-connector";
import { SequelizeDataConnector } from "./sequelize-data-connector";
export { InMemoryDataConnector } from "./in-memory-data-connector";
export { SequelizeDataConnector } from "./sequelize-data-connector";
export type { DataConnectorType } from "./config";

export const createDataConnector = (type: DataConnectorType, config?: IDataConnectorConfig): BaseDataConnector => {
    switch (type) {
        case "InMemoryDataConnector":
            return new InMemoryDataConnector(config);
        case "SequelizeDataConnector":
            return new SequelizeDataConnector(config);
    }
}
