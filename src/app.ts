import express from "express";
import jayson from "jayson";
import { AggregationService } from "./aggregation-service";
import { BaseDataConnector } from "./base-data-connector";
import { CatalogStore } from "./catalog-store";
import { LendingLedger } from "./ledger";
import { MembershipStore } from "./membership-store";
import { QueryFacade } from "./query-facade";
import { createRpcMethods, ILibraryServices } from "./rpc-methods";
import { Clock, systemClock } from "./utils";

export interface IServiceOptions {
    defaultLoanPeriodDays: number;
    clock?: Clock;
}

export const createServices = (dataConnector: BaseDataConnector, options: IServiceOptions): ILibraryServices => {
    const clock = options.clock || systemClock;
    return {
        catalog: new CatalogStore(dataConnector),
        membership: new MembershipStore(dataConnector, clock),
        ledger: new LendingLedger(dataConnector, {defaultLoanPeriodDays: options.defaultLoanPeriodDays, clock}),
        stats: new AggregationService(dataConnector, clock),
        queries: new QueryFacade(dataConnector, clock),
    };
}

export const createApp = (services: ILibraryServices, clock: Clock = systemClock) => {
    const app = express();
    app.use(express.json());
    app.get("/health", (req, res) => {
        res.send({status: "healthy", timestamp: clock().toISOString()});
    });
    app.use(new jayson.Server(createRpcMethods(services)).middleware());
    return app;
}
