import { expect } from "chai";
import { createServices } from "../app";
import { BaseDataConnector } from "../base-data-connector";
import { ErrorKind, LibraryError } from "../errors";
import { InMemoryDataConnector } from "../in-memory-data-connector";
import { ILibraryServices } from "../rpc-methods";
import { addDays, Clock } from "../utils";

export const TODAY = "2026-01-10T09:00:00.000Z";
export const LOAN_PERIOD_DAYS = 14;

export interface ITestClock {
    clock: Clock;
    advanceDays: (days: number) => void;
}
export const testClock = (start: string = TODAY): ITestClock => {
    let now = new Date(start);
    return {
        clock: () => now,
        advanceDays: (days: number) => {
            now = addDays(now, days);
        },
    };
}

export const buildServices = (dataConnector: BaseDataConnector = new InMemoryDataConnector({lockTimeoutMs: 2000}), time: ITestClock = testClock()): ILibraryServices =>
    createServices(dataConnector, {defaultLoanPeriodDays: LOAN_PERIOD_DAYS, clock: time.clock});

export const expectLibraryError = async (promise: Promise<unknown>, kind: ErrorKind) => {
    let caught: unknown;
    try {
        await promise;
    } catch (error) {
        caught = error;
    }
    expect(caught, `expected a ${kind} error`).to.be.instanceOf(LibraryError);
    if (caught instanceof LibraryError) {
        expect(caught.kind).to.equal(kind);
    }
}

export const expectConsistent = async (services: ILibraryServices) => {
    expect(await services.ledger.auditInventory()).to.deep.equal([]);
}
