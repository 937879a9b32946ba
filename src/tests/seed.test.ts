import { expect } from "chai";
import { InMemoryDataConnector } from "../in-memory-data-connector";
import { ILibraryServices } from "../rpc-methods";
import { seedDemoData } from "../seed";
import { buildServices, expectConsistent, TODAY } from "./helpers";

describe("seedDemoData", () => {
    let dataConnector: InMemoryDataConnector;
    let services: ILibraryServices;

    beforeEach(() => {
        dataConnector = new InMemoryDataConnector();
        services = buildServices(dataConnector);
    });

    it("loads a consistent demo library", async () => {
        expect(await seedDemoData(services, dataConnector)).to.equal(true);
        await expectConsistent(services);
        expect(await services.stats.computeStats()).to.deep.equal({
            totalBooks: 4,
            totalAuthors: 4,
            totalMembers: 3,
            activeBorrowings: 4,
            overdueBorrowings: 4,
            totalCopies: 18,
            availableCopies: 14,
            generatedAt: TODAY,
        });
    });

    it("keeps the historical loan dates", async () => {
        await seedDemoData(services, dataConnector);
        const [latest] = await services.queries.borrowingsWithNames();
        expect(latest.memberName).to.equal("Mike Johnson");
        expect(latest.bookTitle).to.equal("Effective Java");
        expect(latest.borrowDate.toISOString()).to.equal("2025-07-01T00:00:00.000Z");
        expect(latest.dueDate.toISOString()).to.equal("2025-07-31T00:00:00.000Z");
    });

    it("leaves a library that already has books alone", async () => {
        await services.catalog.createBook({isbn: "9780132350884", title: "Clean Code"});
        expect(await seedDemoData(services, dataConnector)).to.equal(false);
        expect(await services.catalog.listBooks()).to.have.length(1);
        expect(await services.membership.listMembers()).to.have.length(0);
    });
});
