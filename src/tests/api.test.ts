import chai from "chai";
import chaiHttp from "chai-http";
import sinon from "sinon";
import { Express } from "express";
import { createApp } from "../app";
import { InMemoryDataConnector } from "../in-memory-data-connector";
import { seedDemoData } from "../seed";
import { buildServices, testClock, TODAY } from "./helpers";
const should = chai.should();

chai.use(chaiHttp);

const rpc = (app: Express, method: string, params?: unknown) => chai.request(app)
    .post("/")
    .set("content-type", "application/json")
    .send({jsonrpc: "2.0", method, params, id: 1});

describe("API Testing", () => {
    let app: Express;

    beforeEach(async () => {
        const time = testClock();
        const dataConnector = new InMemoryDataConnector();
        const services = buildServices(dataConnector, time);
        await seedDemoData(services, dataConnector);
        app = createApp(services, time.clock);
    });

    it("reports health", async () => {
        const res = await chai.request(app).get("/health");
        res.should.have.status(200);
        res.body.should.deep.equal({status: "healthy", timestamp: TODAY});
    });

    it("create book", async () => {
        const res = await rpc(app, "createBook", [{isbn: "978-0-13-475759-9", title: "Refactoring", totalCopies: 2, authorIds: [3]}]);
        res.should.have.status(200);
        res.body.should.have.property("result");
        sinon.assert.match(res.body.result, sinon.match({
            id: 5,
            isbn: "9780134757599",
            title: "Refactoring",
            totalCopies: 2,
            availableCopies: 2,
            categoryId: null,
        }));
        const view = await rpc(app, "getBook", [5]);
        view.body.result.authors.should.deep.equal(["Martin Fowler"]);
    });

    it("lists books with their authors", async () => {
        const res = await rpc(app, "getBooks");
        res.body.result.map((book: {title: string}) => book.title)
            .should.deep.equal(["Clean Code", "Design Patterns", "Domain-Driven Design", "Effective Java"]);
        sinon.assert.match(res.body.result[0], sinon.match({
            title: "Clean Code",
            availableCopies: 3,
            categoryName: "Technology",
            authors: ["Robert Martin"],
        }));
    });

    it("returns stats", async () => {
        const res = await rpc(app, "getStats", []);
        res.body.result.should.deep.equal({
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

    it("checks a book out and back in", async () => {
        const checkout = await rpc(app, "checkout", [{memberId: 1, bookId: 3, loanPeriodDays: 7}]);
        sinon.assert.match(checkout.body.result, sinon.match({
            id: 5,
            memberId: 1,
            bookId: 3,
            borrowDate: TODAY,
            dueDate: "2026-01-17T09:00:00.000Z",
            status: "borrowed",
        }));
        const returned = await rpc(app, "returnBook", [5]);
        sinon.assert.match(returned.body.result, sinon.match({id: 5, status: "returned", returnDate: TODAY}));
        const again = await rpc(app, "returnBook", [5]);
        again.body.error.should.deep.equal({code: 410, message: "borrowing (5) is already returned!", data: {kind: "AlreadyReturned"}});
    });

    it("lists overdue borrowings newest first", async () => {
        const res = await rpc(app, "getOverdueBorrowings");
        res.body.result.map((borrowing: {id: number}) => borrowing.id).should.deep.equal([4, 3, 2, 1]);
        res.body.result[0].status.should.equal("overdue");
    });

    it("refuses checkouts for inactive members", async () => {
        await rpc(app, "setMemberStatus", [2, "inactive"]);
        const res = await rpc(app, "checkout", [{memberId: 2, bookId: 1}]);
        should.not.exist(res.body.result);
        res.body.error.should.deep.equal({code: 403, message: "member (2) is not active!", data: {kind: "MemberInactive"}});
    });

    it("rejects invalid params", async () => {
        const res = await rpc(app, "createBook", [{isbn: "9780134757599", title: "Refactoring", totalCopies: 1, availableCopies: 2}]);
        res.body.error.code.should.equal(400);
        res.body.error.data.kind.should.equal("ValidationError");
        const missing = await rpc(app, "getMember", ["one"]);
        missing.body.error.data.kind.should.equal("ValidationError");
    });

    it("reports duplicate members", async () => {
        const res = await rpc(app, "createMember", [{firstName: "John", lastName: "Doe", email: "JOHN.DOE@email.com"}]);
        res.body.error.should.deep.equal({
            code: 409,
            message: "member with email (john.doe@email.com) already exists!",
            data: {kind: "DuplicateKey"},
        });
    });
});
