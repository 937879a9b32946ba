import { expect } from "chai";
import sinon from "sinon";
import { BorrowingStatus, IBook, IMember } from "../base-data-connector";
import { ErrorKind } from "../errors";
import { InMemoryDataConnector } from "../in-memory-data-connector";
import { ILibraryServices } from "../rpc-methods";
import { buildServices, expectLibraryError, ITestClock, testClock, TODAY } from "./helpers";

describe("QueryFacade", () => {
    let dataConnector: InMemoryDataConnector;
    let services: ILibraryServices;
    let time: ITestClock;
    let cleanCode: IBook;
    let ddd: IBook;
    let refactoring: IBook;
    let alice: IMember;
    let bob: IMember;

    beforeEach(async () => {
        time = testClock();
        dataConnector = new InMemoryDataConnector();
        services = buildServices(dataConnector, time);
        const technology = await services.catalog.createCategory({name: "Technology"});
        const martin = await services.catalog.createAuthor({firstName: "Robert", lastName: "Martin"});
        const evans = await services.catalog.createAuthor({firstName: "Eric", lastName: "Evans"});
        const fowler = await services.catalog.createAuthor({firstName: "Martin", lastName: "Fowler"});
        refactoring = await services.catalog.createBook({isbn: "9780134757599", title: "Refactoring", totalCopies: 2, authorIds: [fowler.id]});
        cleanCode = await services.catalog.createBook({isbn: "9780132350884", title: "Clean Code", totalCopies: 5, categoryId: technology.id, authorIds: [martin.id]});
        ddd = await services.catalog.createBook({isbn: "9780321125217", title: "Domain-Driven Design", totalCopies: 3, authorIds: [fowler.id, evans.id]});
        bob = await services.membership.createMember({firstName: "Bob", lastName: "Baker", email: "bob@example.com"});
        alice = await services.membership.createMember({firstName: "Alice", lastName: "Archer", email: "alice@example.com"});
        await services.membership.createMember({firstName: "Zed", lastName: "Archer", email: "zed@example.com"});
    });

    afterEach(() => {
        sinon.restore();
    });

    it("lists books by title with category and author names", async () => {
        const books = await services.queries.booksWithAuthors();
        expect(books.map((book) => book.title)).to.deep.equal(["Clean Code", "Domain-Driven Design", "Refactoring"]);
        expect(books[0]).to.deep.equal({
            id: cleanCode.id,
            isbn: "9780132350884",
            title: "Clean Code",
            publicationYear: null,
            publisher: null,
            totalCopies: 5,
            availableCopies: 5,
            categoryName: "Technology",
            authors: ["Robert Martin"],
        });
        expect(books[1].authors).to.deep.equal(["Eric Evans", "Martin Fowler"]);
        expect(books[2].categoryName).to.equal(null);
    });

    it("shows a single book or reports it missing", async () => {
        const view = await services.queries.bookView(ddd.id);
        expect(view.authors).to.deep.equal(["Eric Evans", "Martin Fowler"]);
        await expectLibraryError(services.queries.bookView(99), ErrorKind.NotFound);
    });

    it("counts books per author, ordered by name", async () => {
        const authors = await services.queries.authorsWithBookCount();
        expect(authors.map((author) => [author.lastName, author.bookCount])).to.deep.equal([
            ["Evans", 1],
            ["Fowler", 2],
            ["Martin", 1],
        ]);
    });

    describe("with lending history", () => {
        beforeEach(async () => {
            await services.ledger.checkout({memberId: alice.id, bookId: cleanCode.id});
            time.advanceDays(1);
            const bobsLoan = await services.ledger.checkout({memberId: bob.id, bookId: ddd.id});
            time.advanceDays(1);
            await services.ledger.checkout({memberId: alice.id, bookId: refactoring.id, loanPeriodDays: 30});
            await services.ledger.returnBook(bobsLoan.id);
            time.advanceDays(18);
        });

        it("counts every borrowing a member has made, open or not", async () => {
            const members = await services.queries.membersWithLoanCount();
            expect(members.map((member) => [member.name, member.totalBorrowings])).to.deep.equal([
                ["Alice Archer", 2],
                ["Zed Archer", 0],
                ["Bob Baker", 1],
            ]);
            expect(members[0].membershipDate.toISOString()).to.equal(TODAY);
        });

        it("lists borrowings newest first with names and live status", async () => {
            const borrowings = await services.queries.borrowingsWithNames();
            expect(borrowings.map((borrowing) => [borrowing.bookTitle, borrowing.memberName, borrowing.status])).to.deep.equal([
                ["Refactoring", "Alice Archer", BorrowingStatus.BORROWED],
                ["Domain-Driven Design", "Bob Baker", BorrowingStatus.RETURNED],
                ["Clean Code", "Alice Archer", BorrowingStatus.OVERDUE],
            ]);
            expect(borrowings[1].returnDate && borrowings[1].returnDate.toISOString()).to.equal("2026-01-12T09:00:00.000Z");
            expect(borrowings[2].isbn).to.equal("9780132350884");
        });
    });

    describe("with dangling references", () => {
        it("refuses to show a book whose category is missing", async () => {
            sinon.stub(dataConnector, "getAllCategories").resolves([]);
            await expectLibraryError(services.queries.booksWithAuthors(), ErrorKind.InternalInconsistency);
            await expectLibraryError(services.queries.bookView(cleanCode.id), ErrorKind.InternalInconsistency);
        });

        it("refuses to show a book whose author is missing", async () => {
            sinon.stub(dataConnector, "getAllAuthors").resolves([]);
            await expectLibraryError(services.queries.bookView(ddd.id), ErrorKind.InternalInconsistency);
        });

        it("refuses to list a borrowing whose member is missing", async () => {
            await services.ledger.checkout({memberId: alice.id, bookId: refactoring.id});
            sinon.stub(dataConnector, "getAllMembers").resolves([]);
            await expectLibraryError(services.queries.borrowingsWithNames(), ErrorKind.InternalInconsistency);
        });
    });
});
