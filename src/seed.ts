import { BaseDataConnector } from "./base-data-connector";
import { ErrorKind, LibraryError } from "./errors";
import demoData from "./fixtures/demo-data.json";
import { logger } from "./logger";
import { ILibraryServices } from "./rpc-methods";
import { displayName } from "./utils";

export type ISeedData = typeof demoData;

const lookup = (ids: Map<string, number>, key: string, entityType: string) => {
    const id = ids.get(key);
    if (id === undefined) {
        throw LibraryError.fromKind(ErrorKind.ValidationError, `seed data references unknown ${entityType} "${key}"`);
    }
    return id;
}

/**
 * Loads the demo catalog into an empty store. Historical loans go through
 * the connector's checkout transition, so copy counts come out consistent
 * with the open borrowings. Returns false when the store already has books.
 */
export const seedDemoData = async (services: ILibraryServices, dataConnector: BaseDataConnector, data: ISeedData = demoData): Promise<boolean> => {
    if (await dataConnector.countBooks() > 0) {
        logger.info("Store already has books, skipping demo data");
        return false;
    }
    const categoryIds = new Map<string, number>();
    for (const category of data.categories) {
        categoryIds.set(category.name, (await services.catalog.createCategory(category)).id);
    }
    const authorIds = new Map<string, number>();
    for (const author of data.authors) {
        const created = await services.catalog.createAuthor(author);
        authorIds.set(displayName(created), created.id);
    }
    const bookIds = new Map<string, number>();
    for (const book of data.books) {
        const created = await services.catalog.createBook({
            isbn: book.isbn,
            title: book.title,
            publicationYear: book.publicationYear,
            publisher: book.publisher,
            totalCopies: book.totalCopies,
            categoryId: lookup(categoryIds, book.category, "category"),
            authorIds: book.authors.map((name) => lookup(authorIds, name, "author")),
        });
        bookIds.set(created.isbn, created.id);
    }
    const memberIds = new Map<string, number>();
    for (const member of data.members) {
        const created = await services.membership.createMember(member);
        memberIds.set(created.email, created.id);
    }
    for (const borrowing of data.borrowings) {
        await dataConnector.applyCheckout({
            memberId: lookup(memberIds, borrowing.email, "member"),
            bookId: lookup(bookIds, borrowing.isbn, "book"),
            borrowDate: new Date(borrowing.borrowDate),
            dueDate: new Date(borrowing.dueDate),
        });
    }
    const violations = await services.ledger.auditInventory();
    if (violations.length > 0) {
        throw LibraryError.fromKind(ErrorKind.InternalInconsistency, `demo data left ${violations.length} books inconsistent`);
    }
    logger.info(`Seeded ${data.books.length} books, ${data.members.length} members and ${data.borrowings.length} borrowings`);
    return true;
}
