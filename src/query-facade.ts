import { BaseDataConnector, IAuthor, IBook, IBookAuthor, ICategory } from "./base-data-connector";
import { ErrorKind, LibraryError } from "./errors";
import { IAuthorView, IBookView, IBorrowingView, IMemberView } from "./interfaces";
import { effectiveStatus } from "./ledger";
import { logger } from "./logger";
import { Clock, displayName, groupBy, systemClock } from "./utils";

const byName = (a: {firstName: string, lastName: string, id: number}, b: {firstName: string, lastName: string, id: number}) =>
    a.lastName.localeCompare(b.lastName) || a.firstName.localeCompare(b.firstName) || a.id - b.id;

const inconsistency = (detail: string) => {
    const error = LibraryError.fromKind(ErrorKind.InternalInconsistency, detail);
    logger.error({err: error}, "Read view references a missing entity");
    return error;
}

/**
 * Composed, read-only views over the catalog, membership and lending data.
 * Joins are done here so that every data connector serves the same shapes.
 */
export class QueryFacade {
    private dataConnector: BaseDataConnector;
    private clock: Clock;
    constructor(dataConnector: BaseDataConnector, clock: Clock = systemClock) {
        this.dataConnector = dataConnector;
        this.clock = clock;
    }
    public async booksWithAuthors(): Promise<IBookView[]> {
        const [books, categories, authors, links] = await Promise.all([
            this.dataConnector.getAllBooks(),
            this.dataConnector.getAllCategories(),
            this.dataConnector.getAllAuthors(),
            this.dataConnector.getAllBookAuthors(),
        ]);
        const toView = this.bookViewer(categories, authors, links);
        return books.map(toView).sort((a, b) => a.title.localeCompare(b.title) || a.id - b.id);
    }
    public async bookView(bookId: number): Promise<IBookView> {
        const book = await this.dataConnector.getBook(bookId);
        if (!book) {
            throw LibraryError.fromKind(ErrorKind.NotFound, "book", bookId);
        }
        const [categories, authors, links] = await Promise.all([
            this.dataConnector.getAllCategories(),
            this.dataConnector.getAllAuthors(),
            this.dataConnector.getAllBookAuthors(),
        ]);
        return this.bookViewer(categories, authors, links)(book);
    }
    public async authorsWithBookCount(): Promise<IAuthorView[]> {
        const [authors, links] = await Promise.all([
            this.dataConnector.getAllAuthors(),
            this.dataConnector.getAllBookAuthors(),
        ]);
        const linksByAuthor = groupBy(links, (link) => link.authorId);
        return authors.sort(byName).map((author) => ({
            id: author.id,
            firstName: author.firstName,
            lastName: author.lastName,
            birthDate: author.birthDate,
            nationality: author.nationality,
            bookCount: (linksByAuthor[author.id] || []).length,
        }));
    }
    public async membersWithLoanCount(): Promise<IMemberView[]> {
        const [members, borrowings] = await Promise.all([
            this.dataConnector.getAllMembers(),
            this.dataConnector.getAllBorrowings(),
        ]);
        const borrowingsByMember = groupBy(borrowings, (borrowing) => borrowing.memberId);
        return members.sort(byName).map((member) => ({
            id: member.id,
            name: displayName(member),
            firstName: member.firstName,
            lastName: member.lastName,
            email: member.email,
            phone: member.phone,
            address: member.address,
            status: member.status,
            membershipDate: member.membershipDate,
            totalBorrowings: (borrowingsByMember[member.id] || []).length,
        }));
    }
    public async borrowingsWithNames(): Promise<IBorrowingView[]> {
        const now = this.clock();
        const [borrowings, members, books] = await Promise.all([
            this.dataConnector.getAllBorrowings(),
            this.dataConnector.getAllMembers(),
            this.dataConnector.getAllBooks(),
        ]);
        const membersById = new Map(members.map((member) => [member.id, member]));
        const booksById = new Map(books.map((book) => [book.id, book]));
        return borrowings
            .sort((a, b) => b.borrowDate.getTime() - a.borrowDate.getTime() || b.id - a.id)
            .map((borrowing) => {
                const member = membersById.get(borrowing.memberId);
                const book = booksById.get(borrowing.bookId);
                if (!member || !book) {
                    throw inconsistency(`borrowing (${borrowing.id}) references member (${borrowing.memberId}) and book (${borrowing.bookId}), one of which is missing`);
                }
                return {
                    id: borrowing.id,
                    memberId: member.id,
                    memberName: displayName(member),
                    bookId: book.id,
                    bookTitle: book.title,
                    isbn: book.isbn,
                    borrowDate: borrowing.borrowDate,
                    dueDate: borrowing.dueDate,
                    returnDate: borrowing.returnDate,
                    status: effectiveStatus(borrowing, now),
                };
            });
    }
    private bookViewer(categories: ICategory[], authors: IAuthor[], links: IBookAuthor[]) {
        const categoriesById = new Map(categories.map((category) => [category.id, category]));
        const authorsById = new Map(authors.map((author) => [author.id, author]));
        const linksByBook = groupBy(links, (link) => link.bookId);
        return (book: IBook): IBookView => {
            const category = book.categoryId === null ? undefined : categoriesById.get(book.categoryId);
            if (book.categoryId !== null && !category) {
                throw inconsistency(`book (${book.id}) references missing category (${book.categoryId})`);
            }
            const bookAuthors = (linksByBook[book.id] || [])
                .map((link) => link.authorId)
                .sort((a, b) => a - b)
                .map((authorId) => {
                    const author = authorsById.get(authorId);
                    if (!author) {
                        throw inconsistency(`book (${book.id}) references missing author (${authorId})`);
                    }
                    return displayName(author);
                });
            return {
                id: book.id,
                isbn: book.isbn,
                title: book.title,
                publicationYear: book.publicationYear,
                publisher: book.publisher,
                totalCopies: book.totalCopies,
                availableCopies: book.availableCopies,
                categoryName: category ? category.name : null,
                authors: bookAuthors,
            };
        };
    }
}
