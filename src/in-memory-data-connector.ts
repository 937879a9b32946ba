import {
    BaseDataConnector, BorrowingStatus, IAuthor, IAuthorFields, IBook, IBookAuthor, IBookAuthorFields, IBookFields,
    IBorrowing, IBorrowingFields, IBorrowingFilter, ICategory, ICategoryFields, ICheckoutDraft, IDataConnectorConfig,
    IMember, IMemberFields, MemberStatus, Stored,
} from "./base-data-connector";
import { ErrorKind, LibraryError } from "./errors";

class Table<F extends object> {
    private rows: Stored<F>[] = [];
    constructor(private entityType: string, private uniqueKeys: (keyof F)[][] = []) {}
    public assertUnique(fields: F) {
        for (const keys of this.uniqueKeys) {
            if (this.rows.some((row) => keys.every((key) => row[key] === fields[key]))) {
                throw LibraryError.fromKind(ErrorKind.DuplicateKey, this.entityType, keys.join("+"), keys.map((key) => String(fields[key])).join("+"));
            }
        }
    }
    public insert(fields: F): Stored<F> {
        this.assertUnique(fields);
        const row = {...fields, id: this.rows.length + 1, createdAt: new Date()};
        this.rows.push(row);
        return {...row};
    }
    public get(id: number): Stored<F> | undefined {
        const row = this.rows.find((r) => r.id === id);
        return row && {...row};
    }
    public all(predicate?: (row: Stored<F>) => boolean): Stored<F>[] {
        return this.rows.filter((row) => !predicate || predicate(row)).map((row) => ({...row}));
    }
    public update(id: number, newData: Partial<F>): Stored<F> | undefined {
        const row = this.rows.find((r) => r.id === id);
        if (!row) {
            return;
        }
        Object.assign(row, newData);
        return {...row};
    }
}

export class InMemoryDataConnector extends BaseDataConnector {
    private categories = new Table<ICategoryFields>("category", [["name"]]);
    private authors = new Table<IAuthorFields>("author");
    private books = new Table<IBookFields>("book", [["isbn"]]);
    private bookAuthors = new Table<IBookAuthorFields>("book_author", [["bookId", "authorId"]]);
    private members = new Table<IMemberFields>("member", [["email"]]);
    private borrowings = new Table<IBorrowingFields>("borrowing");
    constructor(config?: IDataConnectorConfig) {
        super(config);
    }
    public async insertCategory(category: ICategoryFields): Promise<ICategory> {
        return this.categories.insert(category);
    }
    public async getCategory(categoryId: number): Promise<ICategory | undefined> {
        return this.categories.get(categoryId);
    }
    public async getAllCategories(): Promise<ICategory[]> {
        return this.categories.all();
    }
    public async insertAuthor(author: IAuthorFields): Promise<IAuthor> {
        return this.authors.insert(author);
    }
    public async getAuthor(authorId: number): Promise<IAuthor | undefined> {
        return this.authors.get(authorId);
    }
    public async getAllAuthors(): Promise<IAuthor[]> {
        return this.authors.all();
    }
    public async insertBook(book: IBookFields, authorIds: number[]): Promise<IBook> {
        const inserted = this.books.insert(book);
        for (const authorId of [...new Set(authorIds)]) {
            this.bookAuthors.insert({bookId: inserted.id, authorId});
        }
        return inserted;
    }
    public async getBook(bookId: number): Promise<IBook | undefined> {
        return this.books.get(bookId);
    }
    public async getAllBooks(): Promise<IBook[]> {
        return this.books.all();
    }
    public async insertBookAuthor(link: IBookAuthorFields): Promise<IBookAuthor> {
        return this.bookAuthors.insert(link);
    }
    public async getAllBookAuthors(): Promise<IBookAuthor[]> {
        return this.bookAuthors.all();
    }
    public async insertMember(member: IMemberFields): Promise<IMember> {
        return this.members.insert(member);
    }
    public async getMember(memberId: number): Promise<IMember | undefined> {
        return this.members.get(memberId);
    }
    public async getAllMembers(): Promise<IMember[]> {
        return this.members.all();
    }
    public async updateMemberStatus(memberId: number, status: MemberStatus): Promise<IMember | undefined> {
        return this.members.update(memberId, {status});
    }
    public async getBorrowing(borrowingId: number): Promise<IBorrowing | undefined> {
        return this.borrowings.get(borrowingId);
    }
    public async getAllBorrowings(filter: IBorrowingFilter = {}): Promise<IBorrowing[]> {
        return this.borrowings.all((row) => (filter.memberId === undefined || row.memberId === filter.memberId)
            && (filter.bookId === undefined || row.bookId === filter.bookId)
            && (filter.status === undefined || row.status === filter.status));
    }
    public async applyCheckout(draft: ICheckoutDraft): Promise<IBorrowing> {
        return this.runExclusive(async () => {
            const book = this.checkoutTarget(draft, this.members.get(draft.memberId), this.books.get(draft.bookId));
            this.books.update(book.id, {availableCopies: book.availableCopies - 1});
            return this.borrowings.insert({...draft, returnDate: null, status: BorrowingStatus.BORROWED});
        });
    }
    public async applyReturn(borrowingId: number, returnDate: Date): Promise<IBorrowing> {
        return this.runExclusive(async () => {
            const borrowing = this.openBorrowing(borrowingId, this.borrowings.get(borrowingId));
            const book = this.returnTarget(borrowing, this.books.get(borrowing.bookId));
            this.books.update(book.id, {availableCopies: book.availableCopies + 1});
            const returned = this.borrowings.update(borrowingId, {returnDate, status: BorrowingStatus.RETURNED});
            if (!returned) {
                throw LibraryError.fromKind(ErrorKind.NotFound, "borrowing", borrowingId);
            }
            return returned;
        });
    }
}
