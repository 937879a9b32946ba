import { ErrorKind, LibraryError } from "./errors";
import { FIFOQueue } from "./queue";

export interface IEntityData {
    id: number;
    createdAt: Date;
}
export type Stored<F> = F & IEntityData;

export enum MemberStatus {
    ACTIVE = "active",
    INACTIVE = "inactive",
}
export enum BorrowingStatus {
    BORROWED = "borrowed",
    RETURNED = "returned",
    OVERDUE = "overdue",
}
// overdue is derived at read time and never written
export type StoredBorrowingStatus = BorrowingStatus.BORROWED | BorrowingStatus.RETURNED;

export interface ICategoryFields {
    name: string;
    description: string | null;
}
export interface IAuthorFields {
    firstName: string;
    lastName: string;
    birthDate: string | null;
    nationality: string | null;
}
export interface IBookFields {
    isbn: string;
    title: string;
    publicationYear: number | null;
    publisher: string | null;
    totalCopies: number;
    availableCopies: number;
    categoryId: number | null;
}
export interface IBookAuthorFields {
    bookId: number;
    authorId: number;
}
export interface IMemberFields {
    firstName: string;
    lastName: string;
    email: string;
    phone: string | null;
    address: string | null;
    membershipDate: Date;
    status: MemberStatus;
}
export interface IBorrowingFields {
    memberId: number;
    bookId: number;
    borrowDate: Date;
    dueDate: Date;
    returnDate: Date | null;
    status: StoredBorrowingStatus;
}

export interface ICategory extends ICategoryFields, IEntityData {}
export interface IAuthor extends IAuthorFields, IEntityData {}
export interface IBook extends IBookFields, IEntityData {}
export interface IBookAuthor extends IBookAuthorFields, IEntityData {}
export interface IMember extends IMemberFields, IEntityData {}
export interface IBorrowing extends IBorrowingFields, IEntityData {}

export interface ICheckoutDraft {
    memberId: number;
    bookId: number;
    borrowDate: Date;
    dueDate: Date;
}
export interface IBorrowingFilter {
    memberId?: number;
    bookId?: number;
    status?: StoredBorrowingStatus;
}
export interface ICopyTotals {
    totalCopies: number;
    availableCopies: number;
}
export interface IDataConnectorConfig {
    lockTimeoutMs?: number;
    maxRetries?: number;
}

const DEFAULT_LOCK_TIMEOUT_MS = 5000;

export abstract class BaseDataConnector {
    protected config: IDataConnectorConfig;
    protected lendingQueue: FIFOQueue;
    constructor(config: IDataConnectorConfig = {}) {
        this.config = config;
        this.lendingQueue = new FIFOQueue(config.lockTimeoutMs || DEFAULT_LOCK_TIMEOUT_MS);
    }
    public abstract insertCategory(category: ICategoryFields): Promise<ICategory>;
    public abstract getCategory(categoryId: number): Promise<ICategory | undefined>;
    public abstract getAllCategories(): Promise<ICategory[]>;
    public abstract insertAuthor(author: IAuthorFields): Promise<IAuthor>;
    public abstract getAuthor(authorId: number): Promise<IAuthor | undefined>;
    public abstract getAllAuthors(): Promise<IAuthor[]>;
    // the book row and its author links are written together
    public abstract insertBook(book: IBookFields, authorIds: number[]): Promise<IBook>;
    public abstract getBook(bookId: number): Promise<IBook | undefined>;
    public abstract getAllBooks(): Promise<IBook[]>;
    public abstract insertBookAuthor(link: IBookAuthorFields): Promise<IBookAuthor>;
    public abstract getAllBookAuthors(): Promise<IBookAuthor[]>;
    public abstract insertMember(member: IMemberFields): Promise<IMember>;
    public abstract getMember(memberId: number): Promise<IMember | undefined>;
    public abstract getAllMembers(): Promise<IMember[]>;
    public abstract updateMemberStatus(memberId: number, status: MemberStatus): Promise<IMember | undefined>;
    public abstract getBorrowing(borrowingId: number): Promise<IBorrowing | undefined>;
    public abstract getAllBorrowings(filter?: IBorrowingFilter): Promise<IBorrowing[]>;
    /**
     * Inserts a `borrowed` borrowing and decrements the book's available
     * copies as one atomic unit. Nothing is written when a precondition fails.
     */
    public abstract applyCheckout(draft: ICheckoutDraft): Promise<IBorrowing>;
    /**
     * Marks an open borrowing `returned` and increments the book's available
     * copies as one atomic unit.
     */
    public abstract applyReturn(borrowingId: number, returnDate: Date): Promise<IBorrowing>;

    public async countBooks(): Promise<number> {
        return (await this.getAllBooks()).length;
    }
    public async countAuthors(): Promise<number> {
        return (await this.getAllAuthors()).length;
    }
    public async countMembers(status?: MemberStatus): Promise<number> {
        const members = await this.getAllMembers();
        return status ? members.filter((member) => member.status === status).length : members.length;
    }
    public async countBorrowings(status?: StoredBorrowingStatus): Promise<number> {
        return (await this.getAllBorrowings(status ? {status} : undefined)).length;
    }
    public async getCopyTotals(): Promise<ICopyTotals> {
        const books = await this.getAllBooks();
        return books.reduce<ICopyTotals>((totals, book) => ({
            totalCopies: totals.totalCopies + book.totalCopies,
            availableCopies: totals.availableCopies + book.availableCopies,
        }), {totalCopies: 0, availableCopies: 0});
    }

    protected runExclusive<T>(work: () => Promise<T>): Promise<T> {
        return this.lendingQueue.enqueueTask(work);
    }
    // checked in this order so an exhausted book reports NoCopiesAvailable whatever the member's status
    protected checkoutTarget(draft: ICheckoutDraft, member?: IMember, book?: IBook): IBook {
        if (!member) {
            throw LibraryError.fromKind(ErrorKind.NotFound, "member", draft.memberId);
        }
        if (!book) {
            throw LibraryError.fromKind(ErrorKind.NotFound, "book", draft.bookId);
        }
        if (book.availableCopies <= 0) {
            throw LibraryError.fromKind(ErrorKind.NoCopiesAvailable, book.id);
        }
        if (member.status !== MemberStatus.ACTIVE) {
            throw LibraryError.fromKind(ErrorKind.MemberInactive, member.id);
        }
        return book;
    }
    protected openBorrowing(borrowingId: number, borrowing?: IBorrowing): IBorrowing {
        if (!borrowing) {
            throw LibraryError.fromKind(ErrorKind.NotFound, "borrowing", borrowingId);
        }
        if (borrowing.status === BorrowingStatus.RETURNED) {
            throw LibraryError.fromKind(ErrorKind.AlreadyReturned, borrowingId);
        }
        return borrowing;
    }
    protected returnTarget(borrowing: IBorrowing, book?: IBook): IBook {
        if (!book) {
            throw LibraryError.fromKind(ErrorKind.InternalInconsistency, `borrowing (${borrowing.id}) references missing book (${borrowing.bookId})`);
        }
        if (book.availableCopies >= book.totalCopies) {
            throw LibraryError.fromKind(ErrorKind.InternalInconsistency, `book (${book.id}) has all ${book.totalCopies} copies available but borrowing (${borrowing.id}) is open`);
        }
        return book;
    }
}
