import { EventEmitter } from "events";
import { BaseDataConnector, BorrowingStatus, IBook, IBorrowing } from "./base-data-connector";
import { ErrorKind, errorTemplates, LibraryError } from "./errors";
import { logger } from "./logger";
import { checkoutRequestSchema, ICheckoutRequest, idSchema, parseRequest } from "./schemas";
import { addDays, Clock, groupBy, systemClock } from "./utils";

export interface ILedgerOptions {
    defaultLoanPeriodDays: number;
    clock?: Clock;
}
export interface IInventoryViolation {
    bookId: number;
    isbn: string;
    totalCopies: number;
    availableCopies: number;
    activeBorrowings: number;
    problem: string;
}

export const isOverdue = (borrowing: IBorrowing, now: Date) =>
    borrowing.status === BorrowingStatus.BORROWED && borrowing.dueDate.getTime() < now.getTime();

export const effectiveStatus = (borrowing: IBorrowing, now: Date): BorrowingStatus =>
    isOverdue(borrowing, now) ? BorrowingStatus.OVERDUE : borrowing.status;

const findViolation = (book: IBook, activeBorrowings: number): string | undefined => {
    if (book.availableCopies < 0) {
        return "available copies are negative";
    }
    if (book.availableCopies > book.totalCopies) {
        return "available copies exceed total copies";
    }
    if (book.totalCopies - book.availableCopies !== activeBorrowings) {
        return `${book.totalCopies - book.availableCopies} copies are out but ${activeBorrowings} borrowings are open`;
    }
}

export class LendingLedger extends EventEmitter {
    private dataConnector: BaseDataConnector;
    private defaultLoanPeriodDays: number;
    private clock: Clock;
    constructor(dataConnector: BaseDataConnector, options: ILedgerOptions) {
        super();
        this.dataConnector = dataConnector;
        this.defaultLoanPeriodDays = options.defaultLoanPeriodDays;
        this.clock = options.clock || systemClock;
    }
    public async checkout(checkoutRequest: ICheckoutRequest): Promise<IBorrowing> {
        const request = parseRequest(checkoutRequestSchema, checkoutRequest);
        const borrowDate = this.clock();
        const borrowing = await this.dataConnector.applyCheckout({
            memberId: request.memberId,
            bookId: request.bookId,
            borrowDate,
            dueDate: addDays(borrowDate, request.loanPeriodDays ?? this.defaultLoanPeriodDays),
        });
        logger.info(`Checked out book ${borrowing.bookId} to member ${borrowing.memberId} as borrowing ${borrowing.id}`);
        this.emit("checkedOut", borrowing);
        return borrowing;
    }
    public async returnBook(borrowingId: number): Promise<IBorrowing> {
        try {
            const borrowing = await this.dataConnector.applyReturn(parseRequest(idSchema, borrowingId), this.clock());
            logger.info(`Returned borrowing ${borrowing.id} of book ${borrowing.bookId}`);
            this.emit("returned", borrowing);
            return borrowing;
        } catch (error) {
            if (error instanceof LibraryError && error.kind === ErrorKind.InternalInconsistency) {
                logger.error({err: error}, `Return of borrowing ${borrowingId} refused`);
            }
            throw error;
        }
    }
    public async getBorrowing(borrowingId: number): Promise<IBorrowing> {
        const borrowing = await this.dataConnector.getBorrowing(parseRequest(idSchema, borrowingId));
        if (!borrowing) {
            throw LibraryError.fromKind(ErrorKind.NotFound, "borrowing", borrowingId);
        }
        return borrowing;
    }
    public async listOverdue(): Promise<IBorrowing[]> {
        const now = this.clock();
        const open = await this.dataConnector.getAllBorrowings({status: BorrowingStatus.BORROWED});
        return open.filter((borrowing) => isOverdue(borrowing, now));
    }
    public async auditInventory(): Promise<IInventoryViolation[]> {
        const [books, open] = await Promise.all([
            this.dataConnector.getAllBooks(),
            this.dataConnector.getAllBorrowings({status: BorrowingStatus.BORROWED}),
        ]);
        const openByBook = groupBy(open, (borrowing) => borrowing.bookId);
        const violations: IInventoryViolation[] = [];
        for (const book of books) {
            const activeBorrowings = (openByBook[book.id] || []).length;
            const problem = findViolation(book, activeBorrowings);
            if (problem) {
                violations.push({
                    bookId: book.id,
                    isbn: book.isbn,
                    totalCopies: book.totalCopies,
                    availableCopies: book.availableCopies,
                    activeBorrowings,
                    problem,
                });
            }
        }
        violations.forEach((violation) => logger.error({violation}, errorTemplates[ErrorKind.InternalInconsistency](`book (${violation.bookId}): ${violation.problem}`)));
        return violations;
    }
}
