import {
    ConnectionAcquireTimeoutError, DatabaseError, ForeignKeyConstraintError, Model, Sequelize, TimeoutError, Transaction,
    UniqueConstraintError,
} from "sequelize";
import {
    BaseDataConnector, BorrowingStatus, IAuthor, IAuthorFields, IBook, IBookAuthor, IBookAuthorFields, IBookFields,
    IBorrowing, IBorrowingFilter, ICategory, ICategoryFields, ICheckoutDraft, ICopyTotals, IDataConnectorConfig, IMember,
    IMemberFields, MemberStatus, StoredBorrowingStatus,
} from "../base-data-connector";
import { ErrorKind, LibraryError } from "../errors";
import { logger } from "../logger";
import { sleep } from "../utils";
import { sequelize } from "./connection";
import { Author } from "./models/author";
import { Book } from "./models/book";
import { BookAuthor } from "./models/book-author";
import { Borrowing } from "./models/borrowing";
import { Category } from "./models/category";
import { Member } from "./models/member";

const DEFAULT_MAX_RETRIES = 3;
const RETRY_BASE_DELAY_MS = 20;

// the copy counter moved between our read and our conditional write
class CopyCountConflict extends Error {}

const plain = <A extends {}, C extends {}>(row: Model<A, C> | null): A | undefined => row ? row.get({ plain: true }) : undefined;

const isSerializationFailure = (error: unknown) => error instanceof CopyCountConflict
    || (error instanceof DatabaseError && "code" in error.parent && error.parent.code === "40001");

export class SequelizeDataConnector extends BaseDataConnector {
    private sequelize: Sequelize;
    private initPromise?: Promise<void>;
    constructor(config?: IDataConnectorConfig) {
        super(config);
        this.sequelize = sequelize;
    }
    private async init() {
        await this.sequelize.authenticate();
        logger.info("Sequelize connection established successfully!");
        await this.sequelize.sync();
    }
    private ready(): Promise<void> {
        if (!this.initPromise) {
            this.initPromise = this.init().catch((error) => {
                this.initPromise = undefined;
                throw error;
            });
        }
        return this.initPromise;
    }
    public async reset(): Promise<void> {
        await this.ready();
        await this.sequelize.sync({ force: true });
        logger.info("Force sync done!");
    }
    public async close(): Promise<void> {
        await this.sequelize.close();
    }
    private translateError(error: unknown, entityType: string): unknown {
        if (error instanceof UniqueConstraintError) {
            const [item] = error.errors;
            return LibraryError.fromKind(ErrorKind.DuplicateKey, entityType, (item && item.path) || "key", (item && item.value) || "?");
        }
        if (error instanceof ForeignKeyConstraintError) {
            return LibraryError.fromKind(ErrorKind.ValidationError, `${entityType} references a row that does not exist`);
        }
        if (error instanceof TimeoutError || error instanceof ConnectionAcquireTimeoutError) {
            return LibraryError.fromKind(ErrorKind.Busy, this.config.lockTimeoutMs || 0);
        }
        return error;
    }
    // sqlite shares one connection between all callers, so its writes must not interleave
    private serialize<T>(work: () => Promise<T>): Promise<T> {
        return this.sequelize.getDialect() === "sqlite" ? this.runExclusive(work) : work();
    }
    private async write<T>(entityType: string, work: () => Promise<T>): Promise<T> {
        await this.ready();
        try {
            return await this.serialize(work);
        } catch (error) {
            throw this.translateError(error, entityType);
        }
    }
    private async lend<T>(work: (transaction: Transaction) => Promise<T>): Promise<T> {
        await this.ready();
        const maxRetries = this.config.maxRetries ?? DEFAULT_MAX_RETRIES;
        const startedAt = Date.now();
        for (let attempt = 0; ; attempt++) {
            try {
                return await this.serialize(() => this.sequelize.transaction({
                    isolationLevel: Transaction.ISOLATION_LEVELS.SERIALIZABLE,
                }, work));
            } catch (error) {
                if (!isSerializationFailure(error)) {
                    throw this.translateError(error, "borrowing");
                }
                if (attempt >= maxRetries) {
                    throw LibraryError.fromKind(ErrorKind.Busy, Date.now() - startedAt);
                }
                logger.warn(`Lending transaction rolled back on conflict, retry ${attempt + 1} of ${maxRetries}`);
                await sleep(RETRY_BASE_DELAY_MS * 2 ** attempt);
            }
        }
    }
    public async insertCategory(category: ICategoryFields): Promise<ICategory> {
        return this.write("category", async () => (await Category.create(category)).get({ plain: true }));
    }
    public async getCategory(categoryId: number): Promise<ICategory | undefined> {
        await this.ready();
        return plain(await Category.findByPk(categoryId));
    }
    public async getAllCategories(): Promise<ICategory[]> {
        await this.ready();
        return (await Category.findAll({ order: [["id", "ASC"]] })).map((row) => row.get({ plain: true }));
    }
    public async insertAuthor(author: IAuthorFields): Promise<IAuthor> {
        return this.write("author", async () => (await Author.create(author)).get({ plain: true }));
    }
    public async getAuthor(authorId: number): Promise<IAuthor | undefined> {
        await this.ready();
        return plain(await Author.findByPk(authorId));
    }
    public async getAllAuthors(): Promise<IAuthor[]> {
        await this.ready();
        return (await Author.findAll({ order: [["id", "ASC"]] })).map((row) => row.get({ plain: true }));
    }
    public async insertBook(book: IBookFields, authorIds: number[]): Promise<IBook> {
        return this.write("book", () => this.sequelize.transaction(async (transaction) => {
            const created = await Book.create(book, { transaction });
            const bookId = created.getDataValue("id");
            await BookAuthor.bulkCreate([...new Set(authorIds)].map((authorId) => ({ bookId, authorId })), { transaction });
            return created.get({ plain: true });
        }));
    }
    public async getBook(bookId: number): Promise<IBook | undefined> {
        await this.ready();
        return plain(await Book.findByPk(bookId));
    }
    public async getAllBooks(): Promise<IBook[]> {
        await this.ready();
        return (await Book.findAll({ order: [["id", "ASC"]] })).map((row) => row.get({ plain: true }));
    }
    public async insertBookAuthor(link: IBookAuthorFields): Promise<IBookAuthor> {
        return this.write("book_author", async () => (await BookAuthor.create(link)).get({ plain: true }));
    }
    public async getAllBookAuthors(): Promise<IBookAuthor[]> {
        await this.ready();
        return (await BookAuthor.findAll({ order: [["id", "ASC"]] })).map((row) => row.get({ plain: true }));
    }
    public async insertMember(member: IMemberFields): Promise<IMember> {
        return this.write("member", async () => (await Member.create(member)).get({ plain: true }));
    }
    public async getMember(memberId: number): Promise<IMember | undefined> {
        await this.ready();
        return plain(await Member.findByPk(memberId));
    }
    public async getAllMembers(): Promise<IMember[]> {
        await this.ready();
        return (await Member.findAll({ order: [["id", "ASC"]] })).map((row) => row.get({ plain: true }));
    }
    public async updateMemberStatus(memberId: number, status: MemberStatus): Promise<IMember | undefined> {
        await this.write("member", () => Member.update({ status }, { where: { id: memberId } }));
        return this.getMember(memberId);
    }
    public async getBorrowing(borrowingId: number): Promise<IBorrowing | undefined> {
        await this.ready();
        return plain(await Borrowing.findByPk(borrowingId));
    }
    public async getAllBorrowings(filter: IBorrowingFilter = {}): Promise<IBorrowing[]> {
        await this.ready();
        const where = {
            ...(filter.memberId !== undefined ? { memberId: filter.memberId } : {}),
            ...(filter.bookId !== undefined ? { bookId: filter.bookId } : {}),
            ...(filter.status !== undefined ? { status: filter.status } : {}),
        };
        return (await Borrowing.findAll({ where, order: [["id", "ASC"]] })).map((row) => row.get({ plain: true }));
    }
    public async countBooks(): Promise<number> {
        await this.ready();
        return Book.count();
    }
    public async countAuthors(): Promise<number> {
        await this.ready();
        return Author.count();
    }
    public async countMembers(status?: MemberStatus): Promise<number> {
        await this.ready();
        return Member.count(status ? { where: { status } } : undefined);
    }
    public async countBorrowings(status?: StoredBorrowingStatus): Promise<number> {
        await this.ready();
        return Borrowing.count(status ? { where: { status } } : undefined);
    }
    public async getCopyTotals(): Promise<ICopyTotals> {
        await this.ready();
        const [totalCopies, availableCopies] = await Promise.all([Book.sum("totalCopies"), Book.sum("availableCopies")]);
        return { totalCopies: Number(totalCopies || 0), availableCopies: Number(availableCopies || 0) };
    }
    public async applyCheckout(draft: ICheckoutDraft): Promise<IBorrowing> {
        return this.lend(async (transaction) => {
            const member = plain(await Member.findByPk(draft.memberId, { transaction }));
            const book = this.checkoutTarget(draft, member, plain(await Book.findByPk(draft.bookId, { transaction })));
            // compare-and-set on the value read above
            const [decremented] = await Book.update(
                { availableCopies: book.availableCopies - 1 },
                { where: { id: book.id, availableCopies: book.availableCopies }, transaction },
            );
            if (decremented !== 1) {
                throw new CopyCountConflict(`book ${book.id}`);
            }
            const borrowing = await Borrowing.create({ ...draft, returnDate: null, status: BorrowingStatus.BORROWED }, { transaction });
            return borrowing.get({ plain: true });
        });
    }
    public async applyReturn(borrowingId: number, returnDate: Date): Promise<IBorrowing> {
        return this.lend(async (transaction) => {
            const borrowing = this.openBorrowing(borrowingId, plain(await Borrowing.findByPk(borrowingId, { transaction })));
            const book = this.returnTarget(borrowing, plain(await Book.findByPk(borrowing.bookId, { transaction })));
            const [closed] = await Borrowing.update(
                { status: BorrowingStatus.RETURNED, returnDate },
                { where: { id: borrowingId, status: BorrowingStatus.BORROWED }, transaction },
            );
            const [incremented] = await Book.update(
                { availableCopies: book.availableCopies + 1 },
                { where: { id: book.id, availableCopies: book.availableCopies }, transaction },
            );
            if (closed !== 1 || incremented !== 1) {
                throw new CopyCountConflict(`borrowing ${borrowingId}`);
            }
            const returned: IBorrowing = { ...borrowing, status: BorrowingStatus.RETURNED, returnDate };
            return returned;
        });
    }
}
