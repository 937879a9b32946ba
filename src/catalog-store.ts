import { BaseDataConnector, IAuthor, IBook, IBookAuthor, ICategory } from "./base-data-connector";
import { ErrorKind, LibraryError } from "./errors";
import {
    authorRequestSchema, bookRequestSchema, categoryRequestSchema, IAuthorRequest, IBookRequest, ICategoryRequest, idSchema,
    parseRequest,
} from "./schemas";

export class CatalogStore {
    private dataConnector: BaseDataConnector;
    constructor(dataConnector: BaseDataConnector) {
        this.dataConnector = dataConnector;
    }
    public async createBook(bookRequest: IBookRequest): Promise<IBook> {
        const request = parseRequest(bookRequestSchema, bookRequest);
        const categoryId = request.categoryId ?? null;
        if (categoryId !== null) {
            await this.getCategory(categoryId);
        }
        const authorIds = [...new Set(request.authorIds)];  // remove duplicate ids
        for (const authorId of authorIds) {
            await this.getAuthor(authorId);
        }
        return this.dataConnector.insertBook({
            isbn: request.isbn,
            title: request.title,
            publicationYear: request.publicationYear ?? null,
            publisher: request.publisher ?? null,
            totalCopies: request.totalCopies,
            availableCopies: request.availableCopies ?? request.totalCopies,
            categoryId,
        }, authorIds);
    }
    public async getBook(bookId: number): Promise<IBook> {
        const book = await this.dataConnector.getBook(parseRequest(idSchema, bookId));
        if (!book) {
            throw LibraryError.fromKind(ErrorKind.NotFound, "book", bookId);
        }
        return book;
    }
    public async listBooks(): Promise<IBook[]> {
        return this.dataConnector.getAllBooks();
    }
    public async addAuthorToBook(bookId: number, authorId: number): Promise<IBookAuthor> {
        await this.getBook(bookId);
        await this.getAuthor(authorId);
        return this.dataConnector.insertBookAuthor({bookId, authorId});
    }
    public async createAuthor(authorRequest: IAuthorRequest): Promise<IAuthor> {
        const request = parseRequest(authorRequestSchema, authorRequest);
        return this.dataConnector.insertAuthor({
            firstName: request.firstName,
            lastName: request.lastName,
            birthDate: request.birthDate ?? null,
            nationality: request.nationality ?? null,
        });
    }
    public async getAuthor(authorId: number): Promise<IAuthor> {
        const author = await this.dataConnector.getAuthor(parseRequest(idSchema, authorId));
        if (!author) {
            throw LibraryError.fromKind(ErrorKind.NotFound, "author", authorId);
        }
        return author;
    }
    public async listAuthors(): Promise<IAuthor[]> {
        return this.dataConnector.getAllAuthors();
    }
    public async createCategory(categoryRequest: ICategoryRequest): Promise<ICategory> {
        const request = parseRequest(categoryRequestSchema, categoryRequest);
        return this.dataConnector.insertCategory({
            name: request.name,
            description: request.description ?? null,
        });
    }
    public async getCategory(categoryId: number): Promise<ICategory> {
        const category = await this.dataConnector.getCategory(parseRequest(idSchema, categoryId));
        if (!category) {
            throw LibraryError.fromKind(ErrorKind.NotFound, "category", categoryId);
        }
        return category;
    }
    public async listCategories(): Promise<ICategory[]> {
        return this.dataConnector.getAllCategories();
    }
}
