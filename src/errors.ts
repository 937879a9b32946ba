import jayson from "jayson";
export enum ErrorKind {
    ValidationError = "ValidationError",
    DuplicateKey = "DuplicateKey",
    NotFound = "NotFound",
    MemberInactive = "MemberInactive",
    NoCopiesAvailable = "NoCopiesAvailable",
    AlreadyReturned = "AlreadyReturned",
    Busy = "Busy",
    InternalInconsistency = "InternalInconsistency",
    InternalError = "InternalError",
}

interface IErrorArgs {
    [ErrorKind.ValidationError]: [detail: string];
    [ErrorKind.DuplicateKey]: [entityType: string, field: string, value: string | number];
    [ErrorKind.NotFound]: [entityType: string, entityId: number];
    [ErrorKind.MemberInactive]: [memberId: number];
    [ErrorKind.NoCopiesAvailable]: [bookId: number];
    [ErrorKind.AlreadyReturned]: [borrowingId: number];
    [ErrorKind.Busy]: [waitedMs: number];
    [ErrorKind.InternalInconsistency]: [detail: string];
    [ErrorKind.InternalError]: [];
}

export const errorCodes: {[kind in ErrorKind]: number} = {
    [ErrorKind.ValidationError]: 400,
    [ErrorKind.MemberInactive]: 403,
    [ErrorKind.NotFound]: 404,
    [ErrorKind.DuplicateKey]: 409,
    [ErrorKind.AlreadyReturned]: 410,
    [ErrorKind.NoCopiesAvailable]: 422,
    [ErrorKind.Busy]: 503,
    [ErrorKind.InternalInconsistency]: 500,
    [ErrorKind.InternalError]: 500,
};

export const errorTemplates: {[kind in ErrorKind]: (...args: IErrorArgs[kind]) => string} = {
    [ErrorKind.ValidationError]: (detail) => `Invalid request: ${detail}`,
    [ErrorKind.DuplicateKey]: (entityType, field, value) => `${entityType} with ${field} (${value}) already exists!`,
    [ErrorKind.NotFound]: (entityType, entityId) => `${entityType} (${entityId}) does not exist!`,
    [ErrorKind.MemberInactive]: (memberId) => `member (${memberId}) is not active!`,
    [ErrorKind.NoCopiesAvailable]: (bookId) => `book (${bookId}) has no copies available!`,
    [ErrorKind.AlreadyReturned]: (borrowingId) => `borrowing (${borrowingId}) is already returned!`,
    [ErrorKind.Busy]: (waitedMs) => `Lending is busy, gave up after ${waitedMs}ms`,
    [ErrorKind.InternalInconsistency]: (detail) => `Inventory inconsistency: ${detail}`,
    [ErrorKind.InternalError]: () => `Internal error`,
};

export class LibraryError extends Error {
    public readonly kind: ErrorKind;
    public readonly code: number;
    constructor(kind: ErrorKind, message: string) {
        super(message);
        this.name = "LibraryError";
        this.kind = kind;
        this.code = errorCodes[kind];
        Object.setPrototypeOf(this, new.target.prototype);
    }
    static fromKind = <K extends ErrorKind>(kind: K, ...args: IErrorArgs[K]) => {
        const template: (...templateArgs: IErrorArgs[K]) => string = errorTemplates[kind];
        return new LibraryError(kind, template(...args));
    }
}

export const isLibraryError = (error: unknown, kind?: ErrorKind): error is LibraryError =>
    error instanceof LibraryError && (kind === undefined || error.kind === kind);

export class JSONRPCError implements jayson.JSONRPCError {
    public code: number;
    public message: string;
    public data: {kind: ErrorKind};
    constructor(kind: ErrorKind, message: string) {
        this.code = errorCodes[kind];
        this.message = message;
        this.data = {kind};
    }
    static fromError = (error: unknown) => isLibraryError(error)
        ? new JSONRPCError(error.kind, error.message)
        : new JSONRPCError(ErrorKind.InternalError, errorTemplates[ErrorKind.InternalError]());
}
