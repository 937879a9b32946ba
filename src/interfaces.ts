import { BorrowingStatus, MemberStatus } from "./base-data-connector";

export interface IBookView {
    id: number,
    isbn: string,
    title: string,
    publicationYear: number | null,
    publisher: string | null,
    totalCopies: number,
    availableCopies: number,
    categoryName: string | null,
    authors: string[],
}
export interface IAuthorView {
    id: number,
    firstName: string,
    lastName: string,
    birthDate: string | null,
    nationality: string | null,
    bookCount: number,
}
export interface IMemberView {
    id: number,
    name: string,
    firstName: string,
    lastName: string,
    email: string,
    phone: string | null,
    address: string | null,
    status: MemberStatus,
    membershipDate: Date,
    totalBorrowings: number,
}
export interface IBorrowingView {
    id: number,
    memberId: number,
    memberName: string,
    bookId: number,
    bookTitle: string,
    isbn: string,
    borrowDate: Date,
    dueDate: Date,
    returnDate: Date | null,
    status: BorrowingStatus,
}
export interface IStatsView {
    totalBooks: number,
    totalAuthors: number,
    // active members only
    totalMembers: number,
    activeBorrowings: number,
    overdueBorrowings: number,
    totalCopies: number,
    availableCopies: number,
    generatedAt: string,
}
