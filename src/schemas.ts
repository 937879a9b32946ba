import { z } from "zod";
import { MemberStatus } from "./base-data-connector";
import { ErrorKind, LibraryError } from "./errors";

export const idSchema = z.number().int().positive();

const optionalText = z.string().trim().min(1).nullable().optional();

// hyphens and spaces are dropped; what remains must be an ISBN-10 or ISBN-13
export const isbnSchema = z.string()
    .transform((value) => value.replace(/[\s-]/g, "").toUpperCase())
    .pipe(z.string().regex(/^(\d{9}[\dX]|\d{13})$/, "must be a 10 or 13 character ISBN"));

export const copyCountSchema = z.number().int().min(0);

export const bookRequestSchema = z.object({
    isbn: isbnSchema,
    title: z.string().trim().min(1),
    publicationYear: z.number().int().nullable().optional(),
    publisher: optionalText,
    totalCopies: copyCountSchema.default(1),
    availableCopies: copyCountSchema.optional(),
    categoryId: idSchema.nullable().optional(),
    authorIds: z.array(idSchema).default([]),
}).refine((book) => book.availableCopies === undefined || book.availableCopies <= book.totalCopies, {
    message: "availableCopies cannot exceed totalCopies",
    path: ["availableCopies"],
});
export type IBookRequest = z.input<typeof bookRequestSchema>;

export const authorRequestSchema = z.object({
    firstName: z.string().trim().min(1),
    lastName: z.string().trim().min(1),
    birthDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "must be YYYY-MM-DD").nullable().optional(),
    nationality: optionalText,
});
export type IAuthorRequest = z.input<typeof authorRequestSchema>;

export const categoryRequestSchema = z.object({
    name: z.string().trim().min(1).max(100),
    description: optionalText,
});
export type ICategoryRequest = z.input<typeof categoryRequestSchema>;

export const memberStatusSchema = z.nativeEnum(MemberStatus);

export const memberRequestSchema = z.object({
    firstName: z.string().trim().min(1),
    lastName: z.string().trim().min(1),
    email: z.string().trim().toLowerCase().email(),
    phone: optionalText,
    address: optionalText,
    status: memberStatusSchema.default(MemberStatus.ACTIVE),
    membershipDate: z.coerce.date().optional(),
});
export type IMemberRequest = z.input<typeof memberRequestSchema>;

export const MAX_LOAN_PERIOD_DAYS = 3650;

export const checkoutRequestSchema = z.object({
    memberId: idSchema,
    bookId: idSchema,
    loanPeriodDays: z.number().int().positive().max(MAX_LOAN_PERIOD_DAYS).optional(),
});
export type ICheckoutRequest = z.input<typeof checkoutRequestSchema>;

const formatIssues = (error: z.ZodError) => error.issues
    .map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`)
    .join("; ");

export const parseRequest = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T => {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        throw LibraryError.fromKind(ErrorKind.ValidationError, formatIssues(parsed.error));
    }
    return parsed.data;
}
