import jayson from "jayson";
import { v4 as uuid } from "uuid";
import { z } from "zod";
import { AggregationService } from "./aggregation-service";
import { CatalogStore } from "./catalog-store";
import { ErrorKind, JSONRPCError } from "./errors";
import { LendingLedger } from "./ledger";
import { logger } from "./logger";
import { MembershipStore } from "./membership-store";
import { QueryFacade } from "./query-facade";
import {
    authorRequestSchema, bookRequestSchema, categoryRequestSchema, checkoutRequestSchema, idSchema, memberRequestSchema,
    memberStatusSchema, parseRequest,
} from "./schemas";

export interface ILibraryServices {
    catalog: CatalogStore;
    membership: MembershipStore;
    ledger: LendingLedger;
    stats: AggregationService;
    queries: QueryFacade;
}

type RpcCallback = (error: JSONRPCError | null, result?: unknown) => void;

const noParams = z.union([z.tuple([]), z.undefined(), z.object({}).strict()]);

const rpcMethod = <P>(methodName: string, paramsSchema: z.ZodType<P, z.ZodTypeDef, unknown>, handler: (params: P) => Promise<unknown>) =>
    async (args: unknown, callback: RpcCallback) => {
        const requestId = uuid();
        logger.info(`${requestId}: ${methodName} ${JSON.stringify(args)}`);
        try {
            const result = await handler(parseRequest(paramsSchema, args));
            logger.debug(`${requestId}: ${JSON.stringify(result)}`);
            callback(null, result);
        } catch (error) {
            const rpcError = JSONRPCError.fromError(error);
            if (rpcError.data.kind === ErrorKind.InternalError || rpcError.data.kind === ErrorKind.InternalInconsistency) {
                logger.error({err: error}, `${requestId}: ${methodName} failed`);
            } else {
                logger.info(`${requestId}: ${rpcError.data.kind} ${rpcError.message}`);
            }
            callback(rpcError);
        }
    };

export const createRpcMethods = (services: ILibraryServices): {[methodName: string]: jayson.MethodLike} => ({
    createBook: rpcMethod("createBook", z.tuple([bookRequestSchema]), ([bookRequest]) => services.catalog.createBook(bookRequest)),
    getBook: rpcMethod("getBook", z.tuple([idSchema]), ([bookId]) => services.queries.bookView(bookId)),
    getBooks: rpcMethod("getBooks", noParams, () => services.queries.booksWithAuthors()),
    addAuthorToBook: rpcMethod("addAuthorToBook", z.tuple([idSchema, idSchema]), ([bookId, authorId]) => services.catalog.addAuthorToBook(bookId, authorId)),
    createAuthor: rpcMethod("createAuthor", z.tuple([authorRequestSchema]), ([authorRequest]) => services.catalog.createAuthor(authorRequest)),
    getAuthors: rpcMethod("getAuthors", noParams, () => services.queries.authorsWithBookCount()),
    createCategory: rpcMethod("createCategory", z.tuple([categoryRequestSchema]), ([categoryRequest]) => services.catalog.createCategory(categoryRequest)),
    getCategories: rpcMethod("getCategories", noParams, () => services.catalog.listCategories()),
    createMember: rpcMethod("createMember", z.tuple([memberRequestSchema]), ([memberRequest]) => services.membership.createMember(memberRequest)),
    getMember: rpcMethod("getMember", z.tuple([idSchema]), ([memberId]) => services.membership.getMember(memberId)),
    getMembers: rpcMethod("getMembers", noParams, () => services.queries.membersWithLoanCount()),
    setMemberStatus: rpcMethod("setMemberStatus", z.tuple([idSchema, memberStatusSchema]), ([memberId, status]) => services.membership.setMemberStatus(memberId, status)),
    checkout: rpcMethod("checkout", z.tuple([checkoutRequestSchema]), ([checkoutRequest]) => services.ledger.checkout(checkoutRequest)),
    returnBook: rpcMethod("returnBook", z.tuple([idSchema]), ([borrowingId]) => services.ledger.returnBook(borrowingId)),
    getBorrowings: rpcMethod("getBorrowings", noParams, () => services.queries.borrowingsWithNames()),
    getOverdueBorrowings: rpcMethod("getOverdueBorrowings", noParams, async () => {
        const overdueIds = new Set((await services.ledger.listOverdue()).map((borrowing) => borrowing.id));
        return (await services.queries.borrowingsWithNames()).filter((borrowing) => overdueIds.has(borrowing.id));
    }),
    getStats: rpcMethod("getStats", noParams, () => services.stats.computeStats()),
    auditInventory: rpcMethod("auditInventory", noParams, () => services.ledger.auditInventory()),
});
