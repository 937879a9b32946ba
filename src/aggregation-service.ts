import { BaseDataConnector, BorrowingStatus, MemberStatus } from "./base-data-connector";
import { IStatsView } from "./interfaces";
import { isOverdue } from "./ledger";
import { Clock, systemClock } from "./utils";

export class AggregationService {
    private dataConnector: BaseDataConnector;
    private clock: Clock;
    constructor(dataConnector: BaseDataConnector, clock: Clock = systemClock) {
        this.dataConnector = dataConnector;
        this.clock = clock;
    }
    public async computeStats(): Promise<IStatsView> {
        const now = this.clock();
        const [totalBooks, totalAuthors, totalMembers, activeBorrowings, copyTotals, open] = await Promise.all([
            this.dataConnector.countBooks(),
            this.dataConnector.countAuthors(),
            this.dataConnector.countMembers(MemberStatus.ACTIVE),
            this.dataConnector.countBorrowings(BorrowingStatus.BORROWED),
            this.dataConnector.getCopyTotals(),
            this.dataConnector.getAllBorrowings({status: BorrowingStatus.BORROWED}),
        ]);
        return {
            totalBooks,
            totalAuthors,
            totalMembers,
            activeBorrowings,
            overdueBorrowings: open.filter((borrowing) => isOverdue(borrowing, now)).length,
            totalCopies: copyTotals.totalCopies,
            availableCopies: copyTotals.availableCopies,
            generatedAt: now.toISOString(),
        };
    }
}
