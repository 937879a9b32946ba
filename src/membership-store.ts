import { BaseDataConnector, IMember, MemberStatus } from "./base-data-connector";
import { ErrorKind, LibraryError } from "./errors";
import { idSchema, IMemberRequest, memberRequestSchema, memberStatusSchema, parseRequest } from "./schemas";
import { Clock, systemClock } from "./utils";

export class MembershipStore {
    private dataConnector: BaseDataConnector;
    private clock: Clock;
    constructor(dataConnector: BaseDataConnector, clock: Clock = systemClock) {
        this.dataConnector = dataConnector;
        this.clock = clock;
    }
    public async createMember(memberRequest: IMemberRequest): Promise<IMember> {
        const request = parseRequest(memberRequestSchema, memberRequest);
        return this.dataConnector.insertMember({
            firstName: request.firstName,
            lastName: request.lastName,
            email: request.email,
            phone: request.phone ?? null,
            address: request.address ?? null,
            membershipDate: request.membershipDate ?? this.clock(),
            status: request.status,
        });
    }
    public async getMember(memberId: number): Promise<IMember> {
        const member = await this.dataConnector.getMember(parseRequest(idSchema, memberId));
        if (!member) {
            throw LibraryError.fromKind(ErrorKind.NotFound, "member", memberId);
        }
        return member;
    }
    public async listMembers(): Promise<IMember[]> {
        return this.dataConnector.getAllMembers();
    }
    public async setMemberStatus(memberId: number, status: MemberStatus): Promise<IMember> {
        await this.getMember(memberId);
        const member = await this.dataConnector.updateMemberStatus(memberId, parseRequest(memberStatusSchema, status));
        if (!member) {
            throw LibraryError.fromKind(ErrorKind.NotFound, "member", memberId);
        }
        return member;
    }
}
