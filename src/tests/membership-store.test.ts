import { expect } from "chai";
import { MemberStatus } from "../base-data-connector";
import { ErrorKind } from "../errors";
import { ILibraryServices } from "../rpc-methods";
import { buildServices, expectLibraryError, TODAY } from "./helpers";

describe("MembershipStore", () => {
    let services: ILibraryServices;

    beforeEach(() => {
        services = buildServices();
    });

    it("registers an active member as of today", async () => {
        const member = await services.membership.createMember({firstName: "Alice", lastName: "Archer", email: "  Alice@Example.COM "});
        expect(member).to.include({
            id: 1,
            firstName: "Alice",
            lastName: "Archer",
            email: "alice@example.com",
            phone: null,
            address: null,
            status: MemberStatus.ACTIVE,
        });
        expect(member.membershipDate.toISOString()).to.equal(TODAY);
    });

    it("accepts an explicit status and membership date", async () => {
        const member = await services.membership.createMember({
            firstName: "Bob",
            lastName: "Baker",
            email: "bob@example.com",
            status: MemberStatus.INACTIVE,
            membershipDate: new Date("2024-03-01T00:00:00.000Z"),
        });
        expect(member.status).to.equal(MemberStatus.INACTIVE);
        expect(member.membershipDate.toISOString()).to.equal("2024-03-01T00:00:00.000Z");
    });

    it("treats email addresses case-insensitively when checking for duplicates", async () => {
        await services.membership.createMember({firstName: "Alice", lastName: "Archer", email: "alice@example.com"});
        await expectLibraryError(
            services.membership.createMember({firstName: "Alicia", lastName: "Archer", email: "ALICE@example.com"}),
            ErrorKind.DuplicateKey,
        );
        expect(await services.membership.listMembers()).to.have.length(1);
    });

    it("rejects missing names and malformed emails", async () => {
        await expectLibraryError(services.membership.createMember({firstName: "", lastName: "Archer", email: "alice@example.com"}), ErrorKind.ValidationError);
        await expectLibraryError(services.membership.createMember({firstName: "Alice", lastName: "Archer", email: "not-an-email"}), ErrorKind.ValidationError);
    });

    it("switches a member between active and inactive", async () => {
        const member = await services.membership.createMember({firstName: "Alice", lastName: "Archer", email: "alice@example.com"});
        const suspended = await services.membership.setMemberStatus(member.id, MemberStatus.INACTIVE);
        expect(suspended.status).to.equal(MemberStatus.INACTIVE);
        expect((await services.membership.getMember(member.id)).status).to.equal(MemberStatus.INACTIVE);
        const restored = await services.membership.setMemberStatus(member.id, MemberStatus.ACTIVE);
        expect(restored.status).to.equal(MemberStatus.ACTIVE);
    });

    it("reports unknown members", async () => {
        await expectLibraryError(services.membership.getMember(5), ErrorKind.NotFound);
        await expectLibraryError(services.membership.setMemberStatus(5, MemberStatus.INACTIVE), ErrorKind.NotFound);
    });
});
