/**
 * In-memory view of the contribution ledger.
 *
 * A Ledger is owned by its caller for one load → mutate → save cycle; nothing
 * here is shared or cached between calls.
 */

import {
  monthKey,
  type ContributionRecord,
  type LedgerDocument,
  type Member,
} from '@duesledger/types';

export interface MemberRef {
  id: string;
  member: Member;
}

export class Ledger {
  private members: Map<string, Member>;

  private constructor(members: Map<string, Member>) {
    this.members = members;
  }

  static empty(): Ledger {
    return new Ledger(new Map());
  }

  static fromDocument(doc: LedgerDocument): Ledger {
    return new Ledger(new Map(Object.entries(structuredClone(doc.members))));
  }

  toDocument(): LedgerDocument {
    return { members: structuredClone(Object.fromEntries(this.members)) };
  }

  get size(): number {
    return this.members.size;
  }

  listMembers(): MemberRef[] {
    return Array.from(this.members, ([id, member]) => ({ id, member }));
  }

  getMember(memberId: string): Member | undefined {
    return this.members.get(memberId);
  }

  /** Exact, case-sensitive name lookup. */
  findMemberByName(name: string): MemberRef | undefined {
    for (const [id, member] of this.members) {
      if (member.name === name) {
        return { id, member };
      }
    }
    return undefined;
  }

  getRecord(memberId: string, year: number, month: number): ContributionRecord | undefined {
    return this.members.get(memberId)?.contributions[year.toString()]?.[monthKey(month)];
  }

  /** Month keys ("01".."12") with a record in the given year. */
  paidMonths(memberId: string, year: number): string[] {
    const months = this.members.get(memberId)?.contributions[year.toString()];
    return months === undefined ? [] : Object.keys(months).sort();
  }

  /**
   * Write the record at (member, year, month), replacing whatever is there.
   * Conflict checks belong to the caller.
   */
  putRecord(memberId: string, year: number, month: number, record: ContributionRecord): void {
    const member = this.requireMember(memberId);
    const yearKey = year.toString();
    const months = member.contributions[yearKey] ?? {};
    months[monthKey(month)] = { ...record };
    member.contributions[yearKey] = months;
  }

  markIntroductionCourseCompleted(memberId: string): void {
    this.requireMember(memberId).introductionCourseCompleted = true;
  }

  private requireMember(memberId: string): Member {
    const member = this.getMember(memberId);
    if (member === undefined) {
      throw new Error(`Unknown member id: ${memberId}`);
    }
    return member;
  }
}
