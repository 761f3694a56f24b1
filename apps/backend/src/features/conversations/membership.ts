import type { Pool } from "pg"
import { ConversationMemberRepository } from "./member-repository"

/**
 * Answers "may this user see this conversation". The realtime core only asks;
 * membership itself is managed elsewhere.
 */
export interface MembershipChecker {
  memberConversationIds(userId: string, conversationIds: string[]): Promise<string[]>
  isMember(conversationId: string, userId: string): Promise<boolean>
}

export class PostgresMembershipChecker implements MembershipChecker {
  constructor(private pool: Pool) {}

  memberConversationIds(userId: string, conversationIds: string[]): Promise<string[]> {
    return ConversationMemberRepository.filterMemberConversationIds(this.pool, userId, conversationIds)
  }

  isMember(conversationId: string, userId: string): Promise<boolean> {
    return ConversationMemberRepository.isMember(this.pool, conversationId, userId)
  }
}
