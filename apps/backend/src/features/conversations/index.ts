// Repositories
export { ConversationRepository } from "./repository"
export type { Conversation, TouchLastMessageParams } from "./repository"
export { ConversationMemberRepository } from "./member-repository"

// Membership
export { PostgresMembershipChecker } from "./membership"
export type { MembershipChecker } from "./membership"
