/**
 * chat_member updates → membership events.
 */

import type { ChatMember, ChatMemberUpdated } from "grammy/types";
import type { MembershipEvent } from "../credentials/types.js";

/**
 * Whether a chat member entry counts as being in the chat. Restricted users
 * carry an explicit flag; left and kicked never count.
 */
export function isMemberStatus(member: ChatMember): boolean {
	switch (member.status) {
		case "creator":
		case "administrator":
		case "member":
			return true;
		case "restricted":
			return member.is_member;
		default:
			return false;
	}
}

export function isAdminStatus(member: ChatMember): boolean {
	return member.status === "creator" || member.status === "administrator";
}

/**
 * Map a membership change to a join or leave. Null for bots and for transitions
 * that do not cross the member boundary (promotions, restriction changes).
 */
export function membershipEventFromUpdate(update: ChatMemberUpdated): MembershipEvent | null {
	const user = update.new_chat_member.user;
	if (user.is_bot) return null;

	const wasMember = isMemberStatus(update.old_chat_member);
	const isMember = isMemberStatus(update.new_chat_member);
	if (wasMember === isMember) return null;

	return {
		type: isMember ? "join" : "leave",
		userId: String(user.id),
		timestamp: update.date * 1000,
		username: user.username,
	};
}
