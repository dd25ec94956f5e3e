import { z } from "zod";

export const CREDENTIAL_STATUSES = [
	"ACTIVE",
	"REVOKED",
	"PENDING_PROVISION",
	"PENDING_REVOKE",
	"FAILED",
] as const;

export type CredentialStatus = (typeof CREDENTIAL_STATUSES)[number];

/** Desired end state, set by the most recent applied membership event. */
export type CredentialTarget = "active" | "revoked";

export type RemoteOperation = "provision" | "revoke";

export type UserCredentialRecord = {
	userId: string;
	username: string | null;
	status: CredentialStatus;
	target: CredentialTarget;
	/** 32 lowercase hex chars. Null when REVOKED or not yet provisioned. */
	secret: string | null;
	proxyLink: string | null;
	/** Provisioning cycle; bumps on every fresh grant and feeds secret derivation. */
	generation: number;
	failureCount: number;
	failedOperation: RemoteOperation | null;
	lastError: string | null;
	lastEventAt: number | null;
	lastEventType: MembershipEventType | null;
	nextAttemptAt: number | null;
	createdAt: number;
	updatedAt: number;
};

export function isCredentialStatus(value: string): value is CredentialStatus {
	return CREDENTIAL_STATUSES.some((status) => status === value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Membership events
// ═══════════════════════════════════════════════════════════════════════════════

const UserIdSchema = z
	.union([z.string(), z.number().int()])
	.transform((value) => String(value).trim())
	.refine((value) => /^\d+$/.test(value), { message: "userId must be a positive integer id" });

const EventBaseSchema = z.object({
	userId: UserIdSchema,
	/** Event time in epoch ms, as reported by the source. */
	timestamp: z.number().int().nonnegative(),
	username: z.string().min(1).optional(),
});

export const MembershipEventSchema = z.discriminatedUnion("type", [
	EventBaseSchema.extend({ type: z.literal("join") }),
	EventBaseSchema.extend({ type: z.literal("leave") }),
]);

export type MembershipEvent = z.infer<typeof MembershipEventSchema>;
export type MembershipEventType = MembershipEvent["type"];

/**
 * Validate an event at the boundary. Throws a ZodError on malformed input.
 */
export function parseMembershipEvent(raw: unknown): MembershipEvent {
	return MembershipEventSchema.parse(raw);
}

/**
 * A member asking for their link (e.g. `/start`). Carries no event time:
 * `checkedAt` is the local clock reading taken before membership was checked.
 */
export const AccessRequestSchema = z.object({
	userId: UserIdSchema,
	checkedAt: z.number().int().nonnegative(),
	username: z.string().min(1).optional(),
});

export type AccessRequest = z.infer<typeof AccessRequestSchema>;

export function parseAccessRequest(raw: unknown): AccessRequest {
	return AccessRequestSchema.parse(raw);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Outbound notifications
// ═══════════════════════════════════════════════════════════════════════════════

export type NotificationMessage =
	| { kind: "access_granted"; link: string; reissued: boolean }
	| { kind: "access_revoked" }
	| { kind: "provisioning_failed"; reason: string };

export type AdminAlert = {
	level: "info" | "warn" | "error";
	title: string;
	message: string;
};

/**
 * Outbound side. Delivery is best-effort: a rejected promise is logged by the
 * caller and never undoes a credential change.
 */
export interface Notifier {
	notify(userId: string, message: NotificationMessage): Promise<void>;
	alertAdmins(alert: AdminAlert): Promise<void>;
}
