import crypto from "node:crypto";

/** MTProxy secrets are 16 bytes, written as 32 lowercase hex chars. */
export const SECRET_PATTERN = /^[0-9a-f]{32}$/;

export function isValidSecret(value: string): boolean {
	return SECRET_PATTERN.test(value);
}

/**
 * Deterministic secret for one provisioning cycle of one user.
 *
 * HMAC-SHA256(salt, "<userId>:<generation>") truncated to 16 bytes. The same
 * inputs always give the same secret, so a retried provision re-adds the secret
 * the server may already hold instead of minting a second one.
 */
export function deriveSecret(salt: Buffer, userId: string, generation: number): string {
	if (!Number.isInteger(generation) || generation < 1) {
		throw new RangeError(`generation must be a positive integer, got ${generation}`);
	}
	return crypto
		.createHmac("sha256", salt)
		.update(`${userId}:${generation}`)
		.digest()
		.subarray(0, 16)
		.toString("hex");
}

export type ProxyEndpoint = {
	host: string;
	port: number;
	tlsDomain?: string;
};

/**
 * Client-side secret: "ee" + secret + hex(domain) for fake-TLS, "dd" + secret otherwise.
 */
export function formatClientSecret(secret: string, tlsDomain?: string): string {
	if (tlsDomain) {
		return `ee${secret}${Buffer.from(tlsDomain, "utf8").toString("hex")}`;
	}
	return `dd${secret}`;
}

/**
 * tg-style share link for a secret. Pure; no remote call.
 */
export function buildProxyLink(endpoint: ProxyEndpoint, secret: string): string {
	const params = new URLSearchParams({
		server: endpoint.host,
		port: String(endpoint.port),
		secret: formatClientSecret(secret, endpoint.tlsDomain),
	});
	return `https://t.me/proxy?${params.toString()}`;
}
